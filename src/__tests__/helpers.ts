import { readFileSync, readdirSync } from 'fs';
import path from 'path';
import type { Pool } from 'pg';
import { newDb } from 'pg-mem';
import { vi } from 'vitest';
import { createDatabase, type Database } from '../api/db/pool.js';
import { MIGRATIONS_DIR } from '../api/db/schema.js';
import { createLogger, type Logger } from '../logger.js';
import type { ChatModel } from '../relay/chat-model.js';

export interface MemoryDatabase {
  db: Database;
  pool: Pool;
  count(table: string): Promise<number>;
}

/** In-process PostgreSQL with the migrations applied. */
export function createMemoryDatabase(logger: Logger = silentLogger()): MemoryDatabase {
  const mem = newDb();
  for (const file of readdirSync(MIGRATIONS_DIR).filter((f) => f.endsWith('.sql')).sort()) {
    mem.public.none(readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8'));
  }

  const { Pool: MemoryPool } = mem.adapters.createPg();
  const pool: Pool = new MemoryPool();
  const db = createDatabase(pool, logger);

  return {
    db,
    pool,
    async count(table: string): Promise<number> {
      const row = await db.queryOne<{ total: number }>(`SELECT COUNT(*)::int AS total FROM ${table}`);
      return row?.total ?? 0;
    },
  };
}

export function recordingLogger() {
  const sink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: createLogger({ level: 'debug', sink }), sink };
}

export function silentLogger(): Logger {
  return recordingLogger().logger;
}

export function csvRecord(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    Student_ID: '1',
    Age: '20',
    Gender: 'Female',
    Academic_Level: 'Undergraduate',
    Country: 'Poland',
    Avg_Daily_Usage_Hours: '4',
    Most_Used_Platform: 'Instagram',
    Affects_Academic_Performance: 'Yes',
    Sleep_Hours_Per_Night: '7',
    Mental_Health_Score: '6',
    Relationship_Status: 'Single',
    Conflicts_Over_Social_Media: '2',
    Addicted_Score: '3',
    ...overrides,
  };
}

/** Chat model that streams fixed fragments and records the prompts it saw. */
export function fakeChatModel(chunks: readonly string[]) {
  const prompts: string[] = [];
  const model: ChatModel = {
    async *stream(prompt: string): AsyncIterable<string> {
      prompts.push(prompt);
      for (const chunk of chunks) {
        yield chunk;
      }
    },
  };
  return { model, prompts };
}
