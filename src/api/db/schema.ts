/**
 * Schema creation and verification, run once at startup.
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { DatabaseConnectionFailureError, toError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type { Queryable } from './pool.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const MIGRATIONS_DIR = path.resolve(__dirname, '..', '..', '..', 'schemas', 'migrations');

export const EXPECTED_TABLES = [
  'academic_levels',
  'countries',
  'genders',
  'platforms',
  'students',
] as const;

export async function ensureSchema(
  db: Queryable,
  logger: Logger,
  migrationsDir: string = MIGRATIONS_DIR
): Promise<string[]> {
  const files = (await readdir(migrationsDir)).filter((file) => file.endsWith('.sql')).sort();

  for (const file of files) {
    const sql = await readFile(path.join(migrationsDir, file), 'utf8');
    try {
      await db.query(sql);
    } catch (error) {
      throw new DatabaseConnectionFailureError(`Migration ${file} failed: ${toError(error).message}`, {
        file,
      });
    }
    logger.debug('Applied migration', { file });
  }

  return files;
}

/**
 * Fails when any table of the star schema is missing from the public schema.
 */
export async function verifySchema(db: Queryable, logger: Logger): Promise<void> {
  let rows: { table_name: string }[];
  try {
    rows = await db.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = 'public'`
    );
  } catch (error) {
    throw new DatabaseConnectionFailureError(
      `Schema verification failed: ${toError(error).message}`
    );
  }

  const present = new Set(rows.map((row) => row.table_name));
  const missing = EXPECTED_TABLES.filter((table) => !present.has(table));

  if (missing.length > 0) {
    throw new DatabaseConnectionFailureError(
      `Expected ${EXPECTED_TABLES.length} tables, missing: ${missing.join(', ')}`,
      { missing }
    );
  }

  logger.info('Schema verified', { tables: EXPECTED_TABLES.length });
}
