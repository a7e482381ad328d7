/**
 * Environment Configuration
 *
 * `.env` is loaded by the entry points through `dotenv/config`; this module
 * only parses and types what ends up in `process.env`.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

function jsonStringArray(fallback: string[]) {
  return z
    .string()
    .optional()
    .transform((raw, ctx): string[] => {
      if (raw === undefined || raw.trim() === '') {
        return fallback;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array of strings' });
        return z.NEVER;
      }
      const result = z.array(z.string()).safeParse(parsed);
      if (!result.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array of strings' });
        return z.NEVER;
      }
      return result.data;
    });
}

const booleanFlag = z
  .enum(['true', 'false', 'True', 'False', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === 'True' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  DATABASE_URL: z.string().min(1).optional(),
  DB_DIALECT: z.enum(['postgresql', 'postgres']).default('postgresql'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().default(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().default('students'),

  STUDENTS_CSV_PATH: z.string().default('data/Students_Social_Media_Addiction.csv'),
  IMPORT_ON_STARTUP: booleanFlag,

  LLM_URL: z.string().url().default('http://localhost:11434'),
  LLM_MODEL: z.string().default('qwen2.5-coder:7b'),
  LLM_API_KEY: z.string().default('local'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  TEMPLATES_DIR: z.string().default('templates'),
  PROMPTS_DIR: z.string().default('files'),
  TEMPLATES: jsonStringArray(['Templates:', 'generate_docstring', 'example', 'exit']),
  PROMPT_OPTIONS: jsonStringArray(['Prompt Options:', 'file', 'enter prompt']),
  RELAY_ALLOWED_HOSTS: jsonStringArray(['localhost', '127.0.0.1']),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  databaseUrl: string;
  studentsCsvPath: string;
  importOnStartup: boolean;
  llm: {
    url: string;
    model: string;
    apiKey: string;
    maxTokens: number;
    timeoutMs: number;
  };
  relay: {
    templatesDir: string;
    promptsDir: string;
    /** Menu entries; the first one is the caption. */
    templates: string[];
    promptOptions: string[];
    allowedHosts: string[];
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  const databaseUrl =
    parsed.DATABASE_URL ??
    `${parsed.DB_DIALECT}://${encodeURIComponent(parsed.DB_USER)}:${encodeURIComponent(
      parsed.DB_PASSWORD
    )}@${parsed.DB_HOST}:${parsed.DB_PORT}/${parsed.DB_NAME}`;

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    databaseUrl,
    studentsCsvPath: parsed.STUDENTS_CSV_PATH,
    importOnStartup: parsed.IMPORT_ON_STARTUP,
    llm: {
      url: parsed.LLM_URL,
      model: parsed.LLM_MODEL,
      apiKey: parsed.LLM_API_KEY,
      maxTokens: parsed.LLM_MAX_TOKENS,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
    relay: {
      templatesDir: parsed.TEMPLATES_DIR,
      promptsDir: parsed.PROMPTS_DIR,
      templates: parsed.TEMPLATES,
      promptOptions: parsed.PROMPT_OPTIONS,
      allowedHosts: parsed.RELAY_ALLOWED_HOSTS,
    },
  };
}
