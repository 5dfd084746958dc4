/**
 * ENV CONFIG
 *
 * Single place where process.env is read and validated.
 * Entry points load `.env` (dotenv) before calling loadEnv().
 */

import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors.js';

const boolFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  APP_NAME: z.string().default('Auction Data API'),
  APP_VERSION: z.string().default('1.0.0'),

  // Crawl
  CRAWL_URL: z.string().url().or(z.literal('')).default(''),
  CRAWL_CRON: z.string().default(''),
  CRAWL_ON_STARTUP: boolFlag,
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HTTP_PROXY_URL: z.string().default(''),
  VALIDATOR_CACHE_PATH: z.string().default(''),
  SOURCE_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(540),
  FILENAME_PREFIX: z.string().min(1).default('auction_data_'),
  SHRINK_WARN_RATIO: z.coerce.number().min(0).max(1).default(0.5),

  // Admin
  ADMIN_TOKEN: z.string().default(''),

  // Storage
  STORAGE_BACKEND: z.enum(['filesystem', 'relational', 'document']).default('filesystem'),
  SOURCES_DIR: z.string().default('sources'),
  SQLITE_PATH: z.string().default('data/auction-data.db'),
  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  DB_NAME: z.string().default('auction_data'),
  HISTORY_ENABLED: boolFlag,
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// STORAGE CONFIG
// ═══════════════════════════════════════════════════════════════

export type StorageConfig =
  | { kind: 'filesystem'; rootDir: string; historyEnabled: boolean }
  | { kind: 'relational'; path: string; historyEnabled: boolean }
  | { kind: 'document'; mongoUrl: string; dbName: string; historyEnabled: boolean };

function resolveFromCwd(p: string): string {
  return path.isAbsolute(p) ? p : path.join(process.cwd(), p);
}

export function storageConfigFromEnv(env: Env): StorageConfig {
  switch (env.STORAGE_BACKEND) {
    case 'filesystem':
      return { kind: 'filesystem', rootDir: resolveFromCwd(env.SOURCES_DIR), historyEnabled: env.HISTORY_ENABLED };
    case 'relational':
      return { kind: 'relational', path: resolveFromCwd(env.SQLITE_PATH), historyEnabled: env.HISTORY_ENABLED };
    case 'document':
      return {
        kind: 'document',
        mongoUrl: env.MONGO_URL,
        dbName: env.DB_NAME,
        historyEnabled: env.HISTORY_ENABLED,
      };
  }
}
