/**
 * Runtime Configuration
 *
 * Environment variables validated once with zod. Read lazily so tests can
 * adjust process.env before the first access and call resetConfig().
 */

import path from 'path';
import { z } from 'zod';

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  OLD_STORE_PATH: z.string().min(1).default('store'),
  OLD_SCHEMA_FILE: z.string().min(1).default(path.join('sql', 'init.sql')),
  CORS_ORIGIN: z.string().optional(),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl?: string;
  dbPoolSize: number;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  /** Absolute directory under which corpora/ holds exported files */
  storePath: string;
  /** Absolute path of the DDL applied at start */
  schemaFile: string;
  corsOrigin?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: Record<string, string>) {
    super(
      `Invalid configuration: ${Object.entries(issues)
        .map(([key, message]) => `${key} (${message})`)
        .join(', ')}`
    );
    this.name = 'ConfigError';
  }
}

let cached: AppConfig | null = null;

/**
 * Parse configuration from an environment record
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  // Empty strings count as unset, the way .env files leave them
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = configSchema.safeParse(present);

  if (!result.success) {
    const issues: Record<string, string> = {};
    for (const issue of result.error.issues) {
      issues[issue.path.join('.')] = issue.message;
    }
    throw new ConfigError(issues);
  }

  const values = result.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    dbPoolSize: values.DB_POOL_SIZE,
    logLevel: values.LOG_LEVEL,
    storePath: path.resolve(values.OLD_STORE_PATH),
    schemaFile: path.resolve(values.OLD_SCHEMA_FILE),
    corsOrigin: values.CORS_ORIGIN,
  };
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = parseConfig(process.env);
  }
  return cached;
}

export function resetConfig(): void {
  cached = null;
}
