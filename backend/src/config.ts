import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, resolveLogLevel, type LogLevel } from './logger.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
export const SQL_DIR = path.resolve(currentDir, '../sql');

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
  statementTimeoutMs: number;
};

export type AppConfig = {
  db: DbConfig;
  adminDatabase: string;
  logLevel: LogLevel;
  logFile: string | null;
  outputDir: string;
  schemaSqlPath: string;
  selectSqlPath: string;
  indexSqlPath: string;
};

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length ? value : undefined))
  .optional();

const envSchema = z.object({
  POSTGRES_HOST: optionalText,
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_DB: optionalText,
  POSTGRES_USER: optionalText,
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_ADMIN_DB: optionalText,
  POSTGRES_CONNECT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(10_000),
  POSTGRES_STATEMENT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_FILE: optionalText,
  OUTPUT_DIR: optionalText,
  SCHEMA_SQL_PATH: optionalText,
  SELECT_SQL_PATH: optionalText,
  INDEX_SQL_PATH: optionalText,
  NODE_ENV: optionalText,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(`invalid environment: ${keys.join(', ')}`, parsed.error.issues);
  }
  const vars = parsed.data;

  return {
    db: {
      host: vars.POSTGRES_HOST ?? 'localhost',
      port: vars.POSTGRES_PORT,
      user: vars.POSTGRES_USER ?? 'postgres',
      password: vars.POSTGRES_PASSWORD,
      database: vars.POSTGRES_DB ?? 'university',
      connectTimeoutMs: vars.POSTGRES_CONNECT_TIMEOUT_MS,
      statementTimeoutMs: vars.POSTGRES_STATEMENT_TIMEOUT_MS,
    },
    adminDatabase: vars.POSTGRES_ADMIN_DB ?? 'postgres',
    logLevel: resolveLogLevel(vars.LOG_LEVEL, vars.NODE_ENV),
    logFile: vars.LOG_FILE ? path.resolve(vars.LOG_FILE) : null,
    outputDir: path.resolve(vars.OUTPUT_DIR ?? process.cwd()),
    schemaSqlPath: path.resolve(vars.SCHEMA_SQL_PATH ?? path.join(SQL_DIR, 'db_schema.sql')),
    selectSqlPath: path.resolve(vars.SELECT_SQL_PATH ?? path.join(SQL_DIR, 'select_queries.sql')),
    indexSqlPath: path.resolve(vars.INDEX_SQL_PATH ?? path.join(SQL_DIR, 'create_indexes.sql')),
  };
}

export function adminDbConfig(config: AppConfig): DbConfig {
  return { ...config.db, database: config.adminDatabase };
}
