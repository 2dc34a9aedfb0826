import { destination, pino, type Logger } from 'pino';

export type { Logger };

export type LoggerOptions = {
  level: LogLevel;
  file?: string | null;
};

// A file sink is truncated on open so each run leaves its own log.
export function createLogger({ level, file }: LoggerOptions): Logger {
  const options = { level, base: { pid: process.pid } };
  if (file) {
    return pino(options, destination({ dest: file, append: false, mkdir: true, sync: true }));
  }
  return pino(options);
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** A known `LOG_LEVEL` wins; otherwise `silent` under tests and `info` elsewhere. */
export function resolveLogLevel(level: string | undefined, nodeEnv: string | undefined): LogLevel {
  const known = LOG_LEVELS.find((candidate) => candidate === level);
  if (known) return known;
  return nodeEnv === 'test' ? 'silent' : 'info';
}

export const logger = createLogger({ level: resolveLogLevel(process.env.LOG_LEVEL, process.env.NODE_ENV) });
