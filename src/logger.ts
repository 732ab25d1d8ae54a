import type { Writable } from 'node:stream';
import winston from 'winston';

/**
 * Minimal logging surface the discovery and connection components write to.
 * Anything with these four methods works (a winston logger, console, a test spy).
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Logger that drops everything. Default for library components.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Component label prepended to each line */
  label?: string;
  /** Write every level to stderr (CLI keeps stdout for JSON output) */
  stderr?: boolean;
  /** Write lines to this stream instead of the console */
  stream?: Writable;
}

/**
 * Build a winston-backed Logger with a single-line, timestamped format.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const format = winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf((info) => {
      const label = options.label ? ` [${options.label}]` : '';
      return `${String(info.timestamp)} ${info.level}${label}: ${String(info.message)}`;
    })
  );

  const logger = winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    format,
    transports: [
      options.stream
        ? new winston.transports.Stream({ stream: options.stream })
        : new winston.transports.Console({
            stderrLevels: options.stderr ? ['debug', 'info', 'warn', 'error'] : ['error'],
          }),
    ],
  });

  return {
    debug: (message) => { logger.debug(message); },
    info: (message) => { logger.info(message); },
    warn: (message) => { logger.warn(message); },
    error: (message) => { logger.error(message); },
  };
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
