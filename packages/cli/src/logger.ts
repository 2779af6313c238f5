/**
 * Stderr logger handed to the daemon. Every line carries the `[notiqd]` tag
 * and its level; lines below the threshold are dropped.
 *
 * NOTIQD_LOG_LEVEL wins over `logLevel` in the config file, and "info" is
 * used when neither is set.
 */

import type { Logger as LoggerInterface } from '@notiqd/engine';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const PREFIX = '[notiqd]';

/** Parse a string into a valid LogLevel, or return undefined. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.toLowerCase();
  return LOG_LEVELS.find(level => level === lower);
}

export interface LoggerOptions {
  /** Minimum log level to output (default: "info"). */
  level?: LogLevel;
  /** Custom write function (default: process.stderr.write). Used for testing. */
  writeFn?: (message: string) => void;
}

export class Logger implements LoggerInterface {
  private readonly level: LogLevel;
  private readonly writeFn: (message: string) => void;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? 'info';
    this.writeFn
      = options?.writeFn ?? (msg => process.stderr.write(msg));
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;
    this.writeFn(`${PREFIX} ${level}: ${message}\n`);
  }
}

/** First valid level among NOTIQD_LOG_LEVEL and the config value, else "info". */
export function resolveLogLevel(configLevel?: string): LogLevel {
  for (const candidate of [process.env.NOTIQD_LOG_LEVEL, configLevel]) {
    const parsed = candidate === undefined ? undefined : parseLogLevel(candidate);
    if (parsed !== undefined) return parsed;
  }
  return 'info';
}
