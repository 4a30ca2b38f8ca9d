/**
 * Console Logger
 *
 * Writes `[Context] message` lines to stderr so stdout stays free for the
 * host application. Messages below the configured level are dropped.
 */

import { z } from 'zod';
import type { ILogger, LogLevel } from '../interfaces/logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Resolve a log level from an environment value
 *
 * Unknown or missing values fall back to `info`.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export class ConsoleLogger implements ILogger {
  private readonly context: string;
  private readonly level: LogLevel;

  constructor(context: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)) {
    this.context = context;
    this.level = level;
  }

  /**
   * Logger with the same level and a nested context (`Parent:child`)
   */
  child(context: string): ConsoleLogger {
    return new ConsoleLogger(`${this.context}:${context}`, this.level);
  }

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled('debug')) {
      console.error(this.format(message), ...meta);
    }
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled('info')) {
      console.error(this.format(message), ...meta);
    }
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...meta);
    }
  }

  error(message: string, ...meta: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...meta);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    return `[${this.context}] ${message}`;
  }
}
