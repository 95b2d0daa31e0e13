/**
 * REASON logger
 *
 * Named, levelled console logger. Lines look like
 *   2024-01-01T00:00:00.000Z - REASON.Core - INFO - message
 * and are mirrored to a log file when one is configured.
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  /** Default: info */
  level?: LogLevel;
  /** Append every emitted line to this file as well. */
  logFile?: string;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly logFile?: string;

  constructor(
    public readonly name: string,
    options: LoggerOptions = {}
  ) {
    this.level = options.level ?? 'info';
    this.logFile = options.logFile;
    if (this.logFile) {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
    }
  }

  isEnabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[this.level];
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  private emit(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    const line = `${new Date().toISOString()} - ${this.name} - ${level.toUpperCase()} - ${message}`;

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, line + '\n', 'utf-8');
      } catch (err) {
        console.error(`Failed to write log file ${this.logFile}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
