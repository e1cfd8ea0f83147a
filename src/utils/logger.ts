import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Structured logger writing one JSON line per entry
 * Warnings and errors go to stderr so stdout stays readable for the run summary.
 * With a log file set, every emitted line is appended there as well.
 */
export class JsonLogger implements Logger {
  private level: LogLevel;
  private file: string | null = null;

  constructor(level: LogLevel) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Start (or stop, with null) appending log lines to a file; creates its directory
   */
  setFile(file: string | null): void {
    if (file) {
      mkdirSync(path.dirname(file), { recursive: true });
    }
    this.file = file;
  }

  getFile(): string | null {
    return this.file;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = JSON.stringify({
      severity: level.toUpperCase(),
      time: new Date().toISOString(),
      message,
      ...meta,
    });

    if (level === 'warn' || level === 'error') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }

    if (this.file) {
      this.appendToFile(this.file, line);
    }
  }

  private appendToFile(file: string, line: string): void {
    try {
      appendFileSync(file, line + '\n', 'utf-8');
    } catch (error) {
      this.file = null;
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(
        JSON.stringify({
          severity: 'ERROR',
          time: new Date().toISOString(),
          message: 'Log file disabled after write failure',
          file,
          error: reason,
        }) + '\n'
      );
    }
  }
}

const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

export const logger = new JsonLogger(isLogLevel(envLevel) ? envLevel : 'info');

export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level);
}

export function setLogFile(file: string | null): void {
  logger.setFile(file);
}
