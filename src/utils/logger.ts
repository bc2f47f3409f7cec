/**
 * Console output with log levels
 */

import { LogLevel } from '../types/config';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

// Every level goes to stderr; stdout carries only converted SQL or JSON
export class Logger {
  constructor(private level: LogLevel = 'info') {}

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.error(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.error(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.error(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`[ERROR] ${message}`);
    if (error !== undefined) {
      console.error(error);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}
