/**
 * Level-filtered diagnostics on stderr
 *
 * Command output goes to stdout; everything here stays out of its way.
 */

import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type Sink = (line: string) => void;

class Logger {
  private level: LogLevel = 'warn';
  private sink: Sink = (line) => {
    process.stderr.write(`${line}\n`);
  };

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  // Tests capture lines through this
  setSink(sink: Sink): void {
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    const metaStr = meta === undefined ? '' : ` ${describeMeta(meta)}`;
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.format(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }
}

function describeMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message });
  }
  return JSON.stringify(meta);
}

export const logger = new Logger();
