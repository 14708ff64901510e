/**
 * Leveled logger writing to stderr, so stdout carries only command output
 */

import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

class Logger {
  private level: LogLevel = 'warn';
  private sink: LogSink = stderrSink;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setSink(sink: LogSink | null): void {
    this.sink = sink ?? stderrSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    let metaStr = '';
    if (meta instanceof Error) {
      metaStr = ` ${meta.message}`;
    } else if (meta !== undefined) {
      metaStr = ` ${JSON.stringify(meta)}`;
    }
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.format(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }
}

export const logger = new Logger();
