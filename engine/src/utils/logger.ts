/** Structured engine logging: JSONL for machine consumption, .log for humans, console for devs. */

import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  data?: LogData;
}

/** Anything the engine can report to. */
export interface LogSink {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface DiagramLoggerOptions {
  /** Directory for flowscribe.jsonl / flowscribe.log. Console only when omitted. */
  logDir?: string;
  /** Lowest level echoed to the console. Files always receive every entry. */
  consoleLevel?: LogLevel;
}

export class DiagramLogger implements LogSink {
  private jsonlPath: string | null = null;
  private textPath: string | null = null;
  private consoleLevel: LogLevel;

  constructor(options: DiagramLoggerOptions = {}) {
    this.consoleLevel = options.consoleLevel ?? 'info';
    if (options.logDir) {
      try {
        fs.mkdirSync(options.logDir, { recursive: true });
        this.jsonlPath = path.join(options.logDir, 'flowscribe.jsonl');
        this.textPath = path.join(options.logDir, 'flowscribe.log');
      } catch (err) {
        console.warn(`[flowscribe] log directory unavailable: ${errorMessage(err)}`);
      }
    }
  }

  /** Write a structured log entry. */
  log(level: LogLevel, event: string, data?: LogData): void {
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, event, ...(data !== undefined ? { data } : {}) };
    const dataStr = data ? ' ' + formatData(data) : '';

    if (this.jsonlPath && this.textPath) {
      try {
        fs.appendFileSync(this.jsonlPath, JSON.stringify(entry) + '\n');
        fs.appendFileSync(this.textPath, `[${timestamp}] [${level.toUpperCase()}] ${event}${dataStr}\n`);
      } catch (err) {
        // Stop writing files after the first failure; the console keeps working.
        this.jsonlPath = null;
        this.textPath = null;
        console.warn(`[flowscribe] log file write failed: ${errorMessage(err)}`);
      }
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.consoleLevel]) return;
    const consoleMsg = `[flowscribe] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else {
      console.log(consoleMsg);
    }
  }

  debug(event: string, data?: LogData): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.log('error', event, data);
  }
}

/** Collects entries in memory. Used by tests and headless callers that inspect diagnostics. */
export class MemoryLogSink implements LogSink {
  readonly entries: LogEntry[] = [];

  private push(level: LogLevel, event: string, data?: LogData): void {
    this.entries.push({ timestamp: new Date().toISOString(), level, event, ...(data !== undefined ? { data } : {}) });
  }

  debug(event: string, data?: LogData): void {
    this.push('debug', event, data);
  }

  info(event: string, data?: LogData): void {
    this.push('info', event, data);
  }

  warn(event: string, data?: LogData): void {
    this.push('warn', event, data);
  }

  error(event: string, data?: LogData): void {
    this.push('error', event, data);
  }

  /** Events logged at the given level, in order. */
  events(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.event);
  }
}

/** Format data object for a human-readable log line. */
export function formatData(data: LogData): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && value.length > 200) {
      parts.push(`${key}=[${value.length} chars]`);
    } else if (typeof value === 'object' && value !== null) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(', ');
}
