import * as fs from 'fs';
import * as path from 'path';
import type { LogLevel } from './types';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  identity?: string;
  detail?: string;
}

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
 * Append-only JSONL log. Nothing goes to stdout: that is the operator's link.
 * Without a file the entries are kept in memory (used by tests).
 */
export class Logger {
  private logFile?: string;
  private level: LogLevel;
  private identity?: string;
  private memory: LogEntry[] = [];

  constructor(options: { file?: string; level?: LogLevel; append?: boolean } = {}) {
    this.logFile = options.file;
    this.level = options.level ?? 'info';

    if (this.logFile) {
      const dir = path.dirname(this.logFile);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      if (!options.append) {
        fs.writeFileSync(this.logFile, '');
      }
    }
  }

  /** Tag every following entry with the operator's callsign. */
  setIdentity(identity: string): void {
    this.identity = identity;
  }

  debug(tag: string, message: string, detail?: unknown): void {
    this.write('debug', tag, message, detail);
  }

  info(tag: string, message: string, detail?: unknown): void {
    this.write('info', tag, message, detail);
  }

  warn(tag: string, message: string, detail?: unknown): void {
    this.write('warn', tag, message, detail);
  }

  error(tag: string, message: string, detail?: unknown): void {
    this.write('error', tag, message, detail);
  }

  /** Entries kept when no log file is configured. */
  entries(): readonly LogEntry[] {
    return this.memory;
  }

  private write(level: LogLevel, tag: string, message: string, detail?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      tag,
      message,
    };
    if (this.identity) entry.identity = this.identity;
    if (detail !== undefined) entry.detail = describe(detail);

    if (!this.logFile) {
      this.memory.push(entry);
      return;
    }

    try {
      fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
    } catch (error) {
      // stderr, never stdout
      process.stderr.write(`log write failed: ${describe(error)}\n`);
    }
  }
}

function describe(detail: unknown): string {
  if (detail instanceof Error) return `${detail.name}: ${detail.message}`;
  if (typeof detail === 'string') return detail;
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
}
