/**
 * Centralized logging system with multiple output levels and file sinks
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Destination for formatted log entries besides the console
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel | Uppercase<LogLevel>;
  console?: boolean;
  sinks?: LogSink[];
  maxEntries?: number;
}

export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const lowered = value?.trim().toLowerCase();
  return LEVELS.find(level => level === lowered) ?? fallback;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local wall-clock timestamp, `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5);
  const context = entry.context ? ` [${entry.context}]` : '';
  let message = `[${formatTimestamp(entry.timestamp)}] ${level}${context} ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    message += ` ${JSON.stringify(entry.data)}`;
  }

  if (entry.error && entry.error.message !== entry.message) {
    message += ` (${entry.error.message})`;
  }

  return message;
}

/**
 * Appends one line per entry to a file.
 * Entries below `minLevel` are dropped, so the same class serves the
 * action log and the error-only report.
 */
export class FileSink implements LogSink {
  readonly path: string;
  private minLevel: LogLevel;

  constructor(path: string, minLevel: LogLevel = 'debug') {
    this.path = path;
    this.minLevel = minLevel;
  }

  /**
   * Empty the file, creating it and its directory when needed
   */
  truncate(): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, '');
  }

  write(entry: LogEntry): void {
    if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(this.minLevel)) return;
    appendFileSync(this.path, formatEntry(entry) + '\n', 'utf-8');
  }
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private minLevel: LogLevel;
  private context?: string;
  private useConsole: boolean;
  private sinks: LogSink[];

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = normalizeLogLevel(options.level);
    this.useConsole = options.console ?? true;
    this.sinks = options.sinks ?? [];
    this.maxLogs = options.maxEntries ?? 1000;
  }

  /**
   * Logger sharing this one's sinks and level under another context
   */
  child(context: string): Logger {
    return new Logger({
      context,
      level: this.minLevel,
      console: this.useConsole,
      sinks: this.sinks,
      maxEntries: this.maxLogs
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    for (const sink of this.sinks) {
      sink.write(entry);
    }

    if (!this.useConsole) return;

    const formatted = formatEntry(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, data, context: this.context });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter(log => log.level === level) : [...this.logs];
  }

  clear(): void {
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Process-wide console logger for code that runs outside a pipeline run
export const logger = new Logger({ level: normalizeLogLevel(process.env.LOG_LEVEL) });

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
