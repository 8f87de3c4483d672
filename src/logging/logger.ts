/**
 * Structured logging with pluggable transports.
 *
 *  - One global Logger (`logger`); registries and contexts log through
 *    child loggers, e.g. logger.child('hooks').
 *  - Entries carry level, message, ISO 8601 timestamp, optional component,
 *    structured data and error info.
 *  - ConsoleTransport (coloured with chalk), JsonConsoleTransport,
 *    FileTransport (plain lines) and JsonTransport (JSON lines) ship with
 *    the package.
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 */
  timestamp: string;
  /** e.g. 'hooks', 'namespaces', 'context' */
  component?: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Transport {
  write(entry: LogEntry): void;
}

// ── ConsoleTransport ──────────────────────────────────────────────────────

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white,
};

function consoleStream(level: LogLevel): NodeJS.WriteStream {
  return LEVEL_ORDER[level] >= LEVEL_ORDER.error ? process.stderr : process.stdout;
}

export class ConsoleTransport implements Transport {
  write(entry: LogEntry): void {
    const label = LEVEL_COLOR[entry.level](entry.level.toUpperCase().padStart(5));
    const comp = entry.component ? chalk.blue(` [${entry.component}]`) : '';
    let line = `${chalk.dim(entry.timestamp)} ${label}${comp} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += ' ' + chalk.dim(JSON.stringify(entry.data));
    }
    if (entry.error) {
      line += chalk.red(` | ${entry.error.name}: ${entry.error.message}`);
    }

    consoleStream(entry.level).write(line + '\n');
  }
}

/** JSON lines on stdout/stderr, for log collectors. */
export class JsonConsoleTransport implements Transport {
  write(entry: LogEntry): void {
    consoleStream(entry.level).write(JSON.stringify(entry) + '\n');
  }
}

// ── File transports ───────────────────────────────────────────────────────

export interface FileTransportOptions {
  filePath: string;
}

abstract class AppendingTransport implements Transport {
  protected readonly filePath: string;

  constructor(options: FileTransportOptions) {
    this.filePath = options.filePath;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  protected abstract format(entry: LogEntry): string;

  write(entry: LogEntry): void {
    fs.appendFileSync(this.filePath, this.format(entry) + '\n', 'utf-8');
  }
}

/** One human-readable line per entry. */
export class FileTransport extends AppendingTransport {
  protected format(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}]`, `[${entry.level.toUpperCase()}]`];
    if (entry.component) parts.push(`[${entry.component}]`);
    parts.push(entry.message);
    if (entry.data && Object.keys(entry.data).length > 0) parts.push(JSON.stringify(entry.data));
    if (entry.error) parts.push(`ERROR: ${entry.error.name}: ${entry.error.message}`);
    return parts.join(' ');
  }
}

/** JSON lines. */
export class JsonTransport extends AppendingTransport {
  protected format(entry: LogEntry): string {
    return JSON.stringify(entry);
  }
}

// ── Logger ────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: LogLevel;
  transports?: Transport[];
  component?: string;
}

export class Logger {
  private level: LogLevel;
  private readonly transports: Transport[];
  private readonly component?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.component = options.component;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  /**
   * Child loggers share the parent's transport array, so transports added to
   * the parent later reach them too. The level is copied at creation.
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      transports: this.transports,
      component: this.component ? `${this.component}:${component}` : component,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>, err?: unknown): void {
    this.log('warn', message, data, err);
  }

  error(message: string, data?: Record<string, unknown>, err?: unknown): void {
    this.log('error', message, data, err);
  }

  fatal(message: string, data?: Record<string, unknown>, err?: unknown): void {
    this.log('fatal', message, data, err);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, err?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      data,
    };
    if (err !== undefined) {
      entry.error =
        err instanceof Error
          ? { name: err.name, message: err.message, stack: err.stack }
          : { name: 'NonError', message: String(err) };
    }

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (writeErr) {
        // isolate transport errors
        process.stderr.write(`[logger] transport failed: ${String(writeErr)}\n`);
      }
    }
  }
}

const envLevel = process.env['LOG_LEVEL'];

/**
 * Global logger. Components should use `logger.child('name')`.
 */
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
});

export interface LoggerSettings {
  level: LogLevel;
  /** 'pretty' writes readable lines, 'json' writes JSON lines; console and file alike. */
  format: 'pretty' | 'json';
  /** Optional log file, written alongside the console output. */
  file?: string;
}

/**
 * Build a logger from settings. `format` applies to the console and to the
 * optional file alike: 'json' writes JSON lines, 'pretty' writes readable
 * lines (coloured on the console).
 */
export function createLogger(settings: LoggerSettings, component?: string): Logger {
  const transports: Transport[] = [
    settings.format === 'json' ? new JsonConsoleTransport() : new ConsoleTransport(),
  ];
  if (settings.file) {
    transports.push(
      settings.format === 'json'
        ? new JsonTransport({ filePath: settings.file })
        : new FileTransport({ filePath: settings.file })
    );
  }
  return new Logger({ level: settings.level, transports, component });
}
