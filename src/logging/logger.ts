/**
 * Structured logging with per-transport thresholds.
 *
 *  - A Logger is built once at start-up (createLogger) and handed to whatever
 *    needs it; there is no module-level instance.
 *  - Every entry carries a component: the scope it was bound to with
 *    logger.child('name'), otherwise the OutputAttribution's current scope,
 *    otherwise `core`.
 *  - ConsoleTransport writes coloured lines, FileTransport appends plain
 *    lines with size-based rotation. Each transport may carry its own minimum
 *    level so console and file output are filtered independently.
 */

import fs from 'fs';
import path from 'path';
import { format } from 'util';
import chalk from 'chalk';
import { CORE_SCOPE } from './attribution.js';
import type { OutputAttribution } from './attribution.js';

// ── Log level ordering ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

// ── Log entry ─────────────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Plugin name, or 'core' for host output */
  component: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

// ── Transport interface ───────────────────────────────────────────────────

export interface Transport {
  /** Entries below this level are not handed to the transport. */
  level?: LogLevel;
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

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: ' INFO',
  warn: ' WARN',
  error: 'ERROR',
  fatal: 'FATAL',
};

export class ConsoleTransport implements Transport {
  level?: LogLevel;

  constructor(options?: { level?: LogLevel }) {
    this.level = options?.level;
  }

  write(entry: LogEntry): void {
    const colorize = LEVEL_COLOR[entry.level];
    const label = colorize(LEVEL_LABEL[entry.level]);
    const ts = chalk.dim(entry.timestamp);
    const comp = entry.component === CORE_SCOPE
      ? chalk.dim(` [${entry.component}]`)
      : chalk.blue(` [${entry.component}]`);

    let line = `${ts} ${label}${comp} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += ' ' + chalk.dim(JSON.stringify(entry.data));
    }

    if (entry.error) {
      line += chalk.red(` | ${entry.error.message}`);
      if (entry.error.stack && entry.level === 'fatal') {
        line += '\n' + chalk.dim(entry.error.stack);
      }
    }

    if (entry.level === 'error' || entry.level === 'fatal') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ── FileTransport ─────────────────────────────────────────────────────────

export interface FileTransportOptions {
  filePath: string;
  level?: LogLevel;
  /** Max file size in bytes before rotation. Default: 10 MB */
  maxSize?: number;
  /** Number of rotated files to keep. Default: 30 */
  maxFiles?: number;
}

/** Plain-text line used by FileTransport: `[ts] [LEVEL] [component] message ...` */
export function formatFileLine(entry: LogEntry): string {
  const parts: string[] = [
    `[${entry.timestamp}]`,
    `[${entry.level.toUpperCase()}]`,
    `[${entry.component}]`,
    entry.message,
  ];

  if (entry.data && Object.keys(entry.data).length > 0) {
    parts.push(JSON.stringify(entry.data));
  }

  if (entry.error) {
    parts.push(`ERROR: ${entry.error.message}`);
    if (entry.error.code) parts.push(`(code: ${entry.error.code})`);
  }

  return parts.join(' ');
}

export class FileTransport implements Transport {
  level?: LogLevel;
  private filePath: string;
  private maxSize: number;
  private maxFiles: number;

  constructor(options: FileTransportOptions) {
    this.filePath = options.filePath;
    this.level = options.level;
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 30;

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  write(entry: LogEntry): void {
    this.maybeRotate();
    try {
      fs.appendFileSync(this.filePath, formatFileLine(entry) + '\n', 'utf-8');
    } catch (err) {
      process.stderr.write(`log file write failed: ${(err as Error).message}\n`);
    }
  }

  private maybeRotate(): void {
    if (!fs.existsSync(this.filePath)) return;
    if (fs.statSync(this.filePath).size < this.maxSize) return;

    const oldest = `${this.filePath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.rmSync(oldest);

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const old = `${this.filePath}.${i}`;
      if (fs.existsSync(old)) {
        fs.renameSync(old, `${this.filePath}.${i + 1}`);
      }
    }
    fs.renameSync(this.filePath, `${this.filePath}.1`);
  }
}

// ── Logger ────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: LogLevel;
  transports?: Transport[];
  /** Binds every entry to this scope instead of asking the attribution. */
  component?: string;
  attribution?: OutputAttribution;
}

export class Logger {
  private level: LogLevel;
  private transports: Transport[];
  private readonly component?: string;
  private readonly attribution?: OutputAttribution;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? 'info';
    this.transports = options?.transports ?? [new ConsoleTransport()];
    this.component = options?.component;
    this.attribution = options?.attribution;
  }

  // ── Level control ──────────────────────────────────────────────────────

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // ── Transport management ───────────────────────────────────────────────

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  removeTransport(transport: Transport): void {
    const idx = this.transports.indexOf(transport);
    if (idx >= 0) this.transports.splice(idx, 1);
  }

  // ── Scoping ────────────────────────────────────────────────────────────

  /**
   * Logger bound to an explicit scope. Shares the parent's level, transports
   * (the same array, so addTransport on the parent propagates) and attribution.
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      transports: this.transports,
      component,
      attribution: this.attribution,
    });
  }

  /** Scope the next entry would be tagged with. */
  scope(): string {
    return this.component ?? this.attribution?.current() ?? CORE_SCOPE;
  }

  // ── Logging methods ────────────────────────────────────────────────────

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    this.logProblem('error', message, errorOrData, data);
  }

  fatal(message: string, errorOrData?: unknown, data?: Record<string, unknown>): void {
    this.logProblem('fatal', message, errorOrData, data);
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!isLevelEnabled(level, this.level)) return;

    this.dispatch({
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.scope(),
      data,
    });
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private logProblem(level: LogLevel, message: string, errorOrData: unknown, data?: Record<string, unknown>): void {
    if (errorOrData === undefined || isPlainRecord(errorOrData)) {
      this.log(level, message, errorOrData);
      return;
    }
    if (!isLevelEnabled(level, this.level)) return;

    const err = errorOrData instanceof Error ? errorOrData : new Error(String(errorOrData));
    this.dispatch({
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.scope(),
      data,
      error: {
        message: err.message,
        stack: err.stack,
        code: (err as NodeJS.ErrnoException).code,
      },
    });
  }

  private dispatch(entry: LogEntry): void {
    for (const transport of this.transports) {
      if (transport.level && !isLevelEnabled(entry.level, transport.level)) continue;
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`log transport failed: ${(err as Error).message}\n`);
      }
    }
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

// ── Factory ───────────────────────────────────────────────────────────────

export interface LoggerSetup {
  consoleLevel: LogLevel;
  fileLevel: LogLevel;
  /** Omit to log to the console only. */
  file?: string;
  maxSize?: number;
  maxFiles?: number;
}

export function createLogger(setup: LoggerSetup, attribution: OutputAttribution): Logger {
  const transports: Transport[] = [new ConsoleTransport({ level: setup.consoleLevel })];
  if (setup.file) {
    transports.push(new FileTransport({
      filePath: setup.file,
      level: setup.fileLevel,
      maxSize: setup.maxSize,
      maxFiles: setup.maxFiles,
    }));
  }

  const lowest = setup.file && isLevelEnabled(setup.consoleLevel, setup.fileLevel)
    ? setup.fileLevel
    : setup.consoleLevel;

  return new Logger({ level: lowest, transports, attribution });
}

// ── Attributed console ────────────────────────────────────────────────────

export interface PluginConsole {
  log: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Console handed to plugin code. Writes go through `logger`, so they are
 * tagged with whatever scope is active when the plugin prints.
 */
export function createAttributedConsole(logger: Logger): PluginConsole {
  return {
    log: (...args) => logger.info(format(...args)),
    info: (...args) => logger.info(format(...args)),
    debug: (...args) => logger.debug(format(...args)),
    warn: (...args) => logger.warn(format(...args)),
    error: (...args) => logger.error(format(...args)),
  };
}
