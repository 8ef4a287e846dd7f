/**
 * Structured Registration Logger
 *
 * Design decisions:
 * - Zero overhead when disabled (level check is a single integer comparison)
 * - Structured JSON lines, one object per event
 * - Only registration and compilation log; find() never does
 * - No external dependencies
 * - Levels: SILENT, ERROR, WARN, INFO, DEBUG
 */

import type { Writable } from 'node:stream';

export const LogLevel = {
  SILENT: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_NAMES: readonly string[] = ['SILENT', 'ERROR', 'WARN', 'INFO', 'DEBUG'];

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel | number;
  name?: string;
  timestamp?: boolean;
  stream?: Writable;
}

export interface ILogger {
  error(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  /** Cheap guard for call sites that build a payload before logging */
  enabled(level: LogLevel | number): boolean;
  child(context: LogFields): ILogger;
}

export class Logger implements ILogger {
  private _level: number;
  private _name: string;
  private _timestamp: boolean;
  private _stream: Writable;
  private _context: LogFields | null = null;

  constructor(opts: LoggerOptions = {}) {
    this._level = opts.level ?? LogLevel.INFO;
    this._name = opts.name || '';
    this._timestamp = opts.timestamp !== false;
    this._stream = opts.stream || process.stdout;
  }

  get level(): number {
    return this._level;
  }

  setLevel(level: LogLevel | number): void {
    this._level = level;
  }

  enabled(level: LogLevel | number): boolean {
    return level !== LogLevel.SILENT && this._level >= level;
  }

  error(msg: string, fields?: LogFields): void {
    if (this._level < LogLevel.ERROR) return;
    this._write(LogLevel.ERROR, msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    if (this._level < LogLevel.WARN) return;
    this._write(LogLevel.WARN, msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    if (this._level < LogLevel.INFO) return;
    this._write(LogLevel.INFO, msg, fields);
  }

  debug(msg: string, fields?: LogFields): void {
    if (this._level < LogLevel.DEBUG) return;
    this._write(LogLevel.DEBUG, msg, fields);
  }

  child(context: LogFields): Logger {
    const child = new Logger({
      level: this._level,
      name: this._name,
      timestamp: this._timestamp,
      stream: this._stream,
    });
    child._context = this._context ? { ...this._context, ...context } : context;
    return child;
  }

  private _write(level: number, msg: string, fields?: LogFields): void {
    const entry: LogFields = { level: LEVEL_NAMES[level], msg };

    if (this._timestamp) {
      entry.time = Date.now();
    }

    if (this._name) {
      entry.name = this._name;
    }

    if (this._context) {
      Object.assign(entry, this._context);
    }

    if (fields) {
      Object.assign(entry, fields);
    }

    this._stream.write(JSON.stringify(entry) + '\n');
  }
}

/** Create a logger instance */
export function createLogger(opts?: LoggerOptions): Logger {
  return new Logger(opts);
}

/** No-op logger — all methods are empty */
export const noopLogger: ILogger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
  enabled() {
    return false;
  },
  child() {
    return noopLogger;
  },
};
