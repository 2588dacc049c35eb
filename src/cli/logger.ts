import chalk from 'chalk';
import type { RunLogger } from '../domain/ports/RunLogger.js';

export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3,
}

/** Where formatted lines go. Defaults to the console. */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  readonly context?: string;
  readonly colorize?: boolean;
  readonly sink?: LogSink;
}

export const consoleSink: LogSink = {
  out: (line) => {
    console.log(line);
  },
  err: (line) => {
    console.error(line);
  },
};

/**
 * Console implementation of `RunLogger`.
 *
 * `info` prints at `NORMAL`, `debug` only at `DEBUG`. Warnings and errors go
 * to stderr and are hidden in `QUIET` mode.
 */
export class ConsoleLogger implements RunLogger {
  private readonly level: LogLevel;
  private readonly context: string | undefined;
  private readonly colorize: boolean;
  private readonly sink: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.NORMAL;
    this.context = options.context;
    this.colorize = options.colorize ?? true;
    this.sink = options.sink ?? consoleSink;
  }

  /** Logger with the same settings and a different `[context]` prefix. */
  child(context: string): ConsoleLogger {
    return new ConsoleLogger({ level: this.level, context, colorize: this.colorize, sink: this.sink });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.level < LogLevel.DEBUG) return;
    this.sink.out(this.paint(chalk.gray, this.format(message, data)));
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.level < LogLevel.NORMAL) return;
    this.sink.out(this.format(message, this.level >= LogLevel.VERBOSE ? data : undefined));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.level < LogLevel.NORMAL) return;
    this.sink.err(this.paint(chalk.yellow, this.format(message, data)));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.level < LogLevel.NORMAL) return;
    this.sink.err(this.paint(chalk.red, this.format(message, data)));
  }

  private format(message: string, data: Record<string, unknown> | undefined): string {
    const prefix = this.context ? `[${this.context}] ` : '';
    return `${prefix}${message}${formatData(data)}`;
  }

  private paint(style: (text: string) => string, text: string): string {
    return this.colorize ? style(text) : text;
  }
}

export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

/** Render structured data as ` key=value` pairs, quoting values with spaces. */
export function formatData(data: Record<string, unknown> | undefined): string {
  if (!data) return '';
  const pairs = Object.entries(data)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) || value === '' ? JSON.stringify(value) : value;
  if (value instanceof Error) return JSON.stringify(value.message);
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
