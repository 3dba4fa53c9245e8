/**
 * Levelled logger on standard error.
 *
 * stdout belongs to the stdio transport, so every level is routed to stderr.
 * Level names follow the CLI (`DEBUG` ... `FATAL`); `fatal()` logs and then
 * calls the injected exit callback with code 1.
 */

import type { Writable } from 'stream';
import winston from 'winston';

// ─── Levels ─────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const WINSTON_LEVELS = { fatal: 0, error: 1, warn: 2, info: 3, debug: 4 } as const;

type WinstonLevel = keyof typeof WINSTON_LEVELS;

const LEVEL_NAMES: Record<LogLevel, WinstonLevel> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
  FATAL: 'fatal',
};

// ─── Logger ─────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: LogLevel;
  /** Tag prepended to every message as `[prefix]`. */
  prefix?: string;
  /** Called with 1 after a fatal message. Defaults to `process.exit`. */
  exit?: (code: number) => void;
  /** Destination stream; stderr when omitted. */
  stream?: Writable;
  silent?: boolean;
}

export class Logger {
  private readonly backend: winston.Logger;
  private readonly prefix: string;
  private readonly exit: (code: number) => void;

  constructor(options: LoggerOptions = {}) {
    const transport = options.stream
      ? new winston.transports.Stream({ stream: options.stream })
      : new winston.transports.Console({ stderrLevels: Object.keys(WINSTON_LEVELS) });

    this.backend = winston.createLogger({
      levels: WINSTON_LEVELS,
      level: LEVEL_NAMES[options.level ?? 'INFO'],
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(
          ({ timestamp, level, message }) => `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}`,
        ),
      ),
      transports: [transport],
    });
    this.prefix = options.prefix ?? '';
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  fatal(message: string): void {
    this.write('fatal', message);
    this.exit(1);
  }

  private write(level: WinstonLevel, message: string): void {
    this.backend.log(level, this.prefix.length > 0 ? `[${this.prefix}] ${message}` : message);
  }
}
