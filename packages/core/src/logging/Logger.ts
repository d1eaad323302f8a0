/**
 * Logger - Lightweight logging for rbstub
 *
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Structured context, serialized safely (circular references)
 * - Console output goes to stderr so command output on stdout stays parseable
 * - Optional log file (MultiLogger writes to both)
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Loaded stubs', { version: '3.3', files: 42 });
 *
 *   const logger = createLogger('warnings', { logFile: '.rbstub/rbstub.log' });
 */

import { closeSync, mkdirSync, openSync, statSync, writeSync } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@rbstub/types';

export type { Logger, LogLevel };

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type MethodName = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Minimum level required for each method, and the tag it prints
 */
const METHODS: Record<MethodName, { priority: number; tag: string }> = {
  error: { priority: LOG_LEVEL_PRIORITY.errors, tag: 'ERROR' },
  warn: { priority: LOG_LEVEL_PRIORITY.warnings, tag: 'WARN' },
  info: { priority: LOG_LEVEL_PRIORITY.info, tag: 'INFO' },
  debug: { priority: LOG_LEVEL_PRIORITY.debug, tag: 'DEBUG' },
  trace: { priority: LOG_LEVEL_PRIORITY.debug, tag: 'TRACE' },
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Level filtering shared by the concrete loggers.
 * Subclasses only decide where a formatted line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(tag: string, message: string, context?: Record<string, unknown>): void;

  private log(method: MethodName, message: string, context?: Record<string, unknown>): void {
    const { priority, tag } = METHODS[method];
    if (this.priority < priority) return;
    this.write(tag, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

/**
 * Console-based Logger. Every level is written to stderr.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(logLevel: LogLevel = 'info') {
    super(logLevel);
  }

  protected write(tag: string, message: string, context?: Record<string, unknown>): void {
    console.error(formatMessage(`[${tag}] ${message}`, context));
  }
}

/**
 * File-based Logger
 *
 * Lines carry ISO timestamps. The file is truncated on construction and
 * parent directories are created. Throws if the path is a directory.
 * Writes are synchronous, so nothing is lost when the CLI calls process.exit().
 */
export class FileLogger extends LevelLogger {
  private fd: number | null;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // not created yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    this.fd = openSync(resolvedPath, 'w');
  }

  protected write(tag: string, message: string, context?: Record<string, unknown>): void {
    if (this.fd === null) return;
    const timestamp = new Date().toISOString();
    try {
      writeSync(this.fd, formatMessage(`${timestamp} [${tag}] ${message}`, context) + '\n');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[ERROR] Log file write failed: ${reason}`);
    }
  }

  /** Close the file; later messages are dropped. */
  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Delegates to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  close(): void {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        logger.close();
      }
    }
  }
}

/**
 * Create a Logger with the given console level.
 *
 * With logFile, returns a MultiLogger; the file side always records at
 * 'debug' so a run can be inspected afterwards.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/** Logger that drops everything; default for library entry points. */
export const silentLogger: Logger = new ConsoleLogger('silent');
