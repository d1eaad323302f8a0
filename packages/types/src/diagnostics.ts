/**
 * Diagnostic Types - shared by the validator, loader and CLI
 */

export type Severity = 'fatal' | 'error' | 'warning' | 'info';

/**
 * Diagnostic entry - unified format for stub problems
 */
export interface Diagnostic {
  code: string;
  severity: Severity;
  message: string;
  file?: string;
  line?: number;
  /** Rule id that produced the diagnostic ('parser' for syntax errors) */
  rule: string;
  /** Qualified scope the finding belongs to, e.g. `Errno::ENOENT` */
  scope?: string;
  timestamp: number;
  suggestion?: string;
}

/**
 * Diagnostic input (without timestamp, which is auto-generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

// === LOG LEVEL ===
/**
 * Log level for controlling verbosity.
 * Levels are ordered by verbosity: silent < errors < warnings < info < debug
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

// === LOGGER INTERFACE ===
/**
 * Logger interface for structured logging.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}
