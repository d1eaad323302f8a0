/**
 * RbstubError - Error hierarchy for rbstub
 *
 * All errors extend the native JavaScript Error class so they can be thrown,
 * collected and converted into diagnostics uniformly.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation errors, missing stubs (fatal)
 * - FileAccessError: File system access errors (error)
 * - LanguageError: Stub parsing errors (warning by default)
 * - StubSyntaxError: Malformed stub file (error)
 * - VersionParseError: Invalid runtime version string (error)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  scope?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of RbstubError
 */
export interface RbstubErrorJSON {
  code: string;
  severity: 'fatal' | 'error' | 'warning';
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all rbstub errors.
 */
export abstract class RbstubError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'fatal' | 'error' | 'warning';
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): RbstubErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml parsing, invalid fields, stubs not found
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_STUBS_NOT_FOUND
 */
export class ConfigError extends RbstubError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable stub files or directories
 *
 * Severity: error
 * Codes: ERR_FILE_UNREADABLE
 */
export class FileAccessError extends RbstubError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Language error - stub content the toolkit cannot understand
 *
 * Severity: warning unless a subclass says otherwise
 * Codes: ERR_INVALID_PARAM
 */
export class LanguageError extends RbstubError {
  readonly code: string;
  readonly severity: 'fatal' | 'error' | 'warning' = 'warning';

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Malformed stub file. Always carries the line the parser stopped at.
 *
 * Code: ERR_STUB_SYNTAX
 */
export class StubSyntaxError extends LanguageError {
  override readonly severity = 'error' as const;

  constructor(message: string, filePath: string, lineNumber: number, suggestion?: string) {
    super(message, 'ERR_STUB_SYNTAX', { filePath, lineNumber }, suggestion);
  }
}

/**
 * Invalid runtime version string (e.g. "3", "x.y")
 *
 * Code: ERR_VERSION_INVALID
 */
export class VersionParseError extends RbstubError {
  readonly code = 'ERR_VERSION_INVALID';
  readonly severity = 'error' as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'Use a version of the form MAJOR.MINOR, e.g. "3.3"');
  }
}
