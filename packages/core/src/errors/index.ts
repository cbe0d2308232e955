import { ParserErrorKind } from './codes.js';
import type { InvalidPathReason } from './codes.js';

// Re-export for consumers
export { ParserErrorKind } from './codes.js';
export type { InvalidPathReason } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Where an error happened. Every field except the operation is optional.
 */
export interface ParserErrorOptions {
  operation: string;
  filePath?: string;
  language?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
  severity?: ErrorSeverity;
  recoverable?: boolean;
}

function formatMessage(reason: string, options: ParserErrorOptions): string {
  let prefix = options.operation;
  if (options.filePath) prefix += ` ${options.filePath}`;
  if (options.language) prefix += ` (${options.language})`;
  return `${prefix}: ${reason}`;
}

/**
 * Base error class for everything the parsing pipeline raises.
 */
export class ParserError extends Error {
  readonly kind: ParserErrorKind;
  readonly reason: string;
  readonly operation: string;
  readonly filePath?: string;
  readonly language?: string;
  readonly context?: Record<string, unknown>;
  readonly severity: ErrorSeverity;
  readonly recoverable: boolean;

  constructor(kind: ParserErrorKind, reason: string, options: ParserErrorOptions) {
    super(
      formatMessage(reason, options),
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = 'ParserError';
    this.kind = kind;
    this.reason = reason;
    this.operation = options.operation;
    this.filePath = options.filePath;
    this.language = options.language;
    this.context = options.context;
    this.severity = options.severity ?? 'medium';
    this.recoverable = options.recoverable ?? true;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for structured logs and metadata
   */
  toJSON() {
    return {
      error: this.message,
      kind: this.kind,
      reason: this.reason,
      operation: this.operation,
      filePath: this.filePath,
      language: this.language,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  /**
   * Check if this error is recoverable
   */
  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Grammar or parser handle could not be created
 */
export class InitializationError extends ParserError {
  constructor(reason: string, options: ParserErrorOptions) {
    super(ParserErrorKind.INITIALIZATION, reason, { severity: 'critical', recoverable: false, ...options });
    this.name = 'InitializationError';
  }
}

/**
 * Nil receivers, empty content, oversize input and bad configuration
 */
export class ValidationError extends ParserError {
  constructor(reason: string, options: ParserErrorOptions) {
    super(ParserErrorKind.VALIDATION, reason, options);
    this.name = 'ValidationError';
  }
}

/**
 * Path sanitization failure
 */
export class InvalidFilePathError extends ParserError {
  declare readonly reason: InvalidPathReason;

  constructor(reason: InvalidPathReason, options: ParserErrorOptions) {
    super(ParserErrorKind.INVALID_FILE_PATH, reason, { severity: 'high', ...options });
    this.name = 'InvalidFilePathError';
  }
}

/**
 * Grammar failure, pre-parse cancellation or strict timeout
 */
export class ParsingError extends ParserError {
  constructor(reason: string, options: ParserErrorOptions) {
    super(ParserErrorKind.PARSING, reason, options);
    this.name = 'ParsingError';
  }
}

/**
 * No registered language matched
 */
export class UnsupportedLanguageError extends ParserError {
  constructor(reason: string, options: ParserErrorOptions) {
    super(ParserErrorKind.UNSUPPORTED_LANGUAGE, reason, { severity: 'low', ...options });
    this.name = 'UnsupportedLanguageError';
  }
}

/**
 * Cache get/set/invalidate failure. Never fatal to a parse.
 */
export class CacheError extends ParserError {
  constructor(reason: string, options: ParserErrorOptions) {
    super(ParserErrorKind.CACHE, reason, { severity: 'low', ...options });
    this.name = 'CacheError';
  }
}

/**
 * Structural failure during a symbol walk
 */
export class ASTError extends ParserError {
  constructor(reason: string, options: ParserErrorOptions) {
    super(ParserErrorKind.AST, reason, options);
    this.name = 'ASTError';
  }
}

/**
 * An unexpected exception converted to an error value, with the stack captured at the throw site.
 */
export class PanicError extends ParserError {
  readonly panicValue: string;
  readonly panicStack?: string;

  constructor(thrown: unknown, options: ParserErrorOptions) {
    const panicValue = getErrorMessage(thrown);
    super(ParserErrorKind.PANIC_RECOVERED, `panic recovered: ${panicValue}`, {
      severity: 'high',
      ...options,
      cause: thrown,
    });
    this.name = 'PanicError';
    this.panicValue = panicValue;
    this.panicStack = getErrorStack(thrown) ?? this.stack;
  }
}

/**
 * Helper function to wrap unknown errors with an operation tag
 * @param error - Unknown error object to wrap
 * @param operation - The operation that failed
 * @param options - Optional path/language/context
 * @returns ParserError; ParserErrors pass through unchanged
 */
export function wrapError(
  error: unknown,
  operation: string,
  options: Omit<ParserErrorOptions, 'operation' | 'cause'> = {},
): ParserError {
  if (isParserError(error)) {
    return error;
  }

  const wrappedError = new ParserError(ParserErrorKind.PARSING, getErrorMessage(error), {
    ...options,
    operation,
    cause: error,
  });

  // Preserve original stack trace if available
  const stack = getErrorStack(error);
  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is a ParserError
 */
export function isParserError(error: unknown): error is ParserError {
  return error instanceof ParserError;
}

/**
 * Check an unknown error against a kind tag
 */
export function isErrorKind(error: unknown, kind: ParserErrorKind): error is ParserError {
  return isParserError(error) && error.kind === kind;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
