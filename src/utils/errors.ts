/**
 * Error types and codes for polyglot tree construction.
 * Only contract violations and configuration failures are thrown;
 * problems with an individual interop call become diagnostics instead.
 */

/**
 * Base error class for all polyglot-tree errors.
 */
export class PolyglotError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PolyglotError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A query was made that the current node cannot answer
 * (e.g. asking a plain call for its binding name).
 */
export class InvalidArgumentError extends PolyglotError {
  constructor(message = 'Invalid argument received', details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_ARGUMENT, message, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A grammar for a supported language could not be loaded into the parser.
 * Signals a broken install, never bad input.
 */
export class GrammarError extends PolyglotError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.GRAMMAR_LOAD_FAILED, message, details);
    this.name = 'GrammarError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends PolyglotError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends PolyglotError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  INVALID_ARGUMENT: 'E001',
  GRAMMAR_LOAD_FAILED: 'E002',
  UNSUPPORTED_LANGUAGE: 'E003',

  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
