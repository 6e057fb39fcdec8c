/**
 * Error types and codes for dupscope.
 * Every error raised by the tool extends DupscopeError.
 */

/**
 * Base error class for all dupscope errors.
 */
export class DupscopeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DupscopeError';
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
 * Configuration and input errors (config file, root path, CLI values).
 * These are the only errors that abort a run.
 */
export class ConfigError extends DupscopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Per-file or per-category extraction failures.
 * Never thrown across the BlockExtractor boundary; carried as values instead.
 */
export class ExtractionError extends DupscopeError {
  constructor(
    code: ExtractionErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ExtractionError';
  }
}

/**
 * System errors (YAML parsing, file IO outside extraction).
 */
export class SystemError extends DupscopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Extraction (fail soft)
  READ_ERROR: 'X001',
  SYNTAX_ERROR: 'X002',
  UNSUPPORTED_LANGUAGE: 'X003',
  PARSER_ERROR: 'X004',
  QUERY_ERROR: 'X005',

  // Configuration (hard failures)
  CONFIG_LOAD_ERROR: 'C001',
  ROOT_NOT_FOUND: 'C002',
  ROOT_NOT_DIRECTORY: 'C003',
  INVALID_OPTION: 'C004',

  // System
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ExtractionErrorCode =
  | typeof ErrorCodes.READ_ERROR
  | typeof ErrorCodes.SYNTAX_ERROR
  | typeof ErrorCodes.UNSUPPORTED_LANGUAGE
  | typeof ErrorCodes.PARSER_ERROR
  | typeof ErrorCodes.QUERY_ERROR;

/**
 * Get a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
