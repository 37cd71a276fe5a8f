/**
 * Error types and codes for dialect-forge.
 * Every error raised while building, deriving or publishing a dialect extends DialectForgeError.
 */

/**
 * Base error class for all dialect-forge errors.
 */
export class DialectForgeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DialectForgeError';
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
 * Dialect registry errors (duplicate names, unknown segments, publication).
 */
export class DialectError extends DialectForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DialectError';
  }
}

/**
 * Grammar construction errors (malformed combinators, ambiguous alternatives).
 */
export class GrammarError extends DialectForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GrammarError';
  }
}

/**
 * Keyword classification errors.
 */
export class KeywordError extends DialectForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'KeywordError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends DialectForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends DialectForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Dialect registry errors (D001-D006)
  DUPLICATE_DEFINITION: 'D001',
  UNKNOWN_SEGMENT: 'D002',
  DIALECT_PUBLISHED: 'D003',
  UNKNOWN_DIALECT: 'D004',
  CIRCULAR_DERIVATION: 'D005',
  DIALECT_NOT_PUBLISHED: 'D006',

  // Grammar errors (G001-G003)
  MALFORMED_GRAMMAR: 'G001',
  AMBIGUOUS_ALTERNATIVE: 'G002',
  MAX_DEPTH_EXCEEDED: 'G003',

  // Keyword errors
  INVALID_KEYWORD_CLASSIFICATION: 'K001',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_DEFINITION: 'S002',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Check whether a value is a dialect-forge error carrying the given code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): error is DialectForgeError {
  return error instanceof DialectForgeError && error.code === code;
}
