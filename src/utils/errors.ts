/**
 * Error types and codes for rect-area.
 * All errors raised by the project extend RectAreaError.
 */

/**
 * Base error class for all rect-area errors.
 */
export class RectAreaError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RectAreaError';
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
 * A dimension was negative. Raised before any arithmetic happens.
 */
export class DimensionError extends RectAreaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DimensionError';
  }
}

/**
 * The product did not fit the fixed-width integer type.
 */
export class OverflowError extends RectAreaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OverflowError';
  }
}

/**
 * Raw operator input that cannot be read as the integer type.
 */
export class InputError extends RectAreaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends RectAreaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, parse errors).
 */
export class SystemError extends RectAreaError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Domain
  INVALID_DIMENSION: 'INVALID_DIMENSION',
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',

  // Input
  INVALID_INPUT: 'INVALID_INPUT',
  INPUT_OUT_OF_RANGE: 'INPUT_OUT_OF_RANGE',
  INPUT_MISSING: 'INPUT_MISSING',

  // Config
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',

  // System
  PARSE_ERROR: 'PARSE_ERROR',
} as const;
