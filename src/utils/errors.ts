/**
 * Error types and codes for modkit.
 * Every error thrown by the core extends ModkitError.
 */

/**
 * Base error class for all modkit errors.
 */
export class ModkitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ModkitError';
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
 * Invalid command-line options.
 */
export class ConfigError extends ModkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Module construction faults (empty titles, unknown module types, id clashes).
 * Error codes: M001-M005
 */
export class ModuleError extends ModkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ModuleError';
  }
}

/**
 * File system failures.
 * Error codes: S001-S002
 */
export class SystemError extends ModkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Module errors
  EMPTY_TITLE: 'M001',
  UNKNOWN_MODULE_TYPE: 'M002',
  INCLUDES_ON_NON_ASSEMBLY: 'M003',
  EMPTY_POPULATED_ASSEMBLY: 'M004',
  DUPLICATE_MODULE_ID: 'M005',

  // System errors
  WRITE_FAILED: 'S001',
  READ_FAILED: 'S002',

  // Config errors
  INVALID_OPTIONS: 'C001',

  // File name rules (N001-N006)
  NAME_PREFIX: 'N001',
  NAME_UPPERCASE: 'N002',
  NAME_CHARSET: 'N003',
  NAME_SEPARATORS: 'N004',
  NAME_EXTENSION: 'N005',
  NAME_EMPTY_STEM: 'N006',

  // File content rules (D001-D005)
  CONTENT_TYPE_MISSING: 'D001',
  CONTENT_TYPE_MISMATCH: 'D002',
  ANCHOR_MISSING: 'D003',
  ANCHOR_CONTEXT: 'D004',
  TITLE_MISSING: 'D005',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
