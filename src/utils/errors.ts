/**
 * Error types and codes for repoaudit.
 * Every error the engine raises extends AuditError.
 */

/**
 * Base error class for all repoaudit errors.
 */
export class AuditError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuditError';
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
 * The scan root does not exist or is not a directory.
 * Raised before any file is read.
 */
export class InvalidPathError extends AuditError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_PATH, message, details);
    this.name = 'InvalidPathError';
  }
}

/**
 * A rule or plug-in registration that cannot be used:
 * exclude patterns without directory form, empty patterns, identifier collisions.
 */
export class InvalidRuleError extends AuditError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InvalidRuleError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends AuditError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse failures, unreadable files, aborted scans).
 */
export class SystemError extends AuditError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Path errors
  INVALID_PATH: 'P001',

  // Rule and registry errors
  INVALID_RULE: 'R001',
  DUPLICATE_ID: 'R002',
  EMPTY_RULE: 'R003',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // System errors
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',
  SCAN_ABORTED: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable reason from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
