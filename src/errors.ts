/**
 * Error handling for migration operations
 */

/**
 * Specific error codes for migration failures
 */
export type MigrationErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'EMPTY_CONTENT'
  | 'CONTENT_TOO_LARGE'
  | 'VALIDATION_FAILED'
  | 'COMPILATION_FAILED'
  | 'ABORTED'
  | 'WRITE_FAILED'
  | 'CONFIG_INVALID'
  | 'UNKNOWN';

/**
 * Custom error class for migration errors
 */
export class MigrationError extends Error {
  /**
   * Specific error code
   */
  readonly code: MigrationErrorCode;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: MigrationErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MigrationError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MigrationError);
    }
  }

  /**
   * Check if this is a specific error code
   */
  is(code: MigrationErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    switch (this.code) {
      case 'SOURCE_NOT_FOUND':
        return 'No source stylesheets were found for this theme.';
      case 'EMPTY_CONTENT':
        return 'The stylesheet is empty; nothing to migrate.';
      case 'CONTENT_TOO_LARGE':
        return 'The stylesheet exceeds the configured size limit.';
      case 'VALIDATION_FAILED':
        return 'The migrated stylesheet failed syntax validation.';
      case 'COMPILATION_FAILED':
        return 'The migrated stylesheet could not be made to compile. Review the altered lines.';
      case 'ABORTED':
        return 'Compilation check was interrupted; candidate files were cleaned up.';
      case 'WRITE_FAILED':
        return 'Failed to write the migrated stylesheet.';
      case 'CONFIG_INVALID':
        return 'The migrator configuration is invalid.';
      case 'UNKNOWN':
      default:
        return this.message || 'An unknown error occurred during migration.';
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Create a MigrationError from an unknown error
 */
export function createMigrationError(error: unknown): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

    if (code === 'ENOENT') {
      return new MigrationError(error.message, 'SOURCE_NOT_FOUND', { originalCode: code });
    }
    if (code === 'EACCES' || code === 'EPERM' || code === 'ENOSPC' || code === 'EROFS') {
      return new MigrationError(error.message, 'WRITE_FAILED', { originalCode: code });
    }

    return new MigrationError(error.message, 'UNKNOWN', { originalError: error.name });
  }

  if (typeof error === 'string') {
    return new MigrationError(error, 'UNKNOWN');
  }

  return new MigrationError('An unknown error occurred', 'UNKNOWN', {
    originalError: String(error),
  });
}

/**
 * Type guard to check if an error is a MigrationError
 */
export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}

/**
 * Type guard to check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: MigrationErrorCode): boolean {
  return isMigrationError(error) && error.code === code;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
