/**
 * Error types shared across the server
 */

export type ErrorCode = 'LOOKUP_FAILED' | 'DATABASE_ERROR' | 'CONFIG_ERROR';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * The employee lookup collaborator could not complete its query.
 * Distinct from a resolution that legitimately found nothing.
 */
export class EmployeeLookupError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LOOKUP_FAILED', options);
    this.name = 'EmployeeLookupError';
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DATABASE_ERROR', options);
    this.name = 'DatabaseError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
