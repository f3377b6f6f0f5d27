/**
 * Custom Error Types for ecef-sez
 */

export class SezError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SezError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UsageError extends SezError {
  constructor(message: string, details?: unknown) {
    super(message, 'USAGE_ERROR', details);
    this.name = 'UsageError';
  }
}

export class InputError extends SezError {
  constructor(message: string, details?: unknown) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}
