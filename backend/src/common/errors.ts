/**
 * Application errors
 *
 * AppError carries an HTTP status and a stable code; the global error handler
 * in app.ts turns it into `{ ok: false, error, message }`.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = 'Observation store is not connected') {
    super(503, 'STORE_UNAVAILABLE', message);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
