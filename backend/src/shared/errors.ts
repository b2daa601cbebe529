/**
 * shared/errors.ts — Typed application errors
 *
 * Every error the HTTP layer is expected to translate carries its own
 * status and machine-readable code; anything else is a 500.
 */

export class AppError extends Error {
  code: string;
  status: number;
  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Operation not found') {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  details: string[];
  constructor(details: string[]) {
    super('Validation failed', 'VALIDATION_FAILED', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
