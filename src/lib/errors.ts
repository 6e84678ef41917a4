export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Rejected request input. Nothing has been written when this is thrown. */
export class ValidationError extends AppError {
  readonly fieldErrors: FieldErrors;

  constructor(message: string, fieldErrors: FieldErrors = {}) {
    super(message, 400);
    this.fieldErrors = fieldErrors;
  }
}

export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}

export const isAppError = (error: unknown): error is AppError =>
  error instanceof AppError;

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "Unexpected error";
