export type ErrorDetails = Record<string, string[] | undefined>;

export class AppError extends Error {
  readonly status: number;
  readonly details?: ErrorDetails;

  constructor(message: string, status = 500, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 400, details);
  }
}

export class AuthError extends AppError {}

export class UnauthenticatedError extends AuthError {
  constructor(message = "Authentication required") {
    super(message, 401);
  }
}

export class ForbiddenError extends AuthError {
  constructor(message = "Access denied") {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

// Feed fetch, parse and shape failures, plus write failures during import.
export class ImportError extends AppError {
  constructor(message: string) {
    super(message, 422);
  }
}

export class InvalidSourceError extends ImportError {}

export class FetchError extends ImportError {}

export class ParseError extends ImportError {}

export class MissingFieldError extends ImportError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing required field in feed: ${field}`);
    this.field = field;
  }
}

export class ImportFailedError extends ImportError {
  constructor(detail: string) {
    super(`Catalog import failed: ${detail}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// SQLSTATE of a pg driver error, if any.
export function databaseErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
