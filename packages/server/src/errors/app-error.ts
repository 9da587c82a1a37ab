/**
 * Base class for every error the service raises on purpose.
 *
 * `statusCode` is the HTTP status the error handler answers with; `code` is a
 * stable machine-readable identifier. Non-operational errors are programming
 * or deployment faults and are logged at error level.
 */
export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message, "VALIDATION_ERROR", 400);
  }
}

/** Lookup by identifier found nothing. */
export class NotFoundError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly identifier: string,
  ) {
    super(`${entity} with id '${identifier}' not found`, "NOT_FOUND", 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, "CONFLICT", 409);
  }
}

/** Wraps a driver failure that is not a constraint violation. */
export class DatabaseError extends AppError {
  constructor(message: string, public readonly originalError?: Error) {
    super(message, "DATABASE_ERROR", 500);
  }
}

export class SchemaValidationError extends AppError {
  constructor(public readonly missing: string[]) {
    super(
      `Schema validation failed, missing tables: ${missing.join(", ")}`,
      "SCHEMA_INVALID",
      500,
      false,
    );
  }
}
