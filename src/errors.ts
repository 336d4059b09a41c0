// src/errors.ts

export class AppError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message?: string,
  ) {
    super(message ?? code);
    this.name = new.target.name;
  }
}

/** Field-level input problems; `fields` maps a dotted path to its messages. */
export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly fields: Record<string, string[]> = {},
  ) {
    super(400, "validation_error", message);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(
    readonly entity: string,
    readonly from: string,
    readonly action: string,
  ) {
    super(400, "invalid_transition", `cannot ${action} ${entity} in status '${from}'`);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message?: string) {
    super(400, code, message);
  }
}

/** A generated identifier kept colliding; the request may be retried as-is. */
export class DuplicateIdentifierError extends AppError {
  readonly retryable = true;

  constructor(readonly constraint: string) {
    super(409, "duplicate_identifier", `could not allocate a unique value for ${constraint}`);
  }
}

export class UnavailableError extends AppError {
  constructor(code: string, message?: string) {
    super(409, code, message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string) {
    super(404, `${entity}_not_found`);
  }
}

export class AuthError extends AppError {
  constructor(code = "unauthorized", message?: string) {
    super(401, code, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message?: string) {
    super(403, "forbidden", message);
  }
}

/**
 * Raised by a Store when an insert or update hits a unique constraint.
 * `constraint` is the constraint name, see src/store/constraints.ts.
 */
export class UniqueViolationError extends Error {
  constructor(readonly constraint: string) {
    super(`unique violation on ${constraint}`);
    this.name = "UniqueViolationError";
  }
}
