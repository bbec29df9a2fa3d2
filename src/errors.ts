import type { FormErrors } from "./forms";

/**
 * Raised when submitted form input fails validation.  Carries every
 * message collected, keyed by field name (`__all__` for cross-field
 * problems).
 */
export class ValidationError extends Error {
  readonly errors: FormErrors;

  constructor(errors: FormErrors) {
    super("Submitted data is invalid");
    this.name = "ValidationError";
    this.errors = errors;
  }
}

/**
 * Raised when a listing filter that requires a typed value (a year, an
 * author id, a page number) receives input that cannot be parsed.
 */
export class InvalidFilterValueError extends Error {
  readonly parameter: string;
  readonly value: string;

  constructor(parameter: string, value: string, expected: string) {
    super(`Invalid value for ${parameter}: ${JSON.stringify(value)} (${expected})`);
    this.name = "InvalidFilterValueError";
    this.parameter = parameter;
    this.value = value;
  }
}

export class NotFoundError extends Error {
  constructor(message = "Not found") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class PermissionDeniedError extends Error {
  constructor(message = "You do not have permission to do this") {
    super(message);
    this.name = "PermissionDeniedError";
  }
}

/**
 * Raised when an operation requires a logged-in user and there is none.
 */
export class UnauthenticatedError extends Error {
  constructor(message = "Authentication required") {
    super(message);
    this.name = "UnauthenticatedError";
  }
}
