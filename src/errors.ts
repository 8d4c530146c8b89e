// src/errors.ts

/**
 * Error with an HTTP status and a stable machine code.
 * Routes answer `{ error: code }` with `status`.
 */
export class DomainError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string
  ) {
    super(message);
    this.name = "DomainError";
  }
}

/** Chat message was missing or not a string. */
export class InvalidInputError extends DomainError {
  constructor(message = "Message must be a string") {
    super(message, 400, "invalid_message");
    this.name = "InvalidInputError";
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, code = "validation_failed") {
    super(message, 400, code);
    this.name = "ValidationError";
  }
}

export class UsernameTakenError extends DomainError {
  constructor(public readonly username: string) {
    super(`Username '${username}' is already taken.`, 409, "username_taken");
    this.name = "UsernameTakenError";
  }
}

export class NotFoundError extends DomainError {
  constructor(what: string) {
    super(`${what} not found`, 404, `${what}_not_found`);
    this.name = "NotFoundError";
  }
}

export function isDomainError(e: unknown): e is DomainError {
  return e instanceof DomainError;
}

/** Supabase errors are not always Error instances */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (e && typeof e === "object" && "message" in e && typeof e.message === "string") {
    return e.message;
  }
  return String(e);
}
