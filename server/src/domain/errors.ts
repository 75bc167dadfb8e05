/**
 * Domain failures. Each carries a `kind` tag; the HTTP error middleware owns the
 * mapping from kind to status code and public error code.
 */

export type DomainErrorKind = "NOT_FOUND" | "ACCESS_DENIED" | "INVALID_REQUEST" | "UNSUPPORTED_STATE";

export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;
}

/** A referenced user, item or booking does not exist. */
export class NotFoundError extends DomainError {
  readonly kind = "NOT_FOUND";
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** The caller is neither owner nor booker where one of them is required. */
export class AccessDeniedError extends DomainError {
  readonly kind = "ACCESS_DENIED";
  constructor(message: string) {
    super(message);
    this.name = "AccessDeniedError";
  }
}

export class InvalidRequestError extends DomainError {
  readonly kind = "INVALID_REQUEST";
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class UnsupportedStateError extends DomainError {
  readonly kind = "UNSUPPORTED_STATE";
  constructor(readonly token: string) {
    super(`Unknown state: ${token}`);
    this.name = "UnsupportedStateError";
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
