/**
 * Error taxonomy shared by the bulk coordinator, workflow engine,
 * analytics aggregator and the GraphQL transport.
 *
 * Tools map these to `toolError` responses via `describeError`; partial
 * batch failures are reported inside the operation record instead.
 */

export type GhxErrorCode =
  | "INVALID_REQUEST"
  | "AUTHENTICATION_FAILURE"
  | "REMOTE_UNAVAILABLE"
  | "PARTIAL_FAILURE"
  | "NOT_FOUND"
  | "ACCESS_DENIED";

export class GhxError extends Error {
  readonly code: GhxErrorCode;
  readonly details?: unknown;

  constructor(
    code: GhxErrorCode,
    message: string,
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "GhxError";
    this.code = code;
    this.details = options.details;
  }
}

/** Bad input, raised before any remote call is made. */
export class InvalidRequestError extends GhxError {
  constructor(message: string, details?: unknown) {
    super("INVALID_REQUEST", message, { details });
    this.name = "InvalidRequestError";
  }
}

/** Missing or rejected credentials. Fatal to the whole invocation. */
export class AuthenticationError extends GhxError {
  constructor(message: string) {
    super("AUTHENTICATION_FAILURE", message);
    this.name = "AuthenticationError";
  }
}

export class RemoteUnavailableError extends GhxError {
  constructor(message: string, cause?: unknown) {
    super("REMOTE_UNAVAILABLE", message, { cause });
    this.name = "RemoteUnavailableError";
  }
}

export class NotFoundError extends GhxError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class AccessDeniedError extends GhxError {
  constructor(message: string) {
    super("ACCESS_DENIED", message);
    this.name = "AccessDeniedError";
  }
}

export class PartialFailureError extends GhxError {
  readonly failed: number;
  readonly total: number;

  constructor(failed: number, total: number) {
    super("PARTIAL_FAILURE", `${failed} of ${total} items failed`);
    this.name = "PartialFailureError";
    this.failed = failed;
    this.total = total;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error for a tool response: taxonomy errors carry their
 * code, anything else is reported by message only.
 */
export function describeError(error: unknown): string {
  if (error instanceof GhxError) {
    return `${error.code}: ${error.message}`;
  }
  return errorMessage(error);
}
