export class ValidationError extends Error {
  readonly httpStatus = 400;
  readonly code: string;

  constructor(code: string) {
    super(code);
    this.name = "ValidationError";
    this.code = code;
  }
}

export class AuthenticationError extends Error {
  readonly httpStatus = 401;
  readonly code: "unauthenticated";

  constructor() {
    super("unauthenticated");
    this.name = "AuthenticationError";
    this.code = "unauthenticated";
  }
}

export type ProviderErrorCode = "exchange_failed" | "verification_failed";

/** The identity provider rejected the exchange or the token did not verify. */
export class ProviderError extends Error {
  readonly httpStatus = 502;
  readonly code: ProviderErrorCode;

  constructor(code: ProviderErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = "ProviderError";
    this.code = code;
  }
}

export type ConflictErrorCode = "email_taken" | "external_subject_taken";

export class ConflictError extends Error {
  readonly httpStatus = 409;
  readonly code: ConflictErrorCode;

  constructor(code: ConflictErrorCode) {
    super(code);
    this.name = "ConflictError";
    this.code = code;
  }
}

export class NotFoundError extends Error {
  readonly httpStatus = 404;
  readonly code: "not_found";

  constructor() {
    super("not_found");
    this.name = "NotFoundError";
    this.code = "not_found";
  }
}

export type ClientFacingError =
  | ValidationError
  | AuthenticationError
  | ProviderError
  | ConflictError
  | NotFoundError;

export function isClientFacingError(error: unknown): error is ClientFacingError {
  return (
    error instanceof ValidationError ||
    error instanceof AuthenticationError ||
    error instanceof ProviderError ||
    error instanceof ConflictError ||
    error instanceof NotFoundError
  );
}
