// ─── Certificate error taxonomy ────────────────────────────────────────────
//
// Expected outcomes (an unknown certificate ID) are `null` values, not errors.
// Everything here is an operational failure handed back to the caller as a
// typed result; `status` is the HTTP status the API answers with.

export type CertificateErrorCode =
  | "REFERENCE_NOT_FOUND"
  | "INCOMPLETE_REQUEST"
  | "DUPLICATE_IDENTIFIER"
  | "STORE_UNAVAILABLE"
  | "RENDERING_FAILED"
  | "ISSUANCE_FAILED";

export abstract class CertificateError extends Error {
  abstract readonly code: CertificateErrorCode;
  abstract readonly status: number;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ReferenceKind = "trainee" | "training";

export class ReferenceNotFoundError extends CertificateError {
  readonly code = "REFERENCE_NOT_FOUND";
  readonly status = 404;

  constructor(
    readonly kind: ReferenceKind,
    readonly referenceId: string
  ) {
    super(`${kind} ${referenceId} not found`);
  }
}

/** A detail the request left out and no trainee or training record supplies. */
export class IncompleteRequestError extends CertificateError {
  readonly code = "INCOMPLETE_REQUEST";
  readonly status = 422;

  constructor(readonly field: string) {
    super(`${field} is required`);
  }
}

export class DuplicateIdentifierError extends CertificateError {
  readonly code = "DUPLICATE_IDENTIFIER";
  readonly status = 409;
  override readonly retryable = true;

  constructor(readonly certificateId: string, options?: { cause?: unknown }) {
    super(`certificate ${certificateId} already exists`, options);
  }
}

export class StoreUnavailableError extends CertificateError {
  readonly code = "STORE_UNAVAILABLE";
  readonly status = 503;
  override readonly retryable = true;

  constructor(message = "certificate store unavailable", options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RenderingFailedError extends CertificateError {
  readonly code = "RENDERING_FAILED";
  readonly status = 422;
}

export class IssuanceFailedError extends CertificateError {
  readonly code = "ISSUANCE_FAILED";
  readonly status = 500;
  readonly stage: string | undefined;

  constructor(message: string, options?: { cause?: unknown; stage?: string }) {
    super(message, options);
    this.stage = options?.stage;
  }
}

export function isCertificateError(err: unknown): err is CertificateError {
  return err instanceof CertificateError;
}
