import { DuplicateIdentifierError, StoreUnavailableError } from "../shared/errors";

const MONGO_DUPLICATE_KEY = 11000;

const UNAVAILABLE_ERROR_NAMES = new Set([
  "MongoNetworkError",
  "MongoNetworkTimeoutError",
  "MongoServerSelectionError",
  "MongooseServerSelectionError",
  "MongoNotConnectedError",
  "MongoTopologyClosedError",
]);

function hasCode(err: unknown): err is { code: unknown } {
  return typeof err === "object" && err !== null && "code" in err;
}

export function isDuplicateKeyError(err: unknown): boolean {
  return hasCode(err) && err.code === MONGO_DUPLICATE_KEY;
}

export function isStoreUnavailableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (UNAVAILABLE_ERROR_NAMES.has(err.name)) return true;
  // mongoose refuses to queue commands while disconnected (bufferCommands: false)
  return /buffering timed out|client must be connected|not connected/i.test(err.message);
}

/**
 * Maps a driver error to the certificate error taxonomy. Returns null when the
 * error is not a storage condition the caller can act on.
 */
export function classifyStoreError(
  err: unknown,
  certificateId?: string
): DuplicateIdentifierError | StoreUnavailableError | null {
  if (certificateId && isDuplicateKeyError(err)) {
    return new DuplicateIdentifierError(certificateId, { cause: err });
  }
  if (isStoreUnavailableError(err)) {
    return new StoreUnavailableError("certificate store unavailable", { cause: err });
  }
  return null;
}

export function rethrowStoreError(err: unknown, certificateId?: string): never {
  throw classifyStoreError(err, certificateId) ?? err;
}
