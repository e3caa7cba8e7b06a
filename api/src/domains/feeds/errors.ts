/**
 * Feed store error taxonomy
 */

export type FeedStoreErrorCode =
  | "store"
  | "initialization"
  | "unconfigured_bucket"
  | "corrupted_store"
  | "feed_not_found";

export class FeedStoreError extends Error {
  readonly code: FeedStoreErrorCode;

  constructor(message: string, options: { cause?: unknown; code?: FeedStoreErrorCode } = {}) {
    super(message, { cause: options.cause });
    this.name = "FeedStoreError";
    this.code = options.code ?? "store";
  }
}

// Only raised at startup; the store must not be used afterwards
export class InitializationError extends FeedStoreError {
  constructor(cause?: unknown) {
    super("Error initializing feed store", { cause, code: "initialization" });
    this.name = "InitializationError";
  }
}

export class UnconfiguredBucketError extends FeedStoreError {
  constructor(readonly bucket: string) {
    super(`Bucket \`${bucket}\` is unconfigured`, { code: "unconfigured_bucket" });
    this.name = "UnconfiguredBucketError";
  }
}

export class CorruptedStoreError extends FeedStoreError {
  constructor(cause?: unknown) {
    super("Corrupted stored feed list", { cause, code: "corrupted_store" });
    this.name = "CorruptedStoreError";
  }
}

export class FeedNotFoundError extends FeedStoreError {
  constructor(readonly feedId: string) {
    super("Feed does not exist", { code: "feed_not_found" });
    this.name = "FeedNotFoundError";
  }
}

export function errorStatus(err: FeedStoreError): 404 | 500 {
  return err.code === "feed_not_found" ? 404 : 500;
}
