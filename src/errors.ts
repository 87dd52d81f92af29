// pattern: Functional Core

export type ResultStoreErrorCode =
  | "result_missing"
  | "result_timeout"
  | "connection_lost"
  | "channel_connection_lost"
  | "schema_mismatch"
  | "key_too_long"
  | "cancelled";

export class ResultStoreError extends Error {
  constructor(
    public code: ResultStoreErrorCode,
    public retryable: boolean = false,
    message: string = "",
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ResultStoreError";
  }
}

export function isResultStoreError(
  error: unknown,
  code?: ResultStoreErrorCode,
): error is ResultStoreError {
  if (!(error instanceof ResultStoreError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function resultMissing(key: string): ResultStoreError {
  return new ResultStoreError("result_missing", true, `result missing: ${key}`);
}

export function resultTimeout(key: string, timeout: number): ResultStoreError {
  return new ResultStoreError(
    "result_timeout",
    true,
    `timed out after ${timeout}ms waiting for result: ${key}`,
  );
}

export function waitCancelled(key: string): ResultStoreError {
  return new ResultStoreError("cancelled", false, `wait cancelled for result: ${key}`);
}

/**
 * A task failure that was stored in place of a result.
 * Raised when the stored payload is an encoded exception.
 */
export class ResultFailure extends Error {
  constructor(
    message: string,
    public excType: string,
    public excMessage: string,
  ) {
    super(message);
    this.name = "ResultFailure";
  }
}
