/**
 * Per-item download failures. These never abort a run; the orchestrator
 * records them and moves on to the next token.
 */

export type FetchErrorKind =
  | "network"
  | "http-status"
  | "timeout"
  | "canceled"
  | "filesystem";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  /** HTTP status code, only set for `http-status` */
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

/** Statuses worth another attempt: request timeout, throttling and server errors */
const RETRYABLE_STATUSES = new Set([408, 425, 429]);

/**
 * Whether a failed download may succeed if attempted again.
 */
export function isRetryableFetchError(error: unknown): boolean {
  if (!isFetchError(error)) return false;

  switch (error.kind) {
    case "network":
    case "timeout":
      return true;
    case "http-status":
      return (
        error.status !== undefined &&
        (error.status >= 500 || RETRYABLE_STATUSES.has(error.status))
      );
    case "canceled":
    case "filesystem":
      return false;
  }
}

/**
 * Normalize anything thrown by a download into a FetchError.
 */
export function toFetchError(error: unknown): FetchError {
  if (isFetchError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError("network", message, { cause: error });
}
