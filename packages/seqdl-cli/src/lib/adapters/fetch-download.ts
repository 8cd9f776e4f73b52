import { open, rename, rm } from "fs/promises";
import { FetchError, isFetchError } from "../errors/fetch-error.js";
import type {
  DownloadReceipt,
  DownloadRequestOptions,
  DownloadService,
} from "../ports/download.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The parts of a file handle the body is written through */
export interface PartFile {
  write(chunk: Uint8Array): Promise<unknown>;
  close(): Promise<void>;
}

export interface FetchDownloadOptions {
  fetchImpl?: typeof fetch;
  openPart?: (path: string) => Promise<PartFile>;
  /** Per-request timeout in milliseconds; 0 disables it */
  timeoutMs?: number;
  userAgent?: string;
}

type AbortCause = "timeout" | "canceled";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;
const DEFAULT_USER_AGENT = "seqdl";
const PART_SUFFIX = ".part";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function filesystemError(path: string, error: unknown): FetchError {
  return new FetchError("filesystem", `Cannot write ${path}: ${messageOf(error)}`, { cause: error });
}

/**
 * Declared body length, when the body arrives as sent. Compressed bodies
 * are decoded by fetch, so their length can't be compared.
 */
function expectedLength(response: Response): number | undefined {
  const encoding = response.headers.get("content-encoding");
  if (encoding && encoding !== "identity") return undefined;

  const header = response.headers.get("content-length");
  if (header === null) return undefined;

  const value = parseInt(header, 10);
  return isNaN(value) ? undefined : value;
}

async function writeBody(
  response: Response,
  path: string,
  openPart: (path: string) => Promise<PartFile>
): Promise<number> {
  let handle: PartFile;
  try {
    handle = await openPart(path);
  } catch (error) {
    throw filesystemError(path, error);
  }

  let bytes = 0;
  let failure: { error: unknown } | undefined;
  try {
    if (response.body) {
      const reader = response.body.getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        const chunk: Uint8Array = value;
        try {
          await handle.write(chunk);
        } catch (error) {
          throw filesystemError(path, error);
        }
        bytes += chunk.byteLength;
      }
    }
  } catch (error) {
    failure = { error };
  }

  try {
    await handle.close();
  } catch (closeError) {
    if (!failure) throw filesystemError(path, closeError);
    const both = new AggregateError(
      [failure.error, closeError],
      `${messageOf(closeError)} (after ${messageOf(failure.error)})`
    );
    throw filesystemError(path, both);
  }

  if (failure) throw failure.error;
  return bytes;
}

function classify(error: unknown, abortCause: AbortCause | undefined, timeoutMs: number): FetchError {
  if (abortCause === "canceled") {
    return new FetchError("canceled", "Download canceled", { cause: error });
  }
  if (abortCause === "timeout") {
    return new FetchError("timeout", `Timed out after ${timeoutMs}ms`, { cause: error });
  }
  if (isFetchError(error)) {
    return error;
  }
  return new FetchError("network", messageOf(error), { cause: error });
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a download service using fetch.
 * Bodies are streamed to `<path>.<n>.part` and renamed into place once
 * complete, so an interrupted transfer never leaves a half-written file under
 * the final name. `n` is unique per call: two downloads to the same path
 * never share a part file.
 */
export function createFetchDownloadService(
  options: FetchDownloadOptions = {}
): DownloadService {
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const openPart: (path: string) => Promise<PartFile> =
    options.openPart ?? ((path) => open(path, "wx"));
  let partCounter = 0;

  return {
    async download(
      url: string,
      outputPath: string,
      request: DownloadRequestOptions = {}
    ): Promise<DownloadReceipt> {
      const { signal } = request;
      if (signal?.aborted) {
        throw new FetchError("canceled", "Download canceled before it started");
      }

      const controller = new AbortController();
      const aborted: { cause?: AbortCause } = {};

      const onCancel = () => {
        aborted.cause ??= "canceled";
        controller.abort();
      };
      signal?.addEventListener("abort", onCancel, { once: true });

      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              aborted.cause ??= "timeout";
              controller.abort();
            }, timeoutMs)
          : undefined;

      partCounter += 1;
      const partPath = `${outputPath}.${process.pid}-${partCounter}${PART_SUFFIX}`;

      try {
        const response = await fetchImpl(url, {
          signal: controller.signal,
          headers: { "user-agent": userAgent },
        });

        if (!response.ok) {
          await response.body?.cancel();
          throw new FetchError(
            "http-status",
            `${response.status} ${response.statusText}`.trim(),
            { status: response.status }
          );
        }

        const bytes = await writeBody(response, partPath, openPart);
        const expected = expectedLength(response);
        if (expected !== undefined && bytes < expected) {
          throw new FetchError(
            "network",
            `Disconnected: ${expected - bytes} bytes remaining`
          );
        }

        try {
          await rename(partPath, outputPath);
        } catch (error) {
          throw filesystemError(outputPath, error);
        }

        return { bytes };
      } catch (error) {
        const failure = classify(error, aborted.cause, timeoutMs);
        try {
          await rm(partPath, { force: true });
        } catch (cleanupError) {
          throw filesystemError(partPath, new AggregateError([failure, cleanupError]));
        }
        throw failure;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onCancel);
      }
    },
  };
}
