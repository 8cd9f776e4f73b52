import { join } from "path";
import {
  FetchError,
  isRetryableFetchError,
  toFetchError,
  type FetchErrorKind,
} from "./errors/fetch-error.js";
import type { Logger } from "./logger.js";
import type { OutputNamer } from "./output-path.js";
import type { MaterializedTarget } from "./pattern/types.js";
import type { Clock } from "./ports/clock.js";
import type { DownloadReceipt, DownloadService } from "./ports/download.js";
import type { DelayFn } from "./ports/timer.js";
import { createQueue, type QueueTask, type TaskOutcome } from "./queue.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FailureReason {
  kind: FetchErrorKind;
  message: string;
  /** HTTP status code for `http-status` failures */
  status?: number;
}

export type FetchOutcome =
  | { status: "success"; bytes: number }
  | { status: "failure"; reason: FailureReason };

export interface FetchResult {
  index: number;
  token: string;
  url: string;
  outputPath: string;
  attempts: number;
  outcome: FetchOutcome;
}

export interface FailedItem {
  token: string;
  url: string;
  reason: FailureReason;
}

export interface FetchSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Items never started because a strict-sequential run was canceled */
  notAttempted: number;
  canceled: boolean;
  durationMs: number;
  /** Ordered by token position, not completion */
  results: FetchResult[];
  failures: FailedItem[];
}

export interface FetchProgress {
  settled: number;
  total: number;
  succeeded: number;
  failed: number;
}

export interface FetchOrchestratorOptions {
  outputDir: string;
  nameFor: OutputNamer;
  /** Number of targets the sequence yields, for progress reporting */
  total: number;
  /**
   * Maximum in-flight downloads. 0 is strict sequential: one at a time,
   * and cancellation stops the run after the current item.
   */
  concurrency: number;
  retryAttempts: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  onResult?: (result: FetchResult, progress: FetchProgress) => void;
}

export interface FetchOrchestratorDeps {
  downloader: DownloadService;
  logger: Logger;
  delay: DelayFn;
  clock: Clock;
}

interface PlannedTarget extends MaterializedTarget {
  outputPath: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toFailureReason(error: unknown): FailureReason {
  const fetchError = toFetchError(error);
  return {
    kind: fetchError.kind,
    message: fetchError.message,
    ...(fetchError.status !== undefined && { status: fetchError.status }),
  };
}

function toFetchResult(
  target: PlannedTarget,
  outcome: TaskOutcome<DownloadReceipt>
): FetchResult {
  const base = {
    index: target.index,
    token: target.token,
    url: target.url,
    outputPath: target.outputPath,
    attempts: outcome.attempts,
  };

  if (outcome.status === "fulfilled") {
    return { ...base, outcome: { status: "success", bytes: outcome.value.bytes } };
  }
  return { ...base, outcome: { status: "failure", reason: toFailureReason(outcome.error) } };
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

/**
 * Download every target, at most `concurrency` at a time.
 *
 * A failed item never stops the run: its reason is recorded and the next
 * target is pulled. The summary lists results in token order.
 */
export async function fetchAll(
  targets: Iterable<MaterializedTarget>,
  options: FetchOrchestratorOptions,
  deps: FetchOrchestratorDeps
): Promise<FetchSummary> {
  const { downloader, logger, delay, clock } = deps;
  const { signal } = options;
  const strictSequential = options.concurrency === 0;
  const startTime = clock.now();

  const planned: PlannedTarget[] = [];
  const progress: FetchProgress = {
    settled: 0,
    total: options.total,
    succeeded: 0,
    failed: 0,
  };

  function* tasks(): Generator<QueueTask<DownloadReceipt>> {
    for (const target of targets) {
      const outputPath = join(options.outputDir, options.nameFor(target));
      planned.push({ ...target, outputPath });
      const itemLogger = logger.child({ token: target.token });

      yield {
        id: target.token,
        execute: async (attempt) => {
          if (signal?.aborted) {
            throw new FetchError("canceled", "Run canceled before this item started");
          }
          itemLogger.debug("Downloading", { url: target.url, outputPath, attempt });
          // Strict sequential runs let the current item finish on cancel
          return downloader.download(target.url, outputPath, {
            signal: strictSequential ? undefined : signal,
          });
        },
      };
    }
  }

  const queue = createQueue<DownloadReceipt>({
    concurrency: options.concurrency,
    retryAttempts: options.retryAttempts,
    retryDelayMs: options.retryDelayMs,
    shouldRetry: (error) => isRetryableFetchError(error) && !signal?.aborted,
    shouldStop: () => strictSequential && signal?.aborted === true,
    delay,
    clock,
    logger,
  });

  const outcomes = await queue.run(tasks(), (outcome, position) => {
    const result = toFetchResult(planned[position], outcome);
    progress.settled++;
    if (result.outcome.status === "success") {
      progress.succeeded++;
    } else {
      progress.failed++;
    }
    options.onResult?.(result, { ...progress });
  });

  const results = outcomes.map((outcome, position) =>
    toFetchResult(planned[position], outcome)
  );

  const failures: FailedItem[] = [];
  for (const result of results) {
    if (result.outcome.status === "failure") {
      failures.push({ token: result.token, url: result.url, reason: result.outcome.reason });
    }
  }

  const summary: FetchSummary = {
    total: options.total,
    succeeded: results.length - failures.length,
    failed: failures.length,
    notAttempted: options.total - results.length,
    canceled: signal?.aborted === true,
    durationMs: clock.now() - startTime,
    results,
    failures,
  };

  logger.debug("Fetch run finished", {
    succeeded: summary.succeeded,
    failed: summary.failed,
    notAttempted: summary.notAttempted,
    durationMs: summary.durationMs,
  });

  return summary;
}
