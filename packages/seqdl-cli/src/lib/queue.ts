import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Identifier used in log lines */
  id: string;
  /** Performs the work; `attempt` starts at 1 */
  execute: (attempt: number) => Promise<T>;
}

interface OutcomeBase {
  id: string;
  /** Number of times `execute` was called */
  attempts: number;
  latencyMs: number;
}

export type TaskOutcome<T> =
  | (OutcomeBase & { status: "fulfilled"; value: T })
  | (OutcomeBase & { status: "rejected"; error: unknown });

export interface QueueOptions {
  /** Maximum number of concurrent tasks; 0 runs one at a time */
  concurrency: number;
  /** Number of times to retry a failed task */
  retryAttempts: number;
  /** Base delay between retries (exponential backoff applied) */
  retryDelayMs: number;
  /** Decides whether a failure is worth another attempt */
  shouldRetry?: (error: unknown) => boolean;
  /** Checked before each task is pulled; true stops the run early */
  shouldStop?: () => boolean;
  delay: DelayFn;
  clock: Clock;
  logger: Logger;
}

export interface ProcessingQueue<T> {
  /**
   * Pull tasks from `tasks` lazily and run them. Outcomes come back in the
   * order the tasks were pulled, whatever order they finished in.
   */
  run(
    tasks: Iterable<QueueTask<T>>,
    onSettled?: (outcome: TaskOutcome<T>, position: number) => void
  ): Promise<Array<TaskOutcome<T>>>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded worker queue.
 * Each worker pulls the next task from a shared iterator, so at most
 * `concurrency` tasks are in flight and the source is never materialized.
 */
export function createQueue<T>(options: QueueOptions): ProcessingQueue<T> {
  const { retryAttempts, retryDelayMs, delay, clock, logger } = options;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const shouldStop = options.shouldStop ?? (() => false);
  const workerCount = Math.max(1, options.concurrency);

  async function processTask(task: QueueTask<T>): Promise<TaskOutcome<T>> {
    const startTime = clock.now();

    for (let attempt = 1; ; attempt++) {
      logger.debug("Processing task", { taskId: task.id, attempt });

      try {
        const value = await task.execute(attempt);
        const latencyMs = clock.now() - startTime;
        logger.debug("Task completed", { taskId: task.id, latencyMs });
        return { id: task.id, status: "fulfilled", value, attempts: attempt, latencyMs };
      } catch (error) {
        const errorMessage =
          error instanceof Error ? error.message : String(error);

        if (attempt <= retryAttempts && shouldRetry(error)) {
          const retryDelay = retryDelayMs * Math.pow(2, attempt - 1);
          logger.info("Task failed, scheduling retry", {
            taskId: task.id,
            retryCount: attempt,
            maxRetries: retryAttempts,
            retryDelayMs: retryDelay,
            error: errorMessage,
          });
          await delay(retryDelay);
          continue;
        }

        logger.info("Task failed", {
          taskId: task.id,
          attempts: attempt,
          error: errorMessage,
        });
        return {
          id: task.id,
          status: "rejected",
          error,
          attempts: attempt,
          latencyMs: clock.now() - startTime,
        };
      }
    }
  }

  async function run(
    tasks: Iterable<QueueTask<T>>,
    onSettled?: (outcome: TaskOutcome<T>, position: number) => void
  ): Promise<Array<TaskOutcome<T>>> {
    const iterator = tasks[Symbol.iterator]();
    const outcomes: Array<TaskOutcome<T>> = [];
    let pulled = 0;

    async function worker(): Promise<void> {
      while (!shouldStop()) {
        const next = iterator.next();
        if (next.done) return;

        const position = pulled++;
        const outcome = await processTask(next.value);
        outcomes[position] = outcome;
        onSettled?.(outcome, position);
      }
    }

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return outcomes;
  }

  return { run };
}
