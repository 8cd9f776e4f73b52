import { describe, it, expect, vi } from "vitest";
import { createQueue, type QueueOptions, type QueueTask } from "./queue.js";
import type { Logger } from "./logger.js";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup(overrides: Partial<QueueOptions> = {}) {
  let now = 0;
  const delay = vi.fn(async (_ms: number) => {});
  const logger = createMockLogger();
  const options: QueueOptions = {
    concurrency: 1,
    retryAttempts: 0,
    retryDelayMs: 1000,
    delay,
    clock: { now: () => now },
    logger,
    ...overrides,
  };
  return {
    options,
    delay,
    logger,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("queue", () => {
  it("runs at most `concurrency` tasks at once", async () => {
    const { options } = setup({ concurrency: 2 });
    const queue = createQueue<string>(options);
    let inFlight = 0;
    let peak = 0;

    const tasks: Array<QueueTask<string>> = ["a", "b", "c", "d", "e"].map((id) => ({
      id,
      execute: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
        return id;
      },
    }));

    const outcomes = await queue.run(tasks);

    expect(peak).toBe(2);
    expect(outcomes.map((o) => o.status)).toEqual([
      "fulfilled",
      "fulfilled",
      "fulfilled",
      "fulfilled",
      "fulfilled",
    ]);
  });

  it("treats concurrency 0 as one task at a time", async () => {
    const { options } = setup({ concurrency: 0 });
    const queue = createQueue<number>(options);
    let inFlight = 0;
    let peak = 0;

    await queue.run(
      [1, 2, 3].map((n) => ({
        id: String(n),
        execute: async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await tick();
          inFlight--;
          return n;
        },
      }))
    );

    expect(peak).toBe(1);
  });

  it("returns outcomes in pull order even when later tasks finish first", async () => {
    const { options } = setup({ concurrency: 2 });
    const queue = createQueue<string>(options);
    const slowGate = deferred();
    const settledOrder: string[] = [];

    const outcomes = await queue.run(
      [
        {
          id: "slow",
          execute: async () => {
            await slowGate.promise;
            return "slow";
          },
        },
        { id: "fast", execute: async () => "fast" },
      ],
      (outcome, position) => {
        settledOrder.push(`${outcome.id}@${position}`);
        if (outcome.id === "fast") slowGate.resolve();
      }
    );

    expect(settledOrder).toEqual(["fast@1", "slow@0"]);
    expect(outcomes.map((o) => o.id)).toEqual(["slow", "fast"]);
  });

  it("retries failed tasks with exponential backoff", async () => {
    const { options, delay, logger } = setup({ retryAttempts: 2 });
    const queue = createQueue<string>(options);

    const [outcome] = await queue.run([
      {
        id: "flaky",
        execute: async (attempt) => {
          if (attempt < 3) throw new Error("Fail");
          return "success";
        },
      },
    ]);

    expect(outcome).toMatchObject({ status: "fulfilled", value: "success", attempts: 3 });
    expect(delay.mock.calls).toEqual([[1000], [2000]]);
    expect(logger.info).toHaveBeenCalledWith(
      "Task failed, scheduling retry",
      expect.objectContaining({ taskId: "flaky", retryCount: 1, retryDelayMs: 1000 })
    );
  });

  it("gives up after the last retry", async () => {
    const { options, delay } = setup({ retryAttempts: 2 });
    const queue = createQueue<string>(options);
    const failure = new Error("Always fails");

    const [outcome] = await queue.run([
      {
        id: "broken",
        execute: async () => {
          throw failure;
        },
      },
    ]);

    expect(outcome).toMatchObject({ status: "rejected", error: failure, attempts: 3 });
    expect(delay).toHaveBeenCalledTimes(2);
  });

  it("does not retry errors rejected by shouldRetry", async () => {
    const { options, delay } = setup({ retryAttempts: 3, shouldRetry: () => false });
    const queue = createQueue<string>(options);
    const execute = vi.fn(async () => {
      throw new Error("permanent");
    });

    const [outcome] = await queue.run([{ id: "once", execute }]);

    expect(outcome).toMatchObject({ status: "rejected", attempts: 1 });
    expect(execute).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalled();
  });

  it("stops pulling tasks once shouldStop turns true", async () => {
    let stop = false;
    const { options } = setup({ shouldStop: () => stop });
    const queue = createQueue<string>(options);
    let pulled = 0;

    function* tasks(): Generator<QueueTask<string>> {
      for (const id of ["a", "b", "c"]) {
        pulled++;
        yield { id, execute: async () => id };
      }
    }

    const outcomes = await queue.run(tasks(), () => {
      stop = true;
    });

    expect(outcomes.map((o) => o.id)).toEqual(["a"]);
    expect(pulled).toBe(1);
  });

  it("measures latency with the injected clock", async () => {
    const { options, advance } = setup();
    const queue = createQueue<string>(options);

    const [outcome] = await queue.run([
      {
        id: "timed",
        execute: async () => {
          advance(25);
          return "done";
        },
      },
    ]);

    expect(outcome.latencyMs).toBe(25);
  });
});
