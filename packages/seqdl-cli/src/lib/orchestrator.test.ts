import { describe, it, expect, vi } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createFetchDownloadService } from "./adapters/fetch-download.js";
import { FetchError } from "./errors/fetch-error.js";
import { createNoopLogger } from "./logger.js";
import {
  fetchAll,
  type FetchOrchestratorOptions,
  type FetchProgress,
  type FetchResult,
} from "./orchestrator.js";
import { createOutputNamer } from "./output-path.js";
import { createTokenSequence } from "./pattern/expander.js";
import { materializeUrls } from "./pattern/materializer.js";
import { parseTargetUrl } from "./pattern/parser.js";
import type { DownloadReceipt, DownloadRequestOptions } from "./ports/download.js";

const OUTPUT_DIR = join("/tmp", "seqdl-out");

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function planFor(targetUrl: string, overrides: Partial<FetchOrchestratorOptions> = {}) {
  const { template, expression } = parseTargetUrl(targetUrl);
  const tokens = createTokenSequence(expression);
  const options: FetchOrchestratorOptions = {
    outputDir: OUTPUT_DIR,
    nameFor: createOutputNamer(template),
    total: tokens.count,
    concurrency: 1,
    retryAttempts: 0,
    retryDelayMs: 1000,
    ...overrides,
  };
  return { targets: materializeUrls(template, tokens), options };
}

function createDeps(
  impl: (
    url: string,
    outputPath: string,
    options?: DownloadRequestOptions
  ) => Promise<DownloadReceipt>
) {
  const download = vi.fn(impl);
  const delay = vi.fn(async (_ms: number) => {});
  return {
    download,
    delay,
    deps: {
      downloader: { download },
      logger: createNoopLogger(),
      delay,
      clock: { now: () => 0 },
    },
  };
}

describe("fetchAll", () => {
  it("records a failed item and keeps going", async () => {
    const { download, deps } = createDeps(async (url) => {
      if (url === "http://www.example.com/a2.jpg") {
        throw new FetchError("http-status", "404 Not Found", { status: 404 });
      }
      return { bytes: 512 };
    });
    const { targets, options } = planFor("http://www.example.com/a[1-3].jpg");

    const summary = await fetchAll(targets, options, deps);

    expect(download).toHaveBeenCalledTimes(3);
    expect(summary).toMatchObject({
      total: 3,
      succeeded: 2,
      failed: 1,
      notAttempted: 0,
      canceled: false,
    });
    expect(summary.failures).toEqual([
      {
        token: "2",
        url: "http://www.example.com/a2.jpg",
        reason: { kind: "http-status", message: "404 Not Found", status: 404 },
      },
    ]);
    expect(summary.results.map((r) => r.outcome.status)).toEqual([
      "success",
      "failure",
      "success",
    ]);
  });

  it("saves each item under the output directory", async () => {
    const { download, deps } = createDeps(async () => ({ bytes: 1 }));
    const { targets, options } = planFor("http://www.example.com/[0001-0002].jpg");

    const summary = await fetchAll(targets, options, deps);

    expect(summary.results.map((r) => r.outputPath)).toEqual([
      join(OUTPUT_DIR, "0001.jpg"),
      join(OUTPUT_DIR, "0002.jpg"),
    ]);
    expect(download).toHaveBeenNthCalledWith(
      1,
      "http://www.example.com/0001.jpg",
      join(OUTPUT_DIR, "0001.jpg"),
      { signal: undefined }
    );
  });

  it("reports results in token order regardless of completion order", async () => {
    const { deps } = createDeps(async (url) => {
      // later tokens finish first
      const waits = url.endsWith("1") ? 3 : url.endsWith("2") ? 2 : 0;
      for (let i = 0; i < waits; i++) await tick();
      return { bytes: waits };
    });
    const settled: string[] = [];
    const { targets, options } = planFor("http://example.com/f[1-3]", {
      concurrency: 3,
      onResult: (result) => settled.push(result.token),
    });

    const summary = await fetchAll(targets, options, deps);

    expect(settled).toEqual(["3", "2", "1"]);
    expect(summary.results.map((r) => r.token)).toEqual(["1", "2", "3"]);
    expect(summary.results.map((r) => r.index)).toEqual([0, 1, 2]);
  });

  it("reports running progress after every item", async () => {
    const { deps } = createDeps(async (url) => {
      if (url.endsWith("b2")) throw new FetchError("network", "socket hang up");
      return { bytes: 10 };
    });
    const seen: Array<{ result: FetchResult; progress: FetchProgress }> = [];
    const { targets, options } = planFor("http://example.com/b[1-3]", {
      onResult: (result, progress) => seen.push({ result, progress }),
    });

    await fetchAll(targets, options, deps);

    expect(seen.map((s) => s.progress)).toEqual([
      { settled: 1, total: 3, succeeded: 1, failed: 0 },
      { settled: 2, total: 3, succeeded: 1, failed: 1 },
      { settled: 3, total: 3, succeeded: 2, failed: 1 },
    ]);
  });

  it("retries transient failures with backoff", async () => {
    let calls = 0;
    const { delay, deps } = createDeps(async () => {
      calls++;
      if (calls === 1) throw new FetchError("timeout", "Timed out after 300000 ms");
      return { bytes: 42 };
    });
    const { targets, options } = planFor("http://example.com/[7]", { retryAttempts: 2 });

    const summary = await fetchAll(targets, options, deps);

    expect(summary.results[0]).toMatchObject({
      attempts: 2,
      outcome: { status: "success", bytes: 42 },
    });
    expect(delay).toHaveBeenCalledWith(1000);
  });

  it("does not retry a 404", async () => {
    const { download, deps } = createDeps(async () => {
      throw new FetchError("http-status", "404 Not Found", { status: 404 });
    });
    const { targets, options } = planFor("http://example.com/[7]", { retryAttempts: 2 });

    const summary = await fetchAll(targets, options, deps);

    expect(download).toHaveBeenCalledTimes(1);
    expect(summary.results[0].attempts).toBe(1);
  });

  it("turns unexpected errors into network failures", async () => {
    const { deps } = createDeps(async () => {
      throw new TypeError("fetch failed");
    });
    const { targets, options } = planFor("http://example.com/[7]");

    const summary = await fetchAll(targets, options, deps);

    expect(summary.failures[0].reason).toEqual({ kind: "network", message: "fetch failed" });
  });

  it("downloads a repeated token twice without the copies colliding", async () => {
    const dir = await mkdtemp(join(tmpdir(), "seqdl-orchestrator-"));
    try {
      const pending: Array<{ url: string; body: ReadableStreamDefaultController<Uint8Array> }> = [];
      const fetchImpl = vi.fn(
        async (input: unknown, _init?: RequestInit) =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(body) {
                pending.push({ url: String(input), body });
                if (pending.length < 3) return;
                for (const item of pending) {
                  item.body.enqueue(new TextEncoder().encode(item.url));
                  item.body.close();
                }
              },
            })
          )
      );
      const { targets, options } = planFor("http://example.com/a[1-2,2].jpg", {
        outputDir: dir,
        concurrency: 3,
      });

      const summary = await fetchAll(targets, options, {
        downloader: createFetchDownloadService({ fetchImpl }),
        logger: createNoopLogger(),
        delay: async () => {},
        clock: { now: () => 0 },
      });

      expect(fetchImpl).toHaveBeenCalledTimes(3);
      expect(summary.failures).toEqual([]);
      expect(summary.succeeded).toBe(3);
      expect(summary.results.map((r) => r.outputPath)).toEqual([
        join(dir, "a1.jpg"),
        join(dir, "a2.jpg"),
        join(dir, "a2.jpg"),
      ]);
      expect((await readdir(dir)).sort()).toEqual(["a1.jpg", "a2.jpg"]);
      expect(await readFile(join(dir, "a2.jpg"), "utf-8")).toBe("http://example.com/a2.jpg");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("handles an empty target sequence", async () => {
    const { download, deps } = createDeps(async () => ({ bytes: 0 }));

    const summary = await fetchAll([], { ...planFor("http://e.com/[1]").options, total: 0 }, deps);

    expect(download).not.toHaveBeenCalled();
    expect(summary).toMatchObject({ total: 0, succeeded: 0, failed: 0, results: [], failures: [] });
  });

  describe("cancellation", () => {
    it("marks the remaining items canceled when running concurrently", async () => {
      const controller = new AbortController();
      const { download, deps } = createDeps(async () => {
        controller.abort();
        return { bytes: 5 };
      });
      const { targets, options } = planFor("http://example.com/c[1-3]", {
        concurrency: 1,
        retryAttempts: 2,
        signal: controller.signal,
      });

      const summary = await fetchAll(targets, options, deps);

      expect(download).toHaveBeenCalledTimes(1);
      expect(download.mock.calls[0][2]).toEqual({ signal: controller.signal });
      expect(summary).toMatchObject({
        succeeded: 1,
        failed: 2,
        notAttempted: 0,
        canceled: true,
      });
      expect(summary.failures.map((f) => [f.token, f.reason.kind])).toEqual([
        ["2", "canceled"],
        ["3", "canceled"],
      ]);
    });

    it("aborts in-flight downloads through the signal", async () => {
      const controller = new AbortController();
      const { deps } = createDeps(
        (_url, _path, requestOptions) =>
          new Promise<DownloadReceipt>((_resolve, reject) => {
            requestOptions?.signal?.addEventListener("abort", () =>
              reject(new FetchError("canceled", "Download canceled"))
            );
          })
      );
      const { targets, options } = planFor("http://example.com/d[1-2]", {
        concurrency: 2,
        signal: controller.signal,
      });

      const running = fetchAll(targets, options, deps);
      await tick();
      controller.abort();
      const summary = await running;

      expect(summary.results.map((r) => r.outcome)).toEqual([
        { status: "failure", reason: { kind: "canceled", message: "Download canceled" } },
        { status: "failure", reason: { kind: "canceled", message: "Download canceled" } },
      ]);
    });

    it("stops after the current item in strict sequential mode", async () => {
      const controller = new AbortController();
      const { download, deps } = createDeps(async () => {
        controller.abort();
        return { bytes: 5 };
      });
      const { targets, options } = planFor("http://example.com/s[1-4]", {
        concurrency: 0,
        signal: controller.signal,
      });

      const summary = await fetchAll(targets, options, deps);

      expect(download).toHaveBeenCalledTimes(1);
      expect(download.mock.calls[0][2]).toEqual({ signal: undefined });
      expect(summary).toMatchObject({
        total: 4,
        succeeded: 1,
        failed: 0,
        notAttempted: 3,
        canceled: true,
      });
      expect(summary.results).toHaveLength(1);
    });
  });
});
