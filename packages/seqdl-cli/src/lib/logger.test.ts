import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, createNoopLogger, type LogSink } from "./logger.js";

function createSink(): LogSink & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return {
    outLines,
    errLines,
    out: (line) => outLines.push(line),
    err: (line) => errLines.push(line),
  };
}

const TIMESTAMP = "\\[\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}\\.\\d{3}Z\\]";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("level filtering", () => {
    it("logs debug when level is debug", () => {
      const sink = createSink();
      createLogger({ level: "debug", json: false, sink }).debug("test message");
      expect(sink.outLines).toHaveLength(1);
    });

    it("does not log info when level is warn", () => {
      const sink = createSink();
      const logger = createLogger({ level: "warn", json: false, sink });
      logger.debug("hidden");
      logger.info("hidden");
      expect(sink.outLines).toEqual([]);
    });

    it("does not log warn when level is error", () => {
      const sink = createSink();
      createLogger({ level: "error", json: false, sink }).warn("hidden");
      expect(sink.errLines).toEqual([]);
    });

    it("logs nothing when silent", () => {
      const sink = createSink();
      const logger = createLogger({ level: "silent", json: false, sink });
      logger.error("hidden");
      logger.warn("hidden");
      expect(sink.errLines).toEqual([]);
      expect(sink.outLines).toEqual([]);
    });
  });

  describe("output routing", () => {
    it("sends debug and info to out, warn and error to err", () => {
      const sink = createSink();
      const logger = createLogger({ level: "debug", json: false, sink });

      logger.debug("d");
      logger.info("i");
      logger.warn("w");
      logger.error("e");

      expect(sink.outLines).toHaveLength(2);
      expect(sink.errLines).toHaveLength(2);
    });

    it("defaults to the console", () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createLogger({ level: "info", json: false });

      logger.info("to stdout");
      logger.error("to stderr");

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("formatting", () => {
    it("formats human lines with timestamp, padded level and metadata", () => {
      const sink = createSink();
      createLogger({ level: "info", json: false, sink }).info("Downloaded", { token: "07" });

      expect(sink.outLines[0]).toMatch(new RegExp(`^${TIMESTAMP} INFO  Downloaded \\{"token":"07"\\}$`));
    });

    it("omits empty metadata", () => {
      const sink = createSink();
      createLogger({ level: "info", json: false, sink }).warn("Careful");

      expect(sink.errLines[0]).toMatch(new RegExp(`^${TIMESTAMP} WARN  Careful$`));
    });

    it("writes one JSON object per line in json mode", () => {
      const sink = createSink();
      createLogger({ level: "info", json: true, sink }).error("Task failed", { taskId: "3" });

      const entry: unknown = JSON.parse(sink.errLines[0]);
      expect(entry).toMatchObject({ level: "error", message: "Task failed", taskId: "3" });
      expect(entry).toHaveProperty("timestamp");
    });
  });

  describe("child", () => {
    it("merges default metadata into every entry", () => {
      const sink = createSink();
      const child = createLogger({ level: "info", json: true, sink }).child({ token: "5" });

      child.info("Downloading", { attempt: 1 });

      expect(JSON.parse(sink.outLines[0])).toMatchObject({ token: "5", attempt: 1 });
    });

    it("lets call metadata win over defaults", () => {
      const sink = createSink();
      const child = createLogger({ level: "info", json: true, sink }).child({ token: "5" });

      child.info("Override", { token: "6" });

      expect(JSON.parse(sink.outLines[0])).toMatchObject({ token: "6" });
    });
  });

  describe("createNoopLogger", () => {
    it("discards everything, children included", () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createNoopLogger();

      logger.info("nothing");
      logger.child({ a: 1 }).error("nothing");

      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
