import chalk from "chalk";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/** Where formatted lines go; info/debug to `out`, warn/error to `err` */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Colourize the level tag in human output */
  color?: boolean;
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLORS: Record<LogEntry["level"], (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * Outputs to stdout (info/debug) or stderr (warn/error).
 * Supports JSON lines for log aggregation systems.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const sink = options.sink ?? consoleSink;

  function shouldLog(level: LogEntry["level"]): boolean {
    return LOG_LEVELS[level] >= minLevel;
  }

  function formatMessage(
    level: LogEntry["level"],
    message: string,
    meta: Record<string, unknown>
  ): string {
    const timestamp = new Date().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        ...meta,
      };
      return JSON.stringify(entry);
    }

    const tag = level.toUpperCase().padEnd(5);
    const prefix = `[${timestamp}] ${options.color ? LEVEL_COLORS[level](tag) : tag}`;
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function log(
    level: LogEntry["level"],
    message: string,
    meta: Record<string, unknown> = {},
    defaultMeta: Record<string, unknown> = {}
  ): void {
    if (!shouldLog(level)) return;

    const formatted = formatMessage(level, message, { ...defaultMeta, ...meta });

    if (level === "warn" || level === "error") {
      sink.err(formatted);
    } else {
      sink.out(formatted);
    }
  }

  function createLoggerInstance(
    defaultMeta: Record<string, unknown> = {}
  ): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) =>
        createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

/**
 * Create a no-op logger that discards all messages.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
