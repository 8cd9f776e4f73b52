/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { CLIError } from "./errors/types.js";
import type { FailureReason, FetchSummary } from "./orchestrator.js";
import type { UrlTemplate } from "./pattern/types.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
  meta?: {
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadResultJson {
  pattern: {
    url: string;
    template: UrlTemplate;
    total: number;
  };
  files: Array<{
    token: string;
    url: string;
    path: string;
    status: "downloaded" | "failed";
    bytes?: number;
    attempts: number;
    error?: FailureReason;
  }>;
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    notAttempted: number;
    canceled: boolean;
  };
}

export interface DryRunResultJson {
  pattern: {
    url: string;
    template: UrlTemplate;
    total: number;
  };
  files: Array<{
    token: string;
    url: string;
    path: string;
  }>;
}

/**
 * Shape a fetch summary for JSON output.
 */
export function toDownloadResultJson(
  url: string,
  template: UrlTemplate,
  summary: FetchSummary
): DownloadResultJson {
  return {
    pattern: { url, template, total: summary.total },
    files: summary.results.map((result): DownloadResultJson["files"][number] =>
      result.outcome.status === "success"
        ? {
            token: result.token,
            url: result.url,
            path: result.outputPath,
            status: "downloaded",
            bytes: result.outcome.bytes,
            attempts: result.attempts,
          }
        : {
            token: result.token,
            url: result.url,
            path: result.outputPath,
            status: "failed",
            attempts: result.attempts,
            error: result.outcome.reason,
          }
    ),
    summary: {
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
      canceled: summary.canceled,
    },
  };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: CLIError | Error, meta?: JsonError["meta"]): void {
  const result: JsonError = {
    success: false,
    error: {
      code: error instanceof CLIError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof CLIError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof CLIError && error.details && { details: error.details }),
    },
    ...(meta && { meta }),
  };
  console.error(JSON.stringify(result, null, 2));
}
