/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Pattern errors (fatal, raised before any download starts)
  | "PATTERN_MALFORMED"
  | "PATTERN_INVALID_RANGE"
  | "PATTERN_TOO_LARGE"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Output errors
  | "OUTPUT_DIR_UNAVAILABLE"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      examples?: string[];
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/** Codes that abort the pipeline before anything is fetched */
export type PatternErrorCode = Extract<ErrorCode, `PATTERN_${string}`>;

export function isPatternError(
  error: unknown
): error is CLIError & { code: PatternErrorCode } {
  return isCLIError(error) && error.code.startsWith("PATTERN_");
}
