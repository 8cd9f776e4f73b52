import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

const PATTERN_EXAMPLES = [
  "seqdl 'http://www.example.com/a[1-100].jpg'",
  "seqdl 'http://www.example.com/b[2,4,8,10].jpg'",
  "seqdl 'http://www.example.com/[0001-0025].jpg'",
];

// ============================================================================
// Pattern Errors
// ============================================================================

export function malformedPattern(reason: string, segment?: string): CLIError {
  const message = segment !== undefined
    ? `Malformed pattern: ${reason} ("${segment}")`
    : `Malformed pattern: ${reason}`;
  return new CLIError("PATTERN_MALFORMED", message, {
    suggestion:
      "Put exactly one [...] group in the URL, holding numbers (7) or ranges (1-25) separated by commas",
    examples: PATTERN_EXAMPLES,
  });
}

export function invalidRange(segment: string, start: number, end: number): CLIError {
  return new CLIError(
    "PATTERN_INVALID_RANGE",
    `Invalid range "${segment}": start ${start} is greater than end ${end}`,
    {
      suggestion: "Write ranges in ascending order",
      example: `seqdl 'http://www.example.com/a[${end}-${start}].jpg'`,
    }
  );
}

export function patternTooLarge(count: number, limit: number): CLIError {
  return new CLIError(
    "PATTERN_TOO_LARGE",
    `Pattern expands to ${count} files, more than the limit of ${limit}`,
    {
      suggestion: "Narrow the ranges, or raise the limit with --max-items",
    }
  );
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingArgument(argName: string, examples?: string[]): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `seqdl requires ${argName}`,
    examples: examples?.length ? examples : ["seqdl --help"],
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Output Errors
// ============================================================================

export function outputDirUnavailable(path: string, reason?: string): CLIError {
  return new CLIError("OUTPUT_DIR_UNAVAILABLE", `Can't write to "${path}"`, {
    suggestion: "Check the directory permissions or choose another one with --output",
    details: reason,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}
