/**
 * Output-related settings shared by the command and its helpers.
 * Built once per invocation from flags and environment, then passed along.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Per-item progress lines, summary report and debug logs */
  verbose: boolean;
}

export interface ContextFlags {
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  verbose: false,
};

function envFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Combine command line flags with SEQDL_* environment overrides.
 */
export function createContext(
  flags: ContextFlags = {},
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  const context: CLIContext = { ...DEFAULT_CONTEXT };

  if (flags.json || envFlag(env.SEQDL_JSON)) {
    context.json = true;
    context.quiet = true; // JSON mode implies quiet
  }

  if (flags.quiet || envFlag(env.SEQDL_QUIET)) {
    context.quiet = true;
  }

  if (flags.verbose || envFlag(env.SEQDL_VERBOSE)) {
    context.verbose = true;
  }

  return context;
}

/**
 * Read an integer in `[min, max]` from the environment, ignoring anything else.
 */
export function envInteger(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
): number | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  return !isNaN(value) && value >= min && value <= max ? value : undefined;
}
