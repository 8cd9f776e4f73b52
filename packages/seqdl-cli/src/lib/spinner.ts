/**
 * Spinner wrapper that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import type { CLIContext } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  text: string;
  isSpinning: boolean;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  text = "";
  isSpinning = false;

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }

  warn(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    // stderr keeps stdout clean for piping the file list
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }

  warn(text?: string): Spinner {
    this.ora.warn(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode. Verbose runs print one
 * line per item instead, so they get the silent spinner too.
 */
export function createSpinner(context: CLIContext, text?: string): Spinner {
  if (context.quiet || context.json || context.verbose) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}

/**
 * Log to stderr unless in JSON or quiet mode.
 * Use this for progress messages that shouldn't pollute JSON output.
 */
export function logProgress(context: CLIContext, message: string): void {
  if (!context.json && !context.quiet) {
    console.error(message);
  }
}
