import chalk from "chalk";
import { outputError } from "../json-output.js";
import { unknownError } from "./catalog.js";
import { type CLIError, isCLIError } from "./types.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Format an error for the terminal, one entry per output line.
 */
export function formatStaticError(error: CLIError, width = Math.min(getTerminalWidth(), 80)): string[] {
  const output: string[] = [""];

  const errorLines = wrapText(error.message, width - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      output.push(`  ${chalk.dim(detail)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    const suggestionLines = wrapText(error.suggestion, width - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0]}`);
    for (let i = 1; i < suggestionLines.length; i++) {
      output.push(`    ${suggestionLines[i]}`);
    }
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];
  if (examples.length === 1) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    output.push("");
    output.push(`  ${chalk.dim("Examples:")}`);
    for (const ex of examples.slice(0, 3)) {
      output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
    }
  }

  output.push("");
  return output;
}

/**
 * Render an error to stderr, as JSON or for humans.
 */
export function renderError(error: CLIError, json: boolean): void {
  if (json) {
    outputError(error);
    return;
  }
  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, json: boolean): void {
  if (isCLIError(error)) {
    renderError(error, json);
    return;
  }
  renderError(unknownError(error), json);
}
