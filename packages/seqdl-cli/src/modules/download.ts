import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { mkdirSync } from "fs";
import { join, resolve } from "path";
import { createContext, envInteger, type CLIContext } from "../lib/cli-context.js";
import { CONFIG_LIMITS, loadConfig, type ResolvedConfig } from "../lib/config.js";
import { invalidOption, missingArgument, outputDirUnavailable } from "../lib/errors/catalog.js";
import { renderError, renderUnknownError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";
import {
  outputSuccess,
  toDownloadResultJson,
  type DryRunResultJson,
} from "../lib/json-output.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { FetchProgress, FetchResult, FetchSummary } from "../lib/orchestrator.js";
import { createOutputNamer } from "../lib/output-path.js";
import { materializeUrls } from "../lib/pattern/index.js";
import { preparePattern, runPipeline } from "../lib/pipeline.js";
import type { Clock, DelayFn, DownloadService, SignalHandler } from "../lib/ports/index.js";
import { createSpinner, logProgress, type Spinner } from "../lib/spinner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadCommandOptions {
  verbose?: boolean;
  output?: string;
  name?: string;
  concurrency?: string;
  timeout?: string;
  retry?: string;
  maxItems?: string;
  dryRun?: boolean;
  config?: string;
  json?: boolean;
  quiet?: boolean;
}

export interface DownloaderSettings {
  timeoutMs: number;
  userAgent: string;
}

export interface DownloadCommandDeps {
  createDownloader: (settings: DownloaderSettings) => DownloadService;
  signals: SignalHandler;
  delay: DelayFn;
  clock: Clock;
  env?: NodeJS.ProcessEnv;
  loadConfig?: typeof loadConfig;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const EXIT_CODES = {
  success: 0,
  downloadFailed: 1,
  usage: 2,
  canceled: 130,
} as const;

const USAGE_EXAMPLES = [
  "seqdl 'http://www.example.com/a[1-100].jpg'",
  "seqdl 'http://www.example.com/c[1,2-5,7,10-13,22-25].jpg'",
  "seqdl -o pages -n 'page-{token}.png' 'https://example.com/scan[0001-0025].png'",
];

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function parseIntegerOption(
  name: string,
  raw: string | undefined,
  min: number,
  max?: number
): number | undefined {
  if (raw === undefined) return undefined;

  const value = parseInt(raw, 10);
  if (!/^\d+$/.test(raw.trim()) || isNaN(value) || value < min || (max !== undefined && value > max)) {
    const expected = max === undefined ? `of at least ${min}` : `from ${min} to ${max}`;
    throw invalidOption(name, `expected a whole number ${expected}, got "${raw}"`);
  }
  return value;
}

/**
 * Map command line flags (and their SEQDL_* fallbacks) onto config keys.
 */
export function toConfigOverrides(
  options: DownloadCommandOptions,
  env: NodeJS.ProcessEnv
): Partial<ResolvedConfig> {
  return {
    outputDir: options.output,
    nameTemplate: options.name,
    concurrency:
      parseIntegerOption("concurrency", options.concurrency, 0, CONFIG_LIMITS.concurrency) ??
      envInteger("SEQDL_CONCURRENCY", env, 0, CONFIG_LIMITS.concurrency),
    timeoutMs:
      parseIntegerOption("timeout", options.timeout, 1, CONFIG_LIMITS.timeoutMs) ??
      envInteger("SEQDL_TIMEOUT", env, 1, CONFIG_LIMITS.timeoutMs),
    retryAttempts: parseIntegerOption("retry", options.retry, 0, CONFIG_LIMITS.retryAttempts),
    maxItems: parseIntegerOption("max-items", options.maxItems, 1),
  };
}

export function ensureOutputDir(outputDir: string): string {
  const resolved = resolve(outputDir);
  try {
    mkdirSync(resolved, { recursive: true });
  } catch (error) {
    throw outputDirUnavailable(resolved, error instanceof Error ? error.message : String(error));
  }
  return resolved;
}

export function exitCodeFor(summary: FetchSummary): number {
  if (summary.canceled) return EXIT_CODES.canceled;
  if (summary.failed > 0 || summary.notAttempted > 0) return EXIT_CODES.downloadFailed;
  return EXIT_CODES.success;
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
}

export function formatResultLine(result: FetchResult, progress: FetchProgress): string {
  const counter = chalk.gray(`[${progress.settled}/${progress.total}]`);

  if (result.outcome.status === "success") {
    return `${counter} ${chalk.green("✓")} ${result.url} => ${result.outputPath} ${chalk.gray(
      `(${formatBytes(result.outcome.bytes)})`
    )}`;
  }

  return `${counter} ${chalk.red("✗")} ${result.url} ${chalk.red(result.outcome.reason.message)}`;
}

export function formatFailureTable(summary: FetchSummary): string {
  const table = new CliTable3({
    head: [chalk.cyan("Token"), chalk.cyan("URL"), chalk.cyan("Reason")],
  });

  for (const failure of summary.failures) {
    table.push([failure.token, failure.url, failure.reason.message]);
  }

  return table.toString();
}

export function formatSummaryLine(summary: FetchSummary, outputDir: string): string {
  const parts = [`${summary.succeeded} succeeded`, `${summary.failed} failed`];
  if (summary.notAttempted > 0) parts.push(`${summary.notAttempted} not attempted`);
  const status = summary.canceled ? " (canceled)" : "";
  return `Downloaded to ${outputDir}: ${parts.join(", ")}${status}`;
}

function displaySummary(summary: FetchSummary, outputDir: string, context: CLIContext): void {
  if (context.verbose) {
    console.log(chalk.bold(`\n${formatSummaryLine(summary, outputDir)}`));
  }

  if (summary.failures.length > 0) {
    console.error(chalk.bold(`\nFailed downloads (${summary.failures.length}):`));
    console.error(formatFailureTable(summary));
  }
}

function finishSpinner(spinner: Spinner, summary: FetchSummary): void {
  const counts = `${summary.succeeded}/${summary.total} files`;
  if (summary.canceled) {
    spinner.warn(`Canceled after ${counts}`);
  } else if (summary.failed > 0) {
    spinner.fail(`Downloaded ${counts}, ${summary.failed} failed`);
  } else {
    spinner.succeed(`Downloaded ${counts}`);
  }
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

function createRunLogger(config: ResolvedConfig, context: CLIContext): Logger {
  let level = config.logLevel;
  if (context.json) level = "error";
  else if (context.verbose && level !== "debug") level = "info";

  return createLogger({ level, json: config.logJson, color: !config.logJson });
}

function runDryRun(
  targetUrl: string,
  config: ResolvedConfig,
  context: CLIContext
): number {
  const { target, tokens } = preparePattern(targetUrl, config.maxItems);
  const nameFor = createOutputNamer(target.template, config.nameTemplate);

  const files: DryRunResultJson["files"] = [];
  for (const item of materializeUrls(target.template, tokens)) {
    files.push({ token: item.token, url: item.url, path: join(config.outputDir, nameFor(item)) });
  }

  if (context.json) {
    const data: DryRunResultJson = {
      pattern: { url: targetUrl, template: target.template, total: tokens.count },
      files,
    };
    outputSuccess(data);
  } else {
    for (const file of files) {
      console.log(`${file.url} => ${file.path}`);
    }
    logProgress(context, chalk.gray(`${files.length} files planned, nothing downloaded (--dry-run)`));
  }

  return EXIT_CODES.success;
}

/**
 * Expand the target URL and download every file it names.
 * Returns the process exit code.
 */
export async function runDownload(
  targetUrl: string,
  options: DownloadCommandOptions,
  deps: DownloadCommandDeps
): Promise<number> {
  const env = deps.env ?? process.env;
  const context = createContext(
    { json: options.json, quiet: options.quiet, verbose: options.verbose },
    env
  );

  if (targetUrl.trim() === "") {
    renderError(missingArgument("a target URL", USAGE_EXAMPLES), context.json);
    return EXIT_CODES.usage;
  }

  let config: ResolvedConfig;
  try {
    ({ config } = (deps.loadConfig ?? loadConfig)(toConfigOverrides(options, env), options.config));
  } catch (error) {
    renderUnknownError(error, context.json);
    return EXIT_CODES.usage;
  }

  if (options.dryRun) {
    try {
      return runDryRun(targetUrl, config, context);
    } catch (error) {
      renderUnknownError(error, context.json);
      return EXIT_CODES.usage;
    }
  }

  const logger = createRunLogger(config, context);
  const downloader = deps.createDownloader({
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
  });
  const controller = new AbortController();
  const spinner = createSpinner(context, "Parsing pattern...");

  deps.signals.onInterrupt(() => {
    logProgress(context, chalk.yellow("\nInterrupted, stopping downloads (press Ctrl+C again to exit now)"));
    controller.abort();
  });

  let outputDir = config.outputDir;

  try {
    spinner.start();

    const result = await runPipeline(
      targetUrl,
      {
        outputDir: config.outputDir,
        nameTemplate: config.nameTemplate,
        concurrency: config.concurrency,
        maxItems: config.maxItems,
        retryAttempts: config.retryAttempts,
        retryDelayMs: config.retryDelayMs,
        signal: controller.signal,
        prepareOutput: (dir) => {
          outputDir = ensureOutputDir(dir);
        },
        onStateChange: (state) => {
          if (state.stage === "fetching") {
            spinner.text = `Downloading 0/${state.total}`;
            if (context.verbose) {
              logProgress(context, chalk.cyan(`Downloading ${state.total} files to ${outputDir}`));
            }
          }
        },
        onResult: (item, progress) => {
          spinner.text = `Downloading ${progress.settled}/${progress.total}`;
          if (context.verbose) {
            logProgress(context, formatResultLine(item, progress));
          }
        },
      },
      { downloader, logger, delay: deps.delay, clock: deps.clock }
    );

    if (result.stage === "failed") {
      spinner.stop();
      renderError(result.error, context.json);
      return EXIT_CODES.usage;
    }

    const { summary } = result;
    finishSpinner(spinner, summary);

    if (context.json) {
      outputSuccess(toDownloadResultJson(targetUrl, result.target.template, summary), {
        duration: summary.durationMs,
      });
    } else {
      displaySummary(summary, outputDir, context);
    }

    return exitCodeFor(summary);
  } catch (error) {
    spinner.stop();
    renderUnknownError(error, context.json);
    return isCLIError(error) ? EXIT_CODES.usage : EXIT_CODES.downloadFailed;
  } finally {
    deps.signals.removeAll();
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, deps: DownloadCommandDeps): void {
  program
    .command("get", { isDefault: true })
    .description("Download every file named by a bracketed number range in a URL")
    .argument("<target-url>", "URL with one [...] range, e.g. http://www.example.com/a[1-100].jpg")
    .option("-v, --verbose", "Show each download and a summary report")
    .option("-o, --output <dir>", "Directory to save files in (default: ./download)")
    .option("-n, --name <template>", "File name template using {token} and {index}")
    .option("-c, --concurrency <n>", "Downloads in flight at once; 0 is strictly sequential")
    .option("--timeout <ms>", "Per-request timeout in milliseconds")
    .option("--retry <n>", "Retry attempts for network errors, timeouts and 5xx responses")
    .option("--max-items <n>", "Refuse patterns that expand to more files than this")
    .option("--dry-run", "Print the URL => file plan without downloading")
    .option("--config <path>", "Use this config file instead of the default locations")
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Hide the spinner and progress output")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Range syntax:")}
  ${chalk.yellow("•")} [1-100]             a1.jpg ... a100.jpg
  ${chalk.yellow("•")} [2,4,8,10]          only the listed numbers
  ${chalk.yellow("•")} [1,2-5,7,10-13]     numbers and ranges mixed, in written order
  ${chalk.yellow("•")} [0001-0025]         zero-padded to the width of the first number

${chalk.bold.cyan("Examples:")}
${USAGE_EXAMPLES.map((example) => `  ${example}`).join("\n")}
`
    )
    .action(async (targetUrl: string, options: DownloadCommandOptions) => {
      process.exitCode = await runDownload(targetUrl, options, deps);
    });
}
