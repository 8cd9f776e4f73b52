import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";
import { outputSuccess } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# seqdl configuration
# Place at ~/.config/seqdl/config.yaml (user) or /etc/seqdl/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags (and SEQDL_* environment variables)
# 2. User config (~/.config/seqdl/config.yaml)
# 3. System config (/etc/seqdl/config.yaml)
# 4. Built-in defaults

download:
  # Where files are saved (can be overridden with --output)
  outputDir: ./download

  # File name template; {token} is the padded number, {index} its position
  # nameTemplate: "page-{token}.jpg"

  # Downloads in flight at once (0 = strictly sequential)
  concurrency: 1

  # Refuse patterns that expand to more files than this
  maxItems: 100000

network:
  # Per-request timeout (ms)
  timeoutMs: 300000

  # Retries for network errors, timeouts and 5xx responses
  retryAttempts: 2

  # Base delay between retries (exponential backoff applied)
  retryDelayMs: 1000

  # userAgent: "seqdl"

logging:
  # Log level: debug, info, warn, error, silent
  level: warn

  # Output JSON logs
  json: false
`;

/** Rows of `config show`, grouped the way the YAML file is */
const SHOW_SECTIONS: Array<[string, Array<keyof ResolvedConfig>]> = [
  ["download", ["outputDir", "nameTemplate", "concurrency", "maxItems"]],
  ["network", ["timeoutMs", "retryAttempts", "retryDelayMs", "userAgent"]],
  ["logging", ["logLevel", "logJson"]],
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatConfigTable(config: ResolvedConfig): string {
  const table = new CliTable3({
    head: [chalk.cyan("Section"), chalk.cyan("Key"), chalk.cyan("Value")],
  });

  for (const [section, keys] of SHOW_SECTIONS) {
    for (const key of keys) {
      const value = config[key];
      table.push([section, key, value === undefined ? chalk.gray("(from URL)") : String(value)]);
    }
  }

  return table.toString();
}

/**
 * Check one file. Returns false when it exists and is invalid.
 */
function validateFile(path: string): boolean {
  console.log(chalk.cyan(`Checking ${path}...`));

  try {
    loadConfigFile(path);
    console.log(chalk.green(`  ✓ Valid`));
    return true;
  } catch (error) {
    console.error(chalk.red(`  ✗ ${messageOf(error)}`));
    if (isCLIError(error) && error.details) {
      for (const issue of error.details.split("\n")) {
        console.error(chalk.gray(`    ${issue}`));
      }
    }
    return false;
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage seqdl configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/seqdl/config.yaml"
    )
    .option("-f, --force", "Overwrite an existing file")
    .action((options: { global?: boolean; force?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath) && !options.force) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Edit it, or run again with --force to replace it."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${messageOf(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      if (options.config && !existsSync(options.config)) {
        console.error(chalk.red(`File not found: ${options.config}`));
        process.exitCode = 1;
        return;
      }

      const present = (options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH])
        .filter((path) => existsSync(path));

      if (present.length === 0) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'seqdl config init' to create one.`));
        return;
      }

      const invalid = present.filter((path) => !validateFile(path));
      if (invalid.length > 0) {
        process.exitCode = 1;
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .option("--json", "Output as JSON")
    .action((options: { config?: string; json?: boolean }) => {
      let loaded: ReturnType<typeof loadConfig>;
      try {
        loaded = loadConfig({}, options.config);
      } catch (error) {
        renderUnknownError(error, options.json === true);
        process.exitCode = 1;
        return;
      }

      if (options.json) {
        outputSuccess(loaded);
        return;
      }

      const { config: resolved, sources } = loaded;
      console.log(chalk.cyan("Effective configuration"));
      console.log(
        chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`)
      );
      console.log(formatConfigTable(resolved));
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      for (const [label, path] of [
        ["User config:", USER_CONFIG_PATH],
        ["System config:", SYSTEM_CONFIG_PATH],
      ] as const) {
        console.log(chalk.bold(label));
        console.log(`  ${path}`);
        console.log(
          `  ${existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
        );
      }
    });
}
