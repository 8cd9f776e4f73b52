import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/seqdl/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "seqdl",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  outputDir: "./download",
  concurrency: 1,
  maxItems: 100_000,
  timeoutMs: 5 * 60 * 1000,
  retryAttempts: 2,
  retryDelayMs: 1000,
  userAgent: "seqdl",
  logLevel: "warn",
  logJson: false,
} as const;

/** Upper bounds shared by the config file schema and command line flags */
export const CONFIG_LIMITS = {
  concurrency: 32,
  timeoutMs: 3_600_000,
  retryAttempts: 10,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const DownloadSchema = z.object({
  outputDir: z.string().min(1).optional(),
  nameTemplate: z.string().min(1).optional(),
  concurrency: z.number().int().min(0).max(CONFIG_LIMITS.concurrency).optional(),
  maxItems: z.number().int().min(1).optional(),
});

const NetworkSchema = z.object({
  timeoutMs: z.number().int().min(100).max(CONFIG_LIMITS.timeoutMs).optional(),
  retryAttempts: z.number().int().min(0).max(CONFIG_LIMITS.retryAttempts).optional(),
  retryDelayMs: z.number().int().min(0).max(600_000).optional(),
  userAgent: z.string().min(1).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  download: DownloadSchema.optional(),
  network: NetworkSchema.optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  outputDir: string;
  nameTemplate?: string;
  concurrency: number;
  maxItems: number;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  userAgent: string;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a CLIError if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { download, network, logging } = source;

  if (download?.outputDir !== undefined) target.outputDir = download.outputDir;
  if (download?.nameTemplate !== undefined) target.nameTemplate = download.nameTemplate;
  if (download?.concurrency !== undefined) target.concurrency = download.concurrency;
  if (download?.maxItems !== undefined) target.maxItems = download.maxItems;

  if (network?.timeoutMs !== undefined) target.timeoutMs = network.timeoutMs;
  if (network?.retryAttempts !== undefined) target.retryAttempts = network.retryAttempts;
  if (network?.retryDelayMs !== undefined) target.retryDelayMs = network.retryDelayMs;
  if (network?.userAgent !== undefined) target.userAgent = network.userAgent;

  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
}

/**
 * Drop keys whose value is undefined so they don't override lower layers.
 */
function definedEntries(options: Partial<ResolvedConfig>): Partial<ResolvedConfig> {
  const result: Partial<ResolvedConfig> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    outputDir: CONFIG_DEFAULTS.outputDir,
    concurrency: CONFIG_DEFAULTS.concurrency,
    maxItems: CONFIG_DEFAULTS.maxItems,
    timeoutMs: CONFIG_DEFAULTS.timeoutMs,
    retryAttempts: CONFIG_DEFAULTS.retryAttempts,
    retryDelayMs: CONFIG_DEFAULTS.retryDelayMs,
    userAgent: CONFIG_DEFAULTS.userAgent,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, definedEntries(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Optional path to a specific config file (--config)
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  explicitPath?: string
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw invalidConfig(explicitPath, ["file does not exist"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
