import { isPatternError, type CLIError } from "./errors/types.js";
import {
  fetchAll,
  type FetchOrchestratorDeps,
  type FetchProgress,
  type FetchResult,
  type FetchSummary,
} from "./orchestrator.js";
import { createOutputNamer } from "./output-path.js";
import {
  createTokenSequence,
  materializeUrls,
  parseTargetUrl,
  type ParsedTarget,
  type TokenSequence,
} from "./pattern/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PipelineState =
  | { stage: "unparsed"; targetUrl: string }
  | { stage: "parsed"; target: ParsedTarget }
  | { stage: "expanding"; target: ParsedTarget }
  | { stage: "fetching"; target: ParsedTarget; total: number }
  | { stage: "done"; target: ParsedTarget; summary: FetchSummary }
  | { stage: "failed"; error: CLIError };

export type PipelineResult = Extract<PipelineState, { stage: "done" | "failed" }>;

export interface PipelineOptions {
  outputDir: string;
  nameTemplate?: string;
  concurrency: number;
  maxItems: number;
  retryAttempts: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  onStateChange?: (state: PipelineState) => void;
  onResult?: (result: FetchResult, progress: FetchProgress) => void;
  /** Runs after expansion succeeds and before the first download */
  prepareOutput?: (outputDir: string) => void;
}

export type PipelineDeps = FetchOrchestratorDeps;

export interface PreparedRun {
  target: ParsedTarget;
  tokens: TokenSequence;
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/**
 * Parse and expand without fetching. Throws the pattern CLIErrors.
 */
export function preparePattern(targetUrl: string, maxItems: number): PreparedRun {
  const target = parseTargetUrl(targetUrl);
  const tokens = createTokenSequence(target.expression, { maxItems });
  return { target, tokens };
}

/**
 * Run the whole pipeline: unparsed → parsed → expanding → fetching → done.
 *
 * Pattern errors end in `failed` before anything is fetched or written.
 * Individual download failures never fail the pipeline; they are part of
 * the `done` summary.
 */
export async function runPipeline(
  targetUrl: string,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { logger } = deps;

  const transition = <S extends PipelineState>(state: S): S => {
    logger.debug("Pipeline state", { stage: state.stage });
    options.onStateChange?.(state);
    return state;
  };

  const fail = (error: CLIError) => transition({ stage: "failed", error });

  transition({ stage: "unparsed", targetUrl });

  let target: ParsedTarget;
  try {
    target = parseTargetUrl(targetUrl);
  } catch (error) {
    if (isPatternError(error)) return fail(error);
    throw error;
  }
  transition({ stage: "parsed", target });

  transition({ stage: "expanding", target });
  let tokens: TokenSequence;
  try {
    tokens = createTokenSequence(target.expression, { maxItems: options.maxItems });
  } catch (error) {
    if (isPatternError(error)) return fail(error);
    throw error;
  }

  const nameFor = createOutputNamer(target.template, options.nameTemplate);
  options.prepareOutput?.(options.outputDir);

  transition({ stage: "fetching", target, total: tokens.count });
  const summary = await fetchAll(
    materializeUrls(target.template, tokens),
    {
      outputDir: options.outputDir,
      nameFor,
      total: tokens.count,
      concurrency: options.concurrency,
      retryAttempts: options.retryAttempts,
      retryDelayMs: options.retryDelayMs,
      signal: options.signal,
      onResult: options.onResult,
    },
    deps
  );

  return transition({ stage: "done", target, summary });
}
