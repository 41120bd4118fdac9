import type { Lexicon } from "../lexicon/lexicon.js";
import type { CorrectionResult } from "../types.js";
import type { Logger } from "../ui/logger.js";

// --- Pipeline Context ---

export interface PipelineContext {
  // Input
  rawInput: string;
  maxSuggestions: number;

  // Accumulated state
  text: string;
  tokens?: string[];
  results?: CorrectionResult[];

  // Control flow
  skipRemaining?: boolean;
}

// --- Pipeline Step ---

export interface PipelineStep {
  name: string;
  enabled: boolean;
  shouldRun?: (ctx: PipelineContext) => boolean;
  run: (ctx: PipelineContext, deps: PipelineDeps) => void;
}

// --- Pipeline Dependencies ---

export interface PipelineDeps {
  lexicon: Lexicon;
  debugLog: Logger;
}

// --- Pipeline Runner ---

export function runPipeline(
  steps: readonly PipelineStep[],
  ctx: PipelineContext,
  deps: PipelineDeps
): PipelineContext {
  for (const step of steps) {
    if (!step.enabled) {
      deps.debugLog(`[pipeline] Skipping ${step.name} (disabled)`);
      continue;
    }
    if (step.shouldRun && !step.shouldRun(ctx)) {
      deps.debugLog(`[pipeline] Skipping ${step.name} (condition not met)`);
      continue;
    }
    if (ctx.skipRemaining) {
      deps.debugLog(`[pipeline] Skipping ${step.name} (skipRemaining=true)`);
      break;
    }

    deps.debugLog(`[pipeline] Running ${step.name}...`);
    step.run(ctx, deps);
  }
  return ctx;
}

// --- Helper to create enabled step ---

export function createStep(
  name: string,
  run: PipelineStep["run"],
  shouldRun?: (ctx: PipelineContext) => boolean
): PipelineStep {
  const step: PipelineStep = {
    name,
    enabled: true,
    run,
  };
  if (shouldRun) {
    step.shouldRun = shouldRun;
  }
  return step;
}
