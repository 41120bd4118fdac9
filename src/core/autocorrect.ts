import { containsChordTokens, decodeChordTokens } from "../braille/codec.js";
import { DEFAULT_MAX_SUGGESTIONS } from "../config/constants.js";
import type { Lexicon } from "../lexicon/lexicon.js";
import type { CorrectionResult, LexiconStats, Suggestion } from "../types.js";
import type { Logger } from "../ui/logger.js";
import { stripNonAlpha, tokenizeWords } from "../utils/strings.js";
import { rank, suggest } from "./matcher.js";
import {
  createStep,
  runPipeline,
  type PipelineContext,
  type PipelineDeps,
  type PipelineStep,
} from "./pipeline.js";

// --- Steps ---

export const decodeStep: PipelineStep = createStep(
  "decode",
  (ctx: PipelineContext, deps: PipelineDeps): void => {
    ctx.text = decodeChordTokens(ctx.rawInput);
    deps.debugLog(`[decode] "${ctx.rawInput}" -> "${ctx.text}"`);
  },
  (ctx: PipelineContext): boolean => containsChordTokens(ctx.rawInput)
);

export const tokenizeStep: PipelineStep = createStep(
  "tokenize",
  (ctx: PipelineContext): void => {
    ctx.tokens = tokenizeWords(ctx.text);
    if (ctx.tokens.length === 0) {
      ctx.results = [];
      ctx.skipRemaining = true;
    }
  }
);

export function correctToken(
  token: string,
  maxSuggestions: number,
  deps: PipelineDeps
): CorrectionResult {
  const cleanWord = stripNonAlpha(token);
  if (!cleanWord) {
    return { original: token, suggestions: [token], bestMatch: token };
  }

  const suggestions = suggest(deps.lexicon, cleanWord, maxSuggestions);
  const best = suggestions[0];
  if (best === undefined) {
    deps.debugLog(`  no match: "${cleanWord}"`);
    return { original: token, suggestions: [], bestMatch: token };
  }

  if (best !== cleanWord.toLowerCase()) {
    deps.debugLog(`  fuzzy: "${cleanWord}" -> "${best}" (${suggestions.length} candidates)`);
  }
  return { original: token, suggestions, bestMatch: best };
}

export const correctStep: PipelineStep = createStep(
  "correct",
  (ctx: PipelineContext, deps: PipelineDeps): void => {
    ctx.results = (ctx.tokens ?? []).map((token) =>
      correctToken(token, ctx.maxSuggestions, deps)
    );
  }
);

export const defaultSteps: readonly PipelineStep[] = [
  decodeStep,
  tokenizeStep,
  correctStep,
];

// --- Public API ---

const silent: Logger = () => {};

export interface AutocorrectOptions {
  maxSuggestions?: number;
  debugLog?: Logger;
}

/**
 * Decode chord tokens if present, then correct each whitespace token.
 */
export function autocorrect(
  lexicon: Lexicon,
  text: string,
  options: AutocorrectOptions = {}
): CorrectionResult[] {
  const { maxSuggestions = DEFAULT_MAX_SUGGESTIONS, debugLog = silent } = options;
  const ctx: PipelineContext = { rawInput: text, text, maxSuggestions };
  runPipeline(defaultSteps, ctx, { lexicon, debugLog });
  return ctx.results ?? [];
}

/**
 * Join the chosen word for each token; tokens without suggestions keep their
 * original spelling.
 */
export function correctedText(results: readonly CorrectionResult[]): string {
  return results
    .map((r) => (r.suggestions.length > 0 ? r.bestMatch : r.original))
    .join(" ");
}

/**
 * Lexicon-owning facade over the correction pipeline.
 */
export class BrailleAutocorrect {
  readonly lexicon: Lexicon;
  private readonly debugLog: Logger;

  constructor(lexicon: Lexicon, debugLog: Logger = silent) {
    this.lexicon = lexicon;
    this.debugLog = debugLog;
  }

  autocorrect(text: string, maxSuggestions = DEFAULT_MAX_SUGGESTIONS): CorrectionResult[] {
    return autocorrect(this.lexicon, text, { maxSuggestions, debugLog: this.debugLog });
  }

  suggest(word: string, maxSuggestions = 5): string[] {
    return suggest(this.lexicon, word, maxSuggestions);
  }

  rank(word: string, maxSuggestions = 5): Suggestion[] {
    return rank(this.lexicon, word, maxSuggestions);
  }

  addWord(word: string): void {
    this.lexicon.addWord(word);
  }

  learnCorrection(wrong: string, correct: string): void {
    this.lexicon.learnCorrection(wrong, correct);
  }

  stats(): LexiconStats {
    return this.lexicon.stats();
  }
}
