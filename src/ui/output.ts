import { COLOR_CODES } from "../config/constants.js";
import { correctedText } from "../core/autocorrect.js";
import type { CorrectionResult, LexiconStats } from "../types.js";
import { colorize } from "./logger.js";

export function separator(label = ""): string {
  const line = "─".repeat(10);
  return colorize(label ? `${line} ${label} ${line}` : line, COLOR_CODES.info);
}

/**
 * Lines describing each replaced token and the corrected sentence.
 */
export function formatResults(input: string, results: readonly CorrectionResult[]): string[] {
  const lines = [colorize(`Input: '${input}'`, COLOR_CODES.input)];

  for (const result of results) {
    if (result.suggestions.length === 0 || result.original === result.bestMatch) continue;
    lines.push(colorize(`  '${result.original}' -> '${result.bestMatch}'`, COLOR_CODES.change));
    const others = result.suggestions.slice(1);
    if (others.length > 0) {
      lines.push(colorize(`    Other suggestions: ${others.join(", ")}`, COLOR_CODES.alternatives));
    }
  }

  lines.push(colorize(`Corrected: '${correctedText(results)}'`, COLOR_CODES.corrected));
  return lines;
}

export function formatStats(stats: LexiconStats): string[] {
  const top = stats.topWords.map(([word, count]) => `${word} (${count})`).join(", ");
  return [
    `Total words in dictionary: ${stats.wordCount}`,
    `Learned corrections: ${stats.learnedCount}`,
    `Most common words: ${top || "(none)"}`,
  ];
}
