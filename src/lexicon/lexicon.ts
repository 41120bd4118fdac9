import { TOP_WORDS_LIMIT } from "../config/constants.js";
import type { LexiconStats, WordCount } from "../types.js";

function normalizeWord(word: string): string {
  return word.toLowerCase().trim();
}

/**
 * Known words with usage counts and user-taught corrections.
 */
export class Lexicon {
  private readonly frequency = new Map<string, number>();
  private readonly learnedFixes = new Map<string, string>();

  get size(): number {
    return this.frequency.size;
  }

  /** Blank words are ignored. Re-adding a word bumps its count. */
  addWord(word: string): void {
    const normalized = normalizeWord(word);
    if (!normalized) return;
    this.frequency.set(normalized, (this.frequency.get(normalized) ?? 0) + 1);
  }

  addWords(words: Iterable<string>): void {
    for (const word of words) {
      this.addWord(word);
    }
  }

  learnCorrection(wrong: string, correct: string): void {
    const correctLower = correct.toLowerCase();
    this.learnedFixes.set(wrong.toLowerCase(), correctLower);
    this.addWord(correctLower);
  }

  contains(word: string): boolean {
    return this.frequency.has(word);
  }

  frequencyOf(word: string): number {
    return this.frequency.get(word) ?? 0;
  }

  learnedFixFor(word: string): string | undefined {
    return this.learnedFixes.get(word);
  }

  /** Known words in insertion order. */
  words(): Iterable<string> {
    return this.frequency.keys();
  }

  stats(): LexiconStats {
    // Array.prototype.sort is stable, so equal counts keep insertion order
    const topWords: WordCount[] = [...this.frequency.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, TOP_WORDS_LIMIT);

    return {
      wordCount: this.frequency.size,
      learnedCount: this.learnedFixes.size,
      topWords,
    };
  }
}
