/**
 * Fuzzy word matching against a Lexicon.
 *
 * Exact words and learned fixes short-circuit the search. Everything else is
 * a full scan scored by:
 * - Edit-distance similarity (70%)
 * - Word frequency / 100 (30%)
 */

import {
  FREQUENCY_SCALE,
  FREQUENCY_WEIGHT,
  MAX_EDIT_DISTANCE,
  SIMILARITY_WEIGHT,
} from "../config/constants.js";
import type { Lexicon } from "../lexicon/lexicon.js";
import type { Suggestion } from "../types.js";
import { levenshteinDistance } from "../utils/strings.js";

/**
 * Largest edit distance a candidate may have from a word of this length.
 */
export function maxDistanceFor(length: number): number {
  return Math.min(MAX_EDIT_DISTANCE, Math.floor(length / 2) + 1);
}

export function scoreCandidate(
  word: string,
  candidate: string,
  distance: number,
  frequency: number
): number {
  const longest = Math.max(Array.from(word).length, Array.from(candidate).length);
  const similarity = 1 - distance / longest;
  const frequencyScore = frequency / FREQUENCY_SCALE;
  return similarity * SIMILARITY_WEIGHT + frequencyScore * FREQUENCY_WEIGHT;
}

// Score descending, then distance ascending, then code-point order
function compareSuggestions(a: Suggestion, b: Suggestion): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.word === b.word) return 0;
  return a.word < b.word ? -1 : 1;
}

/**
 * Ranked candidates for a word, best first.
 */
export function rank(
  lexicon: Lexicon,
  word: string,
  maxSuggestions: number
): Suggestion[] {
  const query = word.toLowerCase();

  if (lexicon.contains(query)) {
    return [{ word: query, score: 1, distance: 0 }];
  }

  const learned = lexicon.learnedFixFor(query);
  if (learned !== undefined) {
    return [{ word: learned, score: 1, distance: levenshteinDistance(query, learned) }];
  }

  if (maxSuggestions <= 0) return [];

  // TODO: bucket words by length so the scan can skip lengths outside maxDistance
  const maxDistance = maxDistanceFor(Array.from(query).length);
  const candidates: Suggestion[] = [];

  for (const candidate of lexicon.words()) {
    const distance = levenshteinDistance(query, candidate);
    if (distance > maxDistance) continue;

    const score = scoreCandidate(query, candidate, distance, lexicon.frequencyOf(candidate));
    candidates.push({ word: candidate, score, distance });
  }

  candidates.sort(compareSuggestions);
  return candidates.slice(0, maxSuggestions);
}

/**
 * Suggested spellings for a word, best first. Empty when nothing qualifies.
 */
export function suggest(
  lexicon: Lexicon,
  word: string,
  maxSuggestions = 5
): string[] {
  return rank(lexicon, word, maxSuggestions).map((s) => s.word);
}
