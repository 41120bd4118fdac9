/**
 * Six-key Braille chord codec.
 *
 * Chords are typed as runs of the keys D W Q K O P (dots 1-6). A space or any
 * other character ends the chord in progress.
 */

import { UNKNOWN_LETTER } from "../config/constants.js";
import type { DotNumber, DotPattern } from "../types.js";

export const BRAILLE_KEYS: Readonly<Record<string, DotNumber>> = {
  D: 1, W: 2, Q: 3, // left hand
  K: 4, O: 5, P: 6, // right hand
};

const KEY_FOR_DOT: readonly string[] = ["D", "W", "Q", "K", "O", "P"];

// Dots per letter, a-z
const LETTER_DOTS: ReadonlyArray<readonly [string, readonly DotNumber[]]> = [
  ["a", [1]], ["b", [1, 2]], ["c", [1, 4]], ["d", [1, 4, 5]], ["e", [1, 5]],
  ["f", [1, 2, 4]], ["g", [1, 2, 4, 5]], ["h", [1, 2, 5]], ["i", [2, 4]], ["j", [2, 4, 5]],
  ["k", [1, 3]], ["l", [1, 2, 3]], ["m", [1, 3, 4]], ["n", [1, 3, 4, 5]], ["o", [1, 3, 5]],
  ["p", [1, 2, 3, 4]], ["q", [1, 2, 3, 4, 5]], ["r", [1, 2, 3, 5]], ["s", [2, 3, 4]], ["t", [2, 3, 4, 5]],
  ["u", [1, 3, 6]], ["v", [1, 2, 3, 6]], ["w", [2, 4, 5, 6]], ["x", [1, 3, 4, 6]], ["y", [1, 3, 4, 5, 6]],
  ["z", [1, 3, 5, 6]],
];

const ALL_DOTS: readonly DotNumber[] = [1, 2, 3, 4, 5, 6];

const CELL_COUNT = 1 << ALL_DOTS.length;

function isDotNumber(value: number): value is DotNumber {
  return Number.isInteger(value) && value >= 1 && value <= 6;
}

export function patternFromDots(dots: Iterable<number>): DotPattern {
  let mask = 0;
  for (const dot of dots) {
    if (isDotNumber(dot)) mask |= 1 << (dot - 1);
  }
  return mask;
}

export function dotsOf(pattern: DotPattern): DotNumber[] {
  return ALL_DOTS.filter((dot) => (pattern & (1 << (dot - 1))) !== 0);
}

// Indexed by pattern mask; empty slots are unmapped cells
const LETTER_TABLE: readonly (string | undefined)[] = (() => {
  const table = new Array<string | undefined>(CELL_COUNT).fill(undefined);
  for (const [letter, dots] of LETTER_DOTS) {
    table[patternFromDots(dots)] = letter;
  }
  return table;
})();

const PATTERN_FOR_LETTER: ReadonlyMap<string, DotPattern> = new Map(
  LETTER_DOTS.map(([letter, dots]) => [letter, patternFromDots(dots)])
);

export function letterFor(pattern: DotPattern): string {
  return LETTER_TABLE[pattern] ?? UNKNOWN_LETTER;
}

function dotForKey(char: string): DotNumber | undefined {
  return BRAILLE_KEYS[char.toUpperCase()];
}

export function containsChordKeys(text: string): boolean {
  for (const char of text) {
    if (dotForKey(char) !== undefined) return true;
  }
  return false;
}

const LETTER = /\p{L}/u;

/**
 * A chord token has at least one chord key and no other letters.
 */
export function isChordToken(token: string): boolean {
  let hasChord = false;
  for (const char of token) {
    if (dotForKey(char) !== undefined) {
      hasChord = true;
    } else if (LETTER.test(char)) {
      return false;
    }
  }
  return hasChord;
}

export function containsChordTokens(text: string): boolean {
  return text.split(/\s+/).some(isChordToken);
}

/**
 * Decode the chord tokens of mixed input, leaving plain words and the
 * whitespace between tokens untouched.
 */
export function decodeChordTokens(text: string): string {
  return text
    .split(/(\s+)/)
    .map((piece) => (isChordToken(piece) ? decode(piece) : piece))
    .join("");
}

/**
 * Decode chorded key input into plain text.
 * Unmapped chords become `?`; non-chord characters pass through lowercased.
 */
export function decode(rawInput: string): string {
  let result = "";
  let current = 0;

  for (const char of rawInput) {
    const dot = dotForKey(char);
    if (dot !== undefined) {
      current |= 1 << (dot - 1);
      continue;
    }
    if (current !== 0) {
      result += letterFor(current);
      current = 0;
    }
    result += char === " " ? char : char.toLowerCase();
  }

  if (current !== 0) {
    result += letterFor(current);
  }
  return result;
}

/**
 * Chord keys (in dot order) that type a letter.
 */
export function encodeLetter(letter: string): string | undefined {
  const pattern = PATTERN_FOR_LETTER.get(letter.toLowerCase());
  if (pattern === undefined) return undefined;
  return dotsOf(pattern)
    .map((dot) => KEY_FOR_DOT[dot - 1] ?? "")
    .join("");
}
