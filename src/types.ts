export interface Config {
  maxSuggestions: number;
  wordsFile: string | undefined;
  debug: boolean;
  demo: boolean;
}

export interface ParseResult {
  config: Config;
  text: string | undefined;
}

/** Bitmask of raised dots: bit `n - 1` is set when dot `n` is raised. */
export type DotPattern = number;

export type DotNumber = 1 | 2 | 3 | 4 | 5 | 6;

export interface Suggestion {
  word: string;
  score: number;
  distance: number;
}

export interface CorrectionResult {
  original: string;
  suggestions: string[];
  bestMatch: string;
}

export type WordCount = [word: string, count: number];

export interface LexiconStats {
  wordCount: number;
  learnedCount: number;
  topWords: WordCount[];
}

export type Command =
  | { kind: "correct"; text: string }
  | { kind: "learn"; wrong: string; correct: string }
  | { kind: "add"; words: string[] }
  | { kind: "encode"; words: string[] }
  | { kind: "stats" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "invalid"; usage: string };
