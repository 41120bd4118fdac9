export const DEFAULT_MAX_SUGGESTIONS = 3;

export const TOP_WORDS_LIMIT = 5;

// Matcher scoring
export const MAX_EDIT_DISTANCE = 3;
export const SIMILARITY_WEIGHT = 0.7;
export const FREQUENCY_WEIGHT = 0.3;
export const FREQUENCY_SCALE = 100;

export const UNKNOWN_LETTER = "?";

export const PROMPT = "braille> ";

export const COLOR_CODES = {
  reset: "\u001B[0m",
  input: "\u001B[34m", // blue - raw input echo
  corrected: "\u001B[32m", // green - corrected text
  change: "\u001B[33m", // yellow - word replaced
  alternatives: "\u001B[93m", // bright yellow - other suggestions
  info: "\u001B[36m", // cyan - status for operator
  error: "\u001B[31m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";
