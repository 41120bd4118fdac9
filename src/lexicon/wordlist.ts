/**
 * Builtin seed vocabulary for a fresh Lexicon.
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { Lexicon } from "./lexicon.js";

const BASIC_WORDS_PATH = fileURLToPath(
  new URL("../../data/basic-words.json", import.meta.url)
);

let basicWords: readonly string[] | undefined;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function loadBasicWords(): readonly string[] {
  if (!basicWords) {
    const parsed: unknown = JSON.parse(fs.readFileSync(BASIC_WORDS_PATH, "utf8"));
    if (!isStringArray(parsed)) {
      throw new Error(`${BASIC_WORDS_PATH}: expected a JSON array of strings`);
    }
    basicWords = parsed;
  }
  return basicWords;
}

/**
 * Split a plain-text word file on whitespace.
 */
export function parseWordFile(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

export function readWordFile(filePath: string): string[] {
  return parseWordFile(fs.readFileSync(filePath, "utf8"));
}

export function createSeededLexicon(extraWords: Iterable<string> = []): Lexicon {
  const lexicon = new Lexicon();
  lexicon.addWords(loadBasicWords());
  lexicon.addWords(extraWords);
  return lexicon;
}
