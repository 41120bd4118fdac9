import process from "node:process";
import path from "node:path";
import { parseArgs } from "node:util";
import { DEFAULT_MAX_SUGGESTIONS } from "./constants.js";
import type { ParseResult } from "../types.js";

type Env = Record<string, string | undefined>;

function resolveWordsFile(filePath: string | undefined): string | undefined {
  if (!filePath) {
    return undefined;
  }
  return path.isAbsolute(filePath)
    ? filePath
    : path.resolve(process.cwd(), filePath);
}

export function parsePositiveInt(value: string, defaultValue: number): number {
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

export function parseConfig(
  args: string[] = process.argv.slice(2),
  env: Env = process.env
): ParseResult {
  const {
    values: { text, maxSuggestions, words, debug, demo },
  } = parseArgs({
    args,
    options: {
      text: {
        type: "string",
        short: "t",
      },
      maxSuggestions: {
        type: "string",
        default: env["MAX_SUGGESTIONS"] ?? String(DEFAULT_MAX_SUGGESTIONS),
      },
      words: {
        type: "string",
        default: env["WORDS_FILE"] ?? "",
      },
      debug: {
        type: "boolean",
        default: env["DEBUG"] === "1" || env["DEBUG"] === "true",
      },
      demo: {
        type: "boolean",
        default: false,
      },
    },
    allowPositionals: false,
  });

  return {
    config: {
      maxSuggestions: parsePositiveInt(
        maxSuggestions ?? String(DEFAULT_MAX_SUGGESTIONS),
        DEFAULT_MAX_SUGGESTIONS
      ),
      wordsFile: resolveWordsFile(words),
      debug: debug ?? false,
      demo: demo ?? false,
    },
    text,
  };
}
