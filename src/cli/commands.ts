/**
 * Interactive prompt commands.
 *
 * Lines starting with ":" are commands; anything else is text to correct.
 */

import { encodeLetter } from "../braille/codec.js";
import type { BrailleAutocorrect } from "../core/autocorrect.js";
import type { Command } from "../types.js";
import { formatResults, formatStats } from "../ui/output.js";
import { tokenizeWords } from "../utils/strings.js";

export const HELP_LINES = [
  "Type text to correct. Chord keys D W Q K O P type Braille dots 1-6.",
  "  :learn <wrong> <correct>  remember a correction",
  "  :add <word...>            add words to the dictionary",
  "  :encode <word...>         show the chords for each letter",
  "  :stats                    dictionary statistics",
  "  :help                     this help",
  "  :quit                     exit",
];

export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (!trimmed.startsWith(":")) {
    return { kind: "correct", text: trimmed };
  }

  const [name = "", ...args] = tokenizeWords(trimmed.slice(1));
  switch (name.toLowerCase()) {
    case "learn": {
      const [wrong, correct] = args;
      if (wrong === undefined || correct === undefined || args.length !== 2) {
        return { kind: "invalid", usage: "Usage: :learn <wrong> <correct>" };
      }
      return { kind: "learn", wrong, correct };
    }
    case "add":
      if (args.length === 0) return { kind: "invalid", usage: "Usage: :add <word...>" };
      return { kind: "add", words: args };
    case "encode":
      if (args.length === 0) return { kind: "invalid", usage: "Usage: :encode <word...>" };
      return { kind: "encode", words: args };
    case "stats":
      return { kind: "stats" };
    case "help":
    case "?":
      return { kind: "help" };
    case "quit":
    case "exit":
    case "q":
      return { kind: "quit" };
    default:
      return { kind: "invalid", usage: `Unknown command ":${name}". Type :help for commands.` };
  }
}

/**
 * One line per letter: `h  DWO`. Letters without a chord show `-`.
 */
export function formatChords(word: string): string[] {
  return Array.from(word, (char) => `${char}  ${encodeLetter(char) ?? "-"}`);
}

export interface CommandOutcome {
  lines: string[];
  quit: boolean;
}

export function executeCommand(
  command: Command,
  app: BrailleAutocorrect,
  maxSuggestions: number
): CommandOutcome {
  switch (command.kind) {
    case "correct":
      if (!command.text) return { lines: [], quit: false };
      return {
        lines: formatResults(command.text, app.autocorrect(command.text, maxSuggestions)),
        quit: false,
      };
    case "learn":
      app.learnCorrection(command.wrong, command.correct);
      return {
        lines: [`Learned: '${command.wrong.toLowerCase()}' -> '${command.correct.toLowerCase()}'`],
        quit: false,
      };
    case "add":
      for (const word of command.words) {
        app.addWord(word);
      }
      return { lines: [`Added ${command.words.length} word(s)`], quit: false };
    case "encode":
      return { lines: command.words.flatMap(formatChords), quit: false };
    case "stats":
      return { lines: formatStats(app.stats()), quit: false };
    case "help":
      return { lines: [...HELP_LINES], quit: false };
    case "quit":
      return { lines: [], quit: true };
    case "invalid":
      return { lines: [command.usage], quit: false };
  }
}
