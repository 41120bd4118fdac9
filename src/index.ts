#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { parseConfig } from "./config/parser.js";
import { PROMPT } from "./config/constants.js";
import { closeLogFile, createLoggers, describeError } from "./ui/logger.js";
import { formatResults } from "./ui/output.js";
import { createSeededLexicon, readWordFile } from "./lexicon/index.js";
import { BrailleAutocorrect } from "./core/autocorrect.js";
import { executeCommand, parseCommand } from "./cli/commands.js";
import { runDemo } from "./cli/demo.js";

const write = (line: string): void => {
  output.write(`${line}\n`);
};

async function main(): Promise<void> {
  const { config, text } = parseConfig();
  const loggers = createLoggers(config.debug);

  let extraWords: string[] = [];
  if (config.wordsFile) {
    try {
      extraWords = readWordFile(config.wordsFile);
    } catch (error) {
      loggers.errorLog(`[words] Cannot read ${config.wordsFile}: ${describeError(error)}`);
      await closeLogFile();
      process.exit(1);
    }
  }

  const lexicon = createSeededLexicon(extraWords);
  loggers.debugLog(`[lexicon] ${lexicon.size} words loaded (${extraWords.length} from file)`);

  const app = new BrailleAutocorrect(lexicon, loggers.debugLog);

  if (config.demo) {
    runDemo(app, config.maxSuggestions, write);
    return;
  }

  // Single-text mode: correct once and exit
  if (text !== undefined) {
    for (const line of formatResults(text, app.autocorrect(text, config.maxSuggestions))) {
      write(line);
    }
    return;
  }

  // Interactive mode
  const rl = readline.createInterface({ input, output, prompt: PROMPT });
  loggers.infoLog('Type text to correct, ":help" for commands, ":quit" to exit.');

  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  rl.on("SIGINT", () => {
    loggers.infoLog("\nCaught Ctrl+C. Shutting down...");
    rl.close();
  });

  rl.prompt();
  for await (const line of rl) {
    const outcome = executeCommand(parseCommand(line), app, config.maxSuggestions);
    for (const outLine of outcome.lines) {
      write(outLine);
    }
    if (outcome.quit) break;
    rl.prompt();
  }
  if (!closed) {
    rl.close();
  }
}

try {
  await main();
  await closeLogFile();
} catch (error) {
  console.error("[braille] Fatal error:", error);
  process.exit(1);
}
