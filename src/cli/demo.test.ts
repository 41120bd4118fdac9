import { test } from "node:test";
import assert from "node:assert/strict";
import { BrailleAutocorrect } from "../core/autocorrect.js";
import { createSeededLexicon } from "../lexicon/wordlist.js";
import { runDemo } from "./demo.js";

test("demo corrects the sample inputs, learns, and reports stats", () => {
  const lines: string[] = [];
  runDemo(new BrailleAutocorrect(createSeededLexicon()), 3, (line) => {
    lines.push(line.replaceAll(/\u001B\[[0-9;]*m/g, ""));
  });

  assert.ok(lines.includes("Input: 'DK'"));
  assert.ok(lines.includes("Corrected: 'c'"));
  assert.ok(lines.includes("  'helo' -> 'hello'"));
  assert.ok(lines.includes("Corrected: 'b hello'"));
  assert.ok(lines.includes("After learning: 'helo' -> 'hello'"));
  assert.deepEqual(lines.slice(-3), [
    "Total words in dictionary: 101",
    "Learned corrections: 1",
    "Most common words: hello (2), the (1), and (1), for (1), are (1)",
  ]);
});
