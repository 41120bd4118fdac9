import { test } from "node:test";
import assert from "node:assert/strict";
import { Lexicon } from "./lexicon.js";

test("addWord normalizes case and surrounding whitespace", () => {
  const lexicon = new Lexicon();
  lexicon.addWord("  Hello ");
  assert.equal(lexicon.contains("hello"), true);
  assert.equal(lexicon.frequencyOf("hello"), 1);
  assert.equal(lexicon.size, 1);
});

test("addWord ignores blank input", () => {
  const lexicon = new Lexicon();
  lexicon.addWord("");
  lexicon.addWord("   ");
  assert.equal(lexicon.size, 0);
  assert.deepEqual(lexicon.stats(), { wordCount: 0, learnedCount: 0, topWords: [] });
});

test("adding a word twice bumps frequency by two without duplicating it", () => {
  const lexicon = new Lexicon();
  lexicon.addWord("word");
  const baseline = lexicon.frequencyOf("word");
  lexicon.addWord("word");
  lexicon.addWord("WORD");
  assert.equal(lexicon.contains("word"), true);
  assert.equal(lexicon.frequencyOf("word"), baseline + 2);
  assert.deepEqual([...lexicon.words()], ["word"]);
});

test("frequencyOf and learnedFixFor report absence", () => {
  const lexicon = new Lexicon();
  assert.equal(lexicon.frequencyOf("missing"), 0);
  assert.equal(lexicon.learnedFixFor("missing"), undefined);
  assert.equal(lexicon.contains("missing"), false);
});

test("learnCorrection stores the fix and adds the corrected word", () => {
  const lexicon = new Lexicon();
  lexicon.learnCorrection("Helo", "HELLO");
  assert.equal(lexicon.learnedFixFor("helo"), "hello");
  assert.equal(lexicon.contains("hello"), true);
  assert.equal(lexicon.frequencyOf("hello"), 1);
  assert.equal(lexicon.contains("helo"), false);
});

test("learnCorrection keeps the most recent fix", () => {
  const lexicon = new Lexicon();
  lexicon.learnCorrection("teh", "ten");
  lexicon.learnCorrection("teh", "the");
  assert.equal(lexicon.learnedFixFor("teh"), "the");
  assert.equal(lexicon.stats().learnedCount, 1);
  assert.equal(lexicon.contains("ten"), true);
});

test("stats lists at most five words by count, ties in insertion order", () => {
  const lexicon = new Lexicon();
  lexicon.addWords(["alpha", "beta", "gamma", "delta", "epsilon", "zeta"]);
  lexicon.addWords(["zeta", "zeta", "gamma"]);

  assert.deepEqual(lexicon.stats(), {
    wordCount: 6,
    learnedCount: 0,
    topWords: [
      ["zeta", 3],
      ["gamma", 2],
      ["alpha", 1],
      ["beta", 1],
      ["delta", 1],
    ],
  });
});
