import { test } from "node:test";
import assert from "node:assert/strict";
import { createSeededLexicon, loadBasicWords, parseWordFile } from "./wordlist.js";

test("builtin word list is lowercase and unique", () => {
  const words = loadBasicWords();
  assert.equal(words.length, 101);
  assert.equal(new Set(words).size, words.length);
  assert.ok(words.every((w) => w === w.toLowerCase().trim() && w.length > 0));
  assert.ok(words.includes("hello"));
  assert.ok(words.includes("braille"));
});

test("createSeededLexicon adds extra words after the builtin list", () => {
  const lexicon = createSeededLexicon(["Chord", "hello"]);
  assert.equal(lexicon.size, 102);
  assert.equal(lexicon.contains("chord"), true);
  assert.equal(lexicon.frequencyOf("hello"), 2);
  assert.equal(lexicon.frequencyOf("the"), 1);
});

test("parseWordFile splits on any whitespace", () => {
  assert.deepEqual(parseWordFile("one two\nthree\r\n\tfour\n"), ["one", "two", "three", "four"]);
  assert.deepEqual(parseWordFile(""), []);
});
