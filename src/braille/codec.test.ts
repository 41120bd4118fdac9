import { test } from "node:test";
import assert from "node:assert/strict";
import {
  BRAILLE_KEYS,
  containsChordKeys,
  containsChordTokens,
  decode,
  decodeChordTokens,
  dotsOf,
  encodeLetter,
  isChordToken,
  letterFor,
  patternFromDots,
} from "./codec.js";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz";

test("every letter decodes from its chord in any key order and case", () => {
  for (const letter of ALPHABET) {
    const keys = encodeLetter(letter);
    assert.ok(keys, `no chord for ${letter}`);
    const reversed = [...keys].reverse().join("");
    assert.equal(decode(keys), letter);
    assert.equal(decode(reversed), letter);
    assert.equal(decode(keys.toLowerCase()), letter);
  }
});

test("decode maps D+K (dots 1 and 4) to c", () => {
  assert.equal(decode("DK"), "c");
  assert.equal(decode("kd"), "c");
});

test("repeated keys in one chord count once", () => {
  assert.equal(decode("DDD"), "a");
});

test("unmapped chord decodes to placeholder", () => {
  // dots 3 and 6
  assert.equal(decode("QP"), "?");
  // dot 5 alone
  assert.equal(decode("O"), "?");
});

test("space flushes the chord and is kept", () => {
  assert.equal(decode("DW DK"), "b c");
  assert.equal(decode("DW "), "b ");
  assert.equal(decode(" D"), " a");
});

test("non-chord characters flush and pass through lowercased", () => {
  assert.equal(decode("DW,"), "b,");
  assert.equal(decode("DWH"), "bh");
  assert.equal(decode("Hi"), "hi");
});

test("decode of empty input is empty", () => {
  assert.equal(decode(""), "");
});

test("patternFromDots and dotsOf round-trip canonical order", () => {
  const pattern = patternFromDots([5, 1, 4]);
  assert.equal(pattern, 0b011001);
  assert.deepEqual(dotsOf(pattern), [1, 4, 5]);
  assert.equal(letterFor(pattern), "d");
});

test("patternFromDots ignores out-of-range dots", () => {
  assert.equal(patternFromDots([0, 7, 1, 2.5]), 0b000001);
});

test("key map covers dots 1 through 6", () => {
  assert.deepEqual(
    Object.values(BRAILLE_KEYS).sort((a, b) => a - b),
    [1, 2, 3, 4, 5, 6]
  );
});

test("encodeLetter lists keys in dot order", () => {
  assert.equal(encodeLetter("w"), "WKOP");
  assert.equal(encodeLetter("Y"), "DQKOP");
  assert.equal(encodeLetter("1"), undefined);
});

test("containsChordKeys is case-insensitive", () => {
  assert.equal(containsChordKeys("hello"), true);
  assert.equal(containsChordKeys("the"), false);
  assert.equal(containsChordKeys("DW"), true);
});

test("isChordToken rejects tokens with other letters", () => {
  assert.equal(isChordToken("DW"), true);
  assert.equal(isChordToken("dk."), true);
  assert.equal(isChordToken("hello"), false);
  assert.equal(isChordToken("?!"), false);
  assert.equal(isChordToken(""), false);
});

test("a word spelled only with chord letters is read as a chord", () => {
  // w, o, o, d = dots 2, 5, 5, 1 = h
  assert.equal(isChordToken("wood"), true);
  assert.equal(decodeChordTokens("wood"), "h");
  assert.equal(decodeChordTokens("good wood"), "good h");
});

test("decodeChordTokens leaves plain words alone", () => {
  assert.equal(decodeChordTokens("DW hello"), "b hello");
  assert.equal(decodeChordTokens("helo"), "helo");
  assert.equal(decodeChordTokens("DK,  world"), "c,  world");
  assert.equal(containsChordTokens("the world"), false);
  assert.equal(containsChordTokens("the DK"), true);
});
