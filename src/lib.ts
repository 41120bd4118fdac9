export {
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
} from "./braille/codec.js";
export {
  Lexicon,
  createSeededLexicon,
  loadBasicWords,
  parseWordFile,
  readWordFile,
} from "./lexicon/index.js";
export { maxDistanceFor, rank, scoreCandidate, suggest } from "./core/matcher.js";
export {
  BrailleAutocorrect,
  autocorrect,
  correctedText,
  type AutocorrectOptions,
} from "./core/autocorrect.js";
export type {
  CorrectionResult,
  DotNumber,
  DotPattern,
  LexiconStats,
  Suggestion,
  WordCount,
} from "./types.js";
