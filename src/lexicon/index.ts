export { Lexicon } from "./lexicon.js";
export {
  loadBasicWords,
  parseWordFile,
  readWordFile,
  createSeededLexicon,
} from "./wordlist.js";
