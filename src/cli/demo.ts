import type { BrailleAutocorrect } from "../core/autocorrect.js";
import { formatResults, formatStats, separator } from "../ui/output.js";

export const DEMO_INPUTS = [
  "DK", // dots 1,4 = c
  "DW", // dots 1,2 = b
  "helo",
  "wrold",
  "computr",
  "DW hello",
  "the quck brown fox",
];

/**
 * Correct each demo input, teach one correction, then print statistics.
 */
export function runDemo(
  app: BrailleAutocorrect,
  maxSuggestions: number,
  write: (line: string) => void
): void {
  write(separator("Braille Autocorrect Demo"));

  for (const input of DEMO_INPUTS) {
    for (const line of formatResults(input, app.autocorrect(input, maxSuggestions))) {
      write(line);
    }
    write(separator());
  }

  write(separator("Learning"));
  write("Teaching that 'helo' should be 'hello'");
  app.learnCorrection("helo", "hello");
  const [after] = app.autocorrect("helo", maxSuggestions);
  write(`After learning: 'helo' -> '${after?.bestMatch ?? "helo"}'`);

  write(separator("Stats"));
  for (const line of formatStats(app.stats())) {
    write(line);
  }
}
