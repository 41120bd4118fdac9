export function tokenizeWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Keep only alphabetic characters (letters in any script).
 */
export function stripNonAlpha(text: string): string {
  return text.replaceAll(/\P{L}/gu, "");
}

/**
 * Edit distance counted in code points, so letters outside the BMP are one
 * character each.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  const matrix: number[][] = [];
  for (let i = 0; i <= left.length; i++) {
    const row = new Array<number>(right.length + 1).fill(0);
    row[0] = i;
    matrix.push(row);
  }
  const firstRow = matrix[0]!;
  for (let j = 0; j <= right.length; j++) {
    firstRow[j] = j;
  }

  for (let i = 1; i <= left.length; i++) {
    const row = matrix[i]!;
    const prev = matrix[i - 1]!;
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      row[j] = Math.min(
        prev[j]! + 1, // deletion
        row[j - 1]! + 1, // insertion
        prev[j - 1]! + cost // substitution
      );
    }
  }
  return matrix[left.length]![right.length]!;
}
