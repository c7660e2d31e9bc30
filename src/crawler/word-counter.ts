/**
 * @module crawler/word-counter
 * @fileoverview Word counting for corpus reports.
 *
 * A word is any run of non-whitespace characters. Scripts without spaces
 * between words (Chinese, Japanese) therefore count one word per run; the
 * count is a size indicator, not a linguistic measure.
 *
 * @example
 * ```ts
 * countWords("Widgets are great.");  // => 3
 * countWords("  \n ");               // => 0
 * ```
 */

export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed === "") {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}
