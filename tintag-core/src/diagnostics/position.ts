/**
 * Helpers for human-readable diagnostics: where in the markup something
 * happened, and how to say "the 3rd argument".
 *
 * @module diagnostics/position
 */

import { InternalError } from '../errors';

/**
 * Describe an index in a (possibly multi-line) string.
 *
 * Single-line text gets the bare 0-based index, since `1:5` reads worse than
 * `5` there. Multi-line text gets `line:column`, both 1-indexed.
 *
 * @returns undefined for an empty string
 */
export function position(text: string, index: number): string | undefined {
  if (!text) return undefined;

  if (!Number.isInteger(index) || index < 0 || index >= text.length) {
    throw new InternalError(`Out-of-range index ${index} passed to position()!`);
  }

  const lines = text.split('\n');
  if (lines.length === 1) return String(index);

  let lineStart = 0;
  for (let n = 0; n < lines.length; n++) {
    // +1 for the newline that split() removed
    const lineEnd = lineStart + lines[n].length + 1;
    if (index < lineEnd) {
      return `${n + 1}:${index - lineStart + 1}`;
    }
    lineStart = lineEnd;
  }

  // Unreachable: index < text.length is checked above.
  throw new InternalError(`Index ${index} not found in any line!`);
}

/**
 * Spoken-word ordinal with its article.
 *
 * Examples: 1 → "a 1st", 8 → "an 8th", 11 → "an 11th", 22 → "a 22nd".
 */
export function ordinal(n: number): string {
  const digits = String(n);

  // The leading group of digits decides how the number is pronounced:
  // 11 000 is "eleven thousand", 18 500 is "eighteen thousand ...".
  const leadingGroup = digits.slice(0, digits.length % 3 || 3);
  const article =
    digits.startsWith('8') || leadingGroup === '11' || leadingGroup === '18' ? 'an' : 'a';

  const lastTwo = n % 100;
  let suffix = 'th';
  if (lastTwo < 11 || lastTwo > 13) {
    switch (n % 10) {
      case 1: suffix = 'st'; break;
      case 2: suffix = 'nd'; break;
      case 3: suffix = 'rd'; break;
    }
  }

  return `${article} ${digits}${suffix}`;
}
