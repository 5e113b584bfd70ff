/**
 * @module utils/text
 * @fileoverview Length limits counted in Unicode code points.
 *
 * `String.prototype.slice` counts UTF-16 code units and can cut an emoji or
 * any other astral character in half. The helpers here never split a
 * surrogate pair.
 *
 * @example
 * ```ts
 * truncateCodePoints("a😀b", 2); // => "a😀"
 * "a😀b".slice(0, 2);           // => "a\ud83d"
 * ```
 */

/**
 * Return the first `limit` code points of `text`.
 *
 * Returns `text` itself when it is already short enough.
 */
export function truncateCodePoints(text: string, limit: number): string {
  // A string never has more code points than code units.
  if (text.length <= limit) {
    return text;
  }

  let units = 0;
  let count = 0;
  for (const point of text) {
    if (count >= limit) {
      break;
    }
    units += point.length;
    count += 1;
  }
  return text.slice(0, units);
}
