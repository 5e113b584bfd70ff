/**
 * @module summarizer/chunker
 * @fileoverview Splits long page text into overlapping, bounded windows.
 *
 * Each window is small enough for one model call; consecutive windows share
 * {@link DEFAULT_CHUNK_OVERLAP} characters so a sentence cut at a boundary
 * still appears whole in one of them.
 */

/** Default maximum window length, in characters. */
export const DEFAULT_CHUNK_LENGTH = 12000;

/** Default number of characters shared by consecutive windows. */
export const DEFAULT_CHUNK_OVERLAP = 400;

/**
 * A window is cut back to its last newline only when that newline lies at
 * or past this fraction of `maxLength`.
 */
const NEWLINE_CUT_RATIO = 0.6;

export interface ChunkOptions {
  /** @default 12000 */
  maxLength?: number;
  /** @default 400 */
  overlap?: number;
}

/**
 * Lazily yield overlapping windows of `text`.
 *
 * Lengths and offsets count Unicode code points, so a window never ends
 * inside a surrogate pair.
 *
 * - Text no longer than `maxLength` is yielded once, unchanged.
 * - Otherwise each window holds up to `maxLength` characters, cut back to
 *   its last newline when one sits at or past 60% of `maxLength`.
 * - The next window starts `max(1, window.length - overlap)` characters
 *   later, so there are no gaps and progress is always made.
 * - Iteration ends when the offset reaches the end of `text`. Once a window
 *   reaches the end, the windows after it are ever shorter suffixes.
 *
 * The generator is a pure function of its input: calling it again restarts
 * the sequence.
 *
 * @throws {RangeError} If `maxLength < 1` or `overlap < 0`.
 *
 * @example
 * ```ts
 * [...chunkText("abcdefghij", { maxLength: 4, overlap: 1 })];
 * // => ["abcd", "defg", "ghij", "j"]
 * ```
 */
export function* chunkText(
  text: string,
  options: ChunkOptions = {},
): Generator<string, void, undefined> {
  const maxLength = options.maxLength ?? DEFAULT_CHUNK_LENGTH;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new RangeError(`overlap must be a non-negative integer, got ${overlap}`);
  }

  const points = Array.from(text);
  if (points.length <= maxLength) {
    yield text;
    return;
  }

  let offset = 0;
  while (offset < points.length) {
    let window = points.slice(offset, offset + maxLength);

    const newline = window.lastIndexOf("\n");
    if (newline >= maxLength * NEWLINE_CUT_RATIO) {
      window = window.slice(0, newline);
    }

    yield window.join("");
    offset += Math.max(1, window.length - overlap);
  }
}
