/**
 * @module prompts/summary
 * @fileoverview The strict-JSON summarization prompt sent for every block.
 */

import type { ModelPrompt } from "../summarizer/model-client.js";
import { truncateCodePoints } from "../utils/text.js";

/** Characters of content embedded in one prompt. */
export const MAX_PROMPT_CONTENT_CHARS = 16000;

/**
 * Build the strict-JSON summarization prompt for one block of text.
 *
 * Content beyond {@link MAX_PROMPT_CONTENT_CHARS} code points is cut off.
 */
export function buildSummaryPrompt(
  text: string,
  bulletCount: number,
  maxWords: number,
): ModelPrompt {
  const instructions =
    "You are a precise, neutral summarizer. " +
    "Return STRICT JSON only with keys: abstract, bullets.\n" +
    `Format: {"abstract":"<= ${maxWords} words","bullets":["up to ${bulletCount} key points"]}\n\n` +
    `CONTENT:\n${truncateCodePoints(text, MAX_PROMPT_CONTENT_CHARS)}`;

  return { role: "user", parts: [{ text: instructions }] };
}
