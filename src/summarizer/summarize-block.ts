/**
 * @module summarizer/summarize-block
 * @fileoverview One model call over one block of text.
 */

import { buildSummaryPrompt } from "../prompts/summary.js";
import { parseSummaryOutcome, type SectionSummary } from "./json-repair.js";
import { responseText, type ModelClient } from "./model-client.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * Summarize one block of text with a single model call.
 *
 * Malformed model output never throws: it degrades to a raw-text abstract
 * (see {@link parseSummaryOutcome}). Errors from the model call itself
 * (network, auth, quota) propagate unchanged.
 *
 * @param client - Model to ask.
 * @param text - Content to summarize; only the first 16,000 characters are sent.
 * @param bulletCount - Upper bound on returned bullets.
 * @param maxWords - Soft word cap for the abstract, stated in the prompt.
 */
export async function summarizeBlock(
  client: ModelClient,
  text: string,
  bulletCount: number,
  maxWords: number,
  logger: Logger = silentLogger,
): Promise<SectionSummary> {
  const prompt = buildSummaryPrompt(text, bulletCount, maxWords);
  const response = await client.generate(prompt);
  const payload = responseText(response);

  const outcome = parseSummaryOutcome(payload);
  if (outcome.kind === "fallback") {
    logger.warn(
      { model: client.model, chars: payload.length },
      "model output was not JSON; using raw text as abstract",
    );
  } else {
    logger.debug({ model: client.model, strategy: outcome.strategy }, "parsed model output");
  }

  return {
    abstract: outcome.summary.abstract,
    bullets: outcome.summary.bullets.slice(0, Math.max(0, bulletCount)),
  };
}
