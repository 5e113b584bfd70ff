/**
 * @fileoverview Map-then-reduce summarization of a whole page.
 *
 * ```
 *   summarizeUrl(url)
 *     |
 *     +--> model client (from GEMINI_API_KEY unless injected)
 *     +--> fetchAndExtract(url)          -> { title, text }
 *     +--> chunkText(text)               -> chunk, chunk, ...
 *     +--> summarizeBlock(chunk) each    -> section summaries (map)
 *     +--> merge abstracts and bullets
 *     +--> summarizeBlock(merged)        -> final summary (reduce)
 *     +--> { title, url, abstract, bullets }
 * ```
 *
 * A single call cannot take an arbitrarily long page, so each chunk is
 * summarized first and the joined chunk abstracts are summarized again into
 * one coherent abstract.
 *
 * @module summarizer/summarize-url
 */

import { config, loadApiKey, type Env } from "../config.js";
import { fetchAndExtract } from "../extractor/pipeline.js";
import type { ExtractedPage } from "../extractor/html-extractor.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { truncateCodePoints } from "../utils/text.js";
import { chunkText } from "./chunker.js";
import type { SectionSummary } from "./json-repair.js";
import { GeminiModelClient, type ModelClient } from "./model-client.js";
import { summarizeBlock } from "./summarize-block.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * The terminal artifact, printed as JSON by the CLI.
 *
 * Key order is the order of the printed JSON.
 */
export interface FinalSummary {
  title: string;
  url: string;
  abstract: string;
  bullets: string[];
}

export interface SummarizeUrlOptions {
  /** Gemini model name. @default config.defaultModel */
  model?: string;
  /** Maximum bullets in the result. @default 6 */
  bullets?: number;
  /** Soft word cap for the abstract. @default 180 */
  maxWords?: number;
  /** Model to use instead of a {@link GeminiModelClient} built from the API key. */
  client?: ModelClient;
  /** Page source; defaults to {@link fetchAndExtract}. */
  extract?: (url: string, logger: Logger) => Promise<ExtractedPage>;
  /** Where the API key is read from. @default process.env */
  env?: Env;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_BULLETS = 6;
export const DEFAULT_MAX_WORDS = 180;

/** Per-chunk requests never ask for more than this many bullets. */
export const CHUNK_BULLET_CAP = 7;

/** Per-chunk requests never ask for more than this many words. */
export const CHUNK_WORD_CAP = 220;

/** Length cap of the joined chunk abstracts fed to the final call. */
export const MERGED_ABSTRACT_CHARS = 20000;

/** Fallback abstract length, in characters per requested word. */
const FALLBACK_CHARS_PER_WORD = 8;

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Join the chunk summaries: abstracts separated by single spaces (cut to
 * {@link MERGED_ABSTRACT_CHARS}), bullets concatenated in order and cut to
 * `bulletCount`. Near-duplicate bullets are kept.
 */
export function mergeSections(
  sections: readonly SectionSummary[],
  bulletCount: number,
): SectionSummary {
  return {
    abstract: truncateCodePoints(
      sections.map((section) => section.abstract).join(" "),
      MERGED_ABSTRACT_CHARS,
    ),
    bullets: sections
      .flatMap((section) => section.bullets)
      .slice(0, Math.max(0, bulletCount)),
  };
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Fetch a page and summarize it.
 *
 * The model client is resolved before the page is fetched, so a missing API
 * key fails the run without any network traffic.
 *
 * @throws {ConfigError} If no client is injected and `GEMINI_API_KEY` is unset.
 * @throws Fetch and extraction errors from {@link fetchAndExtract}, and
 *   model call errors, unchanged.
 *
 * @example
 * ```ts
 * const summary = await summarizeUrl("https://example.com/article", { bullets: 5 });
 * console.log(JSON.stringify(summary, null, 2));
 * ```
 */
export async function summarizeUrl(
  url: string,
  options: SummarizeUrlOptions = {},
): Promise<FinalSummary> {
  const bullets = options.bullets ?? DEFAULT_BULLETS;
  const maxWords = options.maxWords ?? DEFAULT_MAX_WORDS;
  const logger = options.logger ?? silentLogger;
  const extract =
    options.extract ?? ((target: string, log: Logger) => fetchAndExtract(target, { logger: log }));

  const client =
    options.client ??
    new GeminiModelClient({
      apiKey: loadApiKey(options.env),
      model: options.model ?? config.defaultModel,
    });

  const { title, text } = await extract(url, logger);

  const chunkBullets = Math.min(CHUNK_BULLET_CAP, bullets);
  const chunkWords = Math.min(CHUNK_WORD_CAP, maxWords);

  const sections: SectionSummary[] = [];
  let index = 0;
  for (const chunk of chunkText(text)) {
    logger.debug({ chunk: index, chars: chunk.length }, "summarizing chunk");
    sections.push(await summarizeBlock(client, chunk, chunkBullets, chunkWords, logger));
    index += 1;
  }

  const merged = mergeSections(sections, bullets);
  logger.debug(
    { chunks: sections.length, mergedChars: merged.abstract.length },
    "summarizing merged abstract",
  );

  const final = await summarizeBlock(client, merged.abstract, bullets, maxWords, logger);

  return {
    title,
    url,
    abstract:
      final.abstract || truncateCodePoints(merged.abstract, maxWords * FALLBACK_CHARS_PER_WORD),
    bullets: final.bullets.length > 0 ? final.bullets : merged.bullets,
  };
}
