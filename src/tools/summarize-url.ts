/**
 * @module tools/summarize-url
 * @fileoverview MCP Tool: summarize_url -- Fetch a page and return its JSON summary.
 *
 * The tool runs the same pipeline as the CLI:
 * 1. Fetches the target URL and extracts its readable text
 * 2. Summarizes each chunk, then the merged chunk abstracts
 * 3. Returns `{ title, url, abstract, bullets }` as pretty-printed JSON
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "summarize_url",
 *   "arguments": {
 *     "url": "https://example.com/article",
 *     "bullets": 4,
 *     "max_words": 120
 *   }
 * }
 * ```
 *
 * @see {@link summarizeUrl} for the pipeline
 * @see {@link formatError} for error formatting
 */
import { z } from "zod";
import { summarizeUrl } from "../summarizer/summarize-url.js";
import { formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { isFetchableUrl } from "../utils/url.js";

/**
 * Zod schema for the `summarize_url` tool parameters.
 *
 * A **plain object** with Zod fields -- `server.tool()` takes this shape
 * directly.
 */
export const SummarizeUrlSchema = {
  url: z
    .string()
    .url()
    .refine(isFetchableUrl, "must be an absolute http or https URL")
    .describe("Page URL to summarize"),

  model: z
    .string()
    .min(1)
    .optional()
    .describe("Gemini model name (default: gemini-2.5-flash)"),

  bullets: z
    .number()
    .int()
    .positive()
    .optional()
    .default(6)
    .describe("Maximum number of bullet points (default: 6)"),

  max_words: z
    .number()
    .int()
    .positive()
    .optional()
    .default(180)
    .describe("Soft word cap for the abstract (default: 180)"),
};

/** Parameters after Zod parsing and defaults. */
export interface SummarizeUrlParams {
  url: string;
  model?: string;
  bullets: number;
  max_words: number;
}

/** MCP tool response returned by the handler. */
export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/**
 * Build the `summarize_url` handler.
 *
 * Errors are returned as an `isError: true` response rather than thrown,
 * so the MCP client receives a readable message.
 *
 * @param summarize - Pipeline to run; replaced in tests.
 * @param logger - Receives pipeline logs.
 */
export function createSummarizeUrlHandler(
  summarize: typeof summarizeUrl = summarizeUrl,
  logger: Logger = silentLogger,
) {
  return async function handleSummarizeUrl(params: SummarizeUrlParams): Promise<ToolResponse> {
    try {
      const summary = await summarize(params.url, {
        model: params.model,
        bullets: params.bullets,
        maxWords: params.max_words,
        logger,
      });
      return {
        content: [{ type: "text" as const, text: JSON.stringify(summary, null, 2) }],
      };
    } catch (error) {
      logger.error({ url: params.url, err: error }, "summarize_url failed");
      return {
        content: [{ type: "text" as const, text: formatError(error) }],
        isError: true,
      };
    }
  };
}
