/**
 * @fileoverview Tests for the summarize_url MCP tool.
 *
 * Covers: parameter schema defaults and validation, the success response,
 * and errors returned as isError responses.
 */

import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import {
  SummarizeUrlSchema,
  createSummarizeUrlHandler,
} from "../../src/tools/summarize-url.js";
import type { summarizeUrl } from "../../src/summarizer/summarize-url.js";
import { FetchError } from "../../src/utils/errors.js";
import { silentLogger } from "../../src/utils/logger.js";

const params = z.object(SummarizeUrlSchema);

const SUMMARY = {
  title: "Example",
  url: "https://example.com/a",
  abstract: "A short abstract.",
  bullets: ["first", "second"],
};

// ---------------------------------------------------------------------------
// SummarizeUrlSchema
// ---------------------------------------------------------------------------

describe("SummarizeUrlSchema", () => {
  it("applies the default limits", () => {
    expect(params.parse({ url: "https://example.com/a" })).toEqual({
      url: "https://example.com/a",
      bullets: 6,
      max_words: 180,
    });
  });

  it("keeps explicit values", () => {
    expect(
      params.parse({ url: "http://example.com", model: "gemini-2.5-pro", bullets: 3, max_words: 50 }),
    ).toEqual({ url: "http://example.com", model: "gemini-2.5-pro", bullets: 3, max_words: 50 });
  });

  it("rejects non-HTTP URLs", () => {
    expect(params.safeParse({ url: "ftp://example.com/file" }).success).toBe(false);
    expect(params.safeParse({ url: "not a url" }).success).toBe(false);
  });

  it("accepts the same URLs as the command line", () => {
    expect(params.safeParse({ url: "HTTPS://Example.com/Page" }).success).toBe(true);

    const result = params.safeParse({ url: "ftp://example.com/file" });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.message)).toEqual([
      "must be an absolute http or https URL",
    ]);
  });

  it("rejects non-positive limits", () => {
    expect(params.safeParse({ url: "https://example.com", bullets: 0 }).success).toBe(false);
    expect(params.safeParse({ url: "https://example.com", max_words: 2.5 }).success).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// createSummarizeUrlHandler
// ---------------------------------------------------------------------------

describe("createSummarizeUrlHandler", () => {
  it("returns the summary as pretty-printed JSON", async () => {
    const summarize = vi.fn<typeof summarizeUrl>(async () => SUMMARY);
    const handler = createSummarizeUrlHandler(summarize, silentLogger);

    const response = await handler({
      url: "https://example.com/a",
      model: "gemini-2.5-pro",
      bullets: 2,
      max_words: 90,
    });

    expect(response).toEqual({
      content: [{ type: "text", text: JSON.stringify(SUMMARY, null, 2) }],
    });
    expect(summarize).toHaveBeenCalledWith("https://example.com/a", {
      model: "gemini-2.5-pro",
      bullets: 2,
      maxWords: 90,
      logger: silentLogger,
    });
  });

  it("returns pipeline errors as an error response", async () => {
    const summarize = vi.fn<typeof summarizeUrl>(async () => {
      throw new FetchError("Not Found for https://example.com/a", 404);
    });
    const handler = createSummarizeUrlHandler(summarize, silentLogger);

    const response = await handler({ url: "https://example.com/a", bullets: 6, max_words: 180 });

    expect(response).toEqual({
      content: [{ type: "text", text: "HTTP 404: Not Found for https://example.com/a" }],
      isError: true,
    });
  });
});
