/**
 * @fileoverview Fetch-and-extract stage, the first half of the summarizer.
 *
 * Combines the two I/O-facing steps into {@link fetchAndExtract}:
 *
 *   1. **HTTP fetch**: download the raw HTML via {@link fetchPage}.
 *   2. **Content extraction**: reduce it to title + readable text via
 *      {@link extractReadableText}.
 *
 * The extractor is a pure, synchronous function; this module adds the async
 * network layer and logging on top of it.
 *
 * @module extractor/pipeline
 */

import { fetchPage, type FetchOptions } from "../services/fetch.js";
import { extractReadableText, type ExtractedPage } from "./html-extractor.js";
import { silentLogger } from "../utils/logger.js";

/**
 * Fetch a page and extract its title and readable text.
 *
 * @param url - Absolute HTTP or HTTPS URL.
 * @param options - Passed through to {@link fetchPage}.
 *
 * @throws {FetchError | TimeoutError | ContentTypeError | ResponseTooLargeError}
 *   From the fetch step.
 * @throws {ExtractionError} If the page has no readable text.
 *
 * @example
 * ```typescript
 * const page = await fetchAndExtract("https://example.com/article");
 * console.log(page.title, page.text.length);
 * ```
 */
export async function fetchAndExtract(
  url: string,
  options: FetchOptions = {},
): Promise<ExtractedPage> {
  const logger = options.logger ?? silentLogger;

  const document = await fetchPage(url, options);
  const page = extractReadableText(document.html);

  logger.debug(
    { url, title: page.title, chars: page.text.length },
    "extracted readable text",
  );

  return page;
}
