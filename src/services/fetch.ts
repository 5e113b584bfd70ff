/**
 * @fileoverview HTTP fetch service for url-summarizer.
 *
 * Wraps the Node.js native `fetch()` API with the controls the summarizer
 * needs before handing a page to the extractor:
 *
 * 1. **Scheme check** - only `http:` and `https:` URLs are requested.
 * 2. **Timeout** - `AbortSignal.timeout()` bounds the whole request.
 * 3. **Client identity** - browser-like User-Agent and Accept-Language
 *    headers, since some sites refuse obvious scripts.
 * 4. **Status check** - any non-2xx response is an error.
 * 5. **Content-Type filtering** - only HTML-like responses are read.
 * 6. **Response size limiting** - the body is streamed with a byte counter.
 * 7. **Decoding** - the body is decoded with the Content-Type charset,
 *    UTF-8 when none is given.
 *
 * ```
 *   fetchPage(url)
 *     |
 *     +--> scheme validation
 *     +--> fetch() with timeout signal + identity headers, redirects followed
 *     +--> status / Content-Type / body size checks
 *     +--> FetchedDocument
 * ```
 *
 * The request is made once. There is no retry and no rate limiting.
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import { extractDomain, isFetchableUrl } from "../utils/url.js";
import {
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * Raw result of a successful page fetch, the input to the extractor.
 *
 * @example
 * ```typescript
 * const doc: FetchedDocument = {
 *   html: "<!DOCTYPE html><html>...</html>",
 *   url: "https://example.com/",
 *   contentType: "text/html; charset=utf-8",
 *   statusCode: 200,
 * };
 * ```
 */
export interface FetchedDocument {
  /** The raw HTML body. */
  html: string;

  /**
   * The final URL after redirects, or the requested URL when the runtime
   * does not report one.
   */
  url: string;

  /** The Content-Type header value, `"text/html"` when the server sent none. */
  contentType: string;

  /** The HTTP status code of the final response. */
  statusCode: number;
}

/**
 * Per-call overrides for {@link fetchPage}. Unset fields come from
 * {@link config}.
 */
export interface FetchOptions {
  timeoutMs?: number;
  maxBytes?: number;
  userAgent?: string;
  acceptLanguage?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types treated as HTML. A response without a Content-Type header is
 * also accepted and parsed as HTML.
 */
const ALLOWED_CONTENT_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
]);

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Extracts the lowercased media type from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // => "text/html"
 * extractMimeType(null);                        // => ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

/**
 * Extracts the `charset` parameter from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractCharset('text/html; charset="ISO-8859-1"'); // => "iso-8859-1"
 * extractCharset("text/html");                       // => null
 * ```
 */
export function extractCharset(contentType: string | null): string | null {
  const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? "");
  return match ? match[1].toLowerCase() : null;
}

/**
 * Builds a decoder for the declared charset, or UTF-8 when none is declared
 * or the label is unknown to the runtime.
 */
function createBodyDecoder(charset: string | null): TextDecoder {
  if (charset) {
    try {
      return new TextDecoder(charset, { fatal: false });
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
      // Unknown label: read the body as UTF-8.
    }
  }
  return new TextDecoder("utf-8", { fatal: false });
}

function isAcceptableContentType(contentType: string | null): boolean {
  const mimeType = extractMimeType(contentType);
  return mimeType === "" || ALLOWED_CONTENT_TYPES.has(mimeType);
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof DOMException &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Reads a Response body as text, aborting once `maxBytes` is exceeded.
 * Malformed byte sequences decode to U+FFFD.
 *
 * The Content-Length header is checked first, but the limit is enforced
 * while streaming since the header is optional and can be wrong.
 *
 * @throws {ResponseTooLargeError} If the body exceeds the size limit.
 * @throws {FetchError} If the stream fails mid-read.
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
  decoder: TextDecoder,
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();

  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }

      // `stream: true` keeps multi-byte characters split across chunks intact.
      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError || isAbortError(error)) {
      throw error;
    }
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return chunks.join("");
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Fetches a page with one HTTP GET and returns its HTML.
 *
 * @param url - Absolute HTTP or HTTPS URL.
 * @param options - Overrides for timeout, size limit and identity headers.
 *
 * @throws {FetchError} If the URL is not fetchable, the request fails at
 *   the network level, or the status is not 2xx (with `statusCode` set).
 * @throws {TimeoutError} If the request exceeds the timeout.
 * @throws {ContentTypeError} If the response is not HTML-like.
 * @throws {ResponseTooLargeError} If the body exceeds the size limit.
 *
 * @example
 * ```typescript
 * const doc = await fetchPage("https://example.com");
 * console.log(`Fetched ${doc.url} (${doc.statusCode}), ${doc.html.length} chars`);
 * ```
 */
export async function fetchPage(
  url: string,
  options: FetchOptions = {},
): Promise<FetchedDocument> {
  const timeoutMs = options.timeoutMs ?? config.fetchTimeout;
  const maxBytes = options.maxBytes ?? config.maxResponseSize;
  const logger = options.logger ?? silentLogger;

  if (!isFetchableUrl(url)) {
    throw new FetchError(
      `Unsupported URL: ${url} (only absolute http: and https: URLs are allowed)`,
    );
  }

  logger.debug({ url, host: extractDomain(url), timeoutMs }, "fetching page");

  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": options.userAgent ?? config.userAgent,
        Accept: "text/html, application/xhtml+xml, */*;q=0.1",
        "Accept-Language": options.acceptLanguage ?? config.acceptLanguage,
      },
      redirect: "follow",
    });
  } catch (error) {
    if (isAbortError(error)) {
      throw new TimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`);
    }
    throw new FetchError(
      `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `${response.statusText || "Request failed"} for ${url}`,
      response.status,
    );
  }

  const contentType = response.headers.get("content-type");
  if (!isAcceptableContentType(contentType)) {
    throw new ContentTypeError(
      `Unacceptable Content-Type: "${extractMimeType(contentType)}" for ${url}. ` +
        `Expected one of: ${Array.from(ALLOWED_CONTENT_TYPES).join(", ")}`,
    );
  }

  let html: string;
  try {
    html = await readBodyWithLimit(
      response,
      maxBytes,
      createBodyDecoder(extractCharset(contentType)),
    );
  } catch (error) {
    // The timeout signal keeps running while the body streams.
    if (isAbortError(error)) {
      throw new TimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`);
    }
    throw error;
  }

  logger.debug(
    { url: response.url || url, status: response.status, chars: html.length },
    "fetched page",
  );

  return {
    html,
    url: response.url || url,
    contentType: contentType ?? "text/html",
    statusCode: response.status,
  };
}
