/**
 * @module utils/url
 * @fileoverview URL validation for the page fetcher and the argument parsers.
 *
 * The target URL is fetched exactly as given (no normalization): the
 * summary reports the URL the user asked for.
 *
 * @example
 * ```ts
 * import { isFetchableUrl, extractDomain } from "./utils/url.js";
 *
 * isFetchableUrl("javascript:alert(1)");
 * // => false
 *
 * extractDomain("https://Sub.Example.COM:8080/path");
 * // => "sub.example.com"
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * URL schemes the fetcher can retrieve. `file:`, `data:` and `javascript:`
 * URLs are rejected before any request is made.
 */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Domain Extraction
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the lowercased hostname from a URL string.
 *
 * @throws {TypeError} If the input is not a valid URL.
 *
 * @example
 * ```ts
 * extractDomain("http://localhost:3000/api");
 * // => "localhost"
 * ```
 */
export function extractDomain(url: string): string {
  return new URL(url).hostname;
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Scheme Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Check whether a URL is absolute and uses `http:` or `https:`.
 *
 * @returns `false` for malformed URLs instead of throwing.
 *
 * @example
 * ```ts
 * isFetchableUrl("https://example.com/page");    // => true
 * isFetchableUrl("mailto:user@example.com");     // => false
 * isFetchableUrl("not-a-valid-url");             // => false
 * ```
 */
export function isFetchableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return FETCHABLE_SCHEMES.has(parsed.protocol);
  } catch {
    return false;
  }
}
