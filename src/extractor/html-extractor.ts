/**
 * @fileoverview Readable-text extraction for the url-summarizer pipeline.
 *
 * Raw HTML is loaded into cheerio (a lightweight jQuery-like library that
 * parses without executing scripts) and reduced in three steps:
 *
 * **Step 1: Title**
 *   The first `<title>` element is read before anything is removed.
 *
 * **Step 2: Noise removal**
 *   Scripts, page chrome (header, footer, nav, aside), forms and media
 *   embeds are removed with their whole subtrees.
 *
 * **Step 3: Text collection**
 *   Headings (h1–h3), paragraphs, list items and blockquotes are read in
 *   document order. Fragments under {@link MIN_FRAGMENT_WORDS} words are
 *   dropped (menu labels, captions, "Read more" links). The survivors are
 *   joined and every whitespace run is collapsed to a single space.
 *
 * A page with nothing left after step 3 is an {@link ExtractionError}: the
 * summarizer never runs on empty input.
 *
 * @module extractor/html-extractor
 */

import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { ExtractionError } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * Title and cleaned text of a page.
 *
 * @example
 * ```typescript
 * const page = extractReadableText(rawHtml);
 * console.log(page.title); // "How Tides Work"
 * console.log(page.text);  // "How Tides Work The moon pulls on the oceans ..."
 * ```
 */
export interface ExtractedPage {
  /** Trimmed `<title>` text, or `""` when the page has none. */
  title: string;

  /** Cleaned, whitespace-collapsed text. Never empty. */
  text: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Elements removed, with their subtrees, before text is collected.
 */
export const NOISE_SELECTORS: readonly string[] = [
  "script",
  "style",
  "noscript",
  "header",
  "footer",
  "nav",
  "aside",
  "form",
  "svg",
  "img",
  "video",
  "audio",
  "iframe",
  "canvas",
] as const;

/** Elements whose text makes up the readable content. */
export const CONTENT_SELECTOR = "h1, h2, h3, p, li, blockquote";

/** Fragments with fewer whitespace-separated words than this are dropped. */
export const MIN_FRAGMENT_WORDS = 3;

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

/**
 * Visible text of one element: every descendant text node, trimmed, joined
 * with single spaces. `<p>Hello<b>world</b></p>` reads as "Hello world".
 */
function elementText($: cheerio.CheerioAPI, element: AnyNode): string {
  const pieces: string[] = [];

  const walk = (node: AnyNode): void => {
    // nodeType 3: text node.
    if (node.nodeType === 3) {
      const piece = $(node).text().trim();
      if (piece) {
        pieces.push(piece);
      }
      return;
    }
    $(node)
      .contents()
      .each((_, child) => {
        walk(child);
      });
  };

  walk(element);
  return pieces.join(" ");
}

/**
 * Count whitespace-separated words.
 *
 * @example
 * ```typescript
 * countWords("  two   words "); // => 2
 * ```
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract the title and readable text of an HTML page.
 *
 * Nested content elements are each collected, so a `<p>` inside an `<li>`
 * contributes its text twice; the summarizer is insensitive to that.
 *
 * @param html - The raw HTML string.
 * @returns The page title and its cleaned text.
 * @throws {ExtractionError} If no fragment survives the filters.
 *
 * @example
 * ```typescript
 * extractReadableText(`
 *   <title> Tides </title>
 *   <nav><a>Home page link</a></nav>
 *   <p>The moon pulls on the oceans.</p>
 *   <p>Too short</p>
 * `);
 * // => { title: "Tides", text: "The moon pulls on the oceans." }
 * ```
 */
export function extractReadableText(html: string): ExtractedPage {
  const $ = cheerio.load(html);

  const title = $("title").first().text().trim();

  for (const selector of NOISE_SELECTORS) {
    $(selector).remove();
  }

  const fragments: string[] = [];
  $(CONTENT_SELECTOR).each((_, element) => {
    const fragment = elementText($, element);
    if (countWords(fragment) >= MIN_FRAGMENT_WORDS) {
      fragments.push(fragment);
    }
  });

  const text = fragments.join("\n").replace(/\s+/g, " ").trim();
  if (!text) {
    throw new ExtractionError("Could not extract readable text from the page.");
  }

  return { title, text };
}
