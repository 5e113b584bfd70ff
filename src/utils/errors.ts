/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for url-summarizer.
 *
 * Every error raised by the pipeline extends {@link SummarizerError}, which
 * carries a machine-readable `code` string alongside the human-readable
 * `message`. The CLI and the MCP tool both render errors through
 * {@link formatError}, so a failure reads the same on either surface.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── SummarizerError (base)  ─── code: string
 *         ├── ConfigError            ─── "CONFIG_MISSING"
 *         ├── FetchError             ─── "FETCH_FAILED" + optional statusCode
 *         ├── TimeoutError           ─── "TIMEOUT"
 *         ├── ContentTypeError       ─── "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError  ─── "RESPONSE_TOO_LARGE"
 *         └── ExtractionError        ─── "EXTRACTION_FAILED"
 * ```
 *
 * Errors thrown by the Gemini SDK are not wrapped: they reach
 * {@link formatError} as plain `Error` instances and are rendered with
 * their class name.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("Not Found for https://example.com/missing", 404);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "HTTP 404: Not Found for https://example.com/missing"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all url-summarizer errors.
 *
 * Subclasses set a stable {@link code} and get a `name` matching their class,
 * so stack traces read "FetchError:" rather than "Error:".
 */
export class SummarizerError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE.
   *
   * Codes are part of the public surface: the MCP tool returns them to its
   * caller inside the error text.
   *
   * @example "FETCH_FAILED", "CONFIG_MISSING", "TIMEOUT"
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   */
  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Drop the constructor frame so the trace starts at the throw site.
    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when a required setting is missing from the environment.
 *
 * Raised before any network traffic: the run cannot do anything useful
 * without the model credential.
 *
 * @example
 * ```ts
 * throw new ConfigError("set GEMINI_API_KEY in .env");
 * ```
 */
export class ConfigError extends SummarizerError {
  constructor(message: string) {
    super(message, "CONFIG_MISSING");
  }
}

/**
 * Thrown when the page fetch fails.
 *
 * Covers network-level failures (DNS, TCP, TLS) and HTTP-level failures
 * (4xx, 5xx). {@link statusCode} is set only when the server answered.
 *
 * @example
 * ```ts
 * throw new FetchError("DNS resolution failed for example.invalid");
 * throw new FetchError("HTTP 503 Service Unavailable for https://example.com", 503);
 * ```
 */
export class FetchError extends SummarizerError {
  /**
   * HTTP status code from the server, when the request reached it.
   */
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "FETCH_FAILED");
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when the page fetch exceeds its time budget.
 *
 * @example
 * ```ts
 * throw new TimeoutError("Request to https://slow.example.com timed out after 20000ms");
 * ```
 */
export class TimeoutError extends SummarizerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * Thrown when the response Content-Type is not an HTML-like type.
 *
 * @example
 * ```ts
 * throw new ContentTypeError('Unacceptable Content-Type: "application/pdf" for https://example.com/a.pdf');
 * ```
 */
export class ContentTypeError extends SummarizerError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

/**
 * Thrown when the HTTP response body exceeds the configured size limit.
 */
export class ResponseTooLargeError extends SummarizerError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/**
 * Thrown when a page yields no readable text after cleaning.
 *
 * A page made only of navigation, scripts, or media ends here rather than
 * producing an empty summary.
 *
 * @example
 * ```ts
 * throw new ExtractionError("Could not extract readable text from the page.");
 * ```
 */
export class ExtractionError extends SummarizerError {
  constructor(message: string) {
    super(message, "EXTRACTION_FAILED");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to the single-line message shown to the user.
 *
 * ## Formatting Rules
 * - {@link FetchError} with a status code: `"HTTP <status>: <message>"`.
 * - Other {@link SummarizerError} subclasses: `"[CODE] message"`.
 * - Standard `Error` instances: `"<name>: <message>"`, so an SDK failure
 *   still says what kind of failure it was.
 * - Everything else: coerced via `String()`.
 *
 * @param error - The caught value.
 * @returns A single-line error description.
 *
 * @example
 * ```ts
 * formatError(new FetchError("Not Found", 404));      // => "HTTP 404: Not Found"
 * formatError(new ExtractionError("empty page"));     // => "[EXTRACTION_FAILED] empty page"
 * formatError(new TypeError("x is not a function"));  // => "TypeError: x is not a function"
 * formatError("something went wrong");                // => "something went wrong"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof FetchError && error.statusCode !== undefined) {
    return `HTTP ${error.statusCode}: ${error.message}`;
  }

  // Checked before the plain Error branch: SummarizerError extends Error.
  if (error instanceof SummarizerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
