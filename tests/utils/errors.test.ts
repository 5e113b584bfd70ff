/**
 * @fileoverview Tests for the error hierarchy and formatError.
 */

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  ContentTypeError,
  ExtractionError,
  FetchError,
  ResponseTooLargeError,
  SummarizerError,
  TimeoutError,
  formatError,
} from "../../src/utils/errors.js";

describe("error classes", () => {
  it.each([
    [new ConfigError("m"), "ConfigError", "CONFIG_MISSING"],
    [new FetchError("m"), "FetchError", "FETCH_FAILED"],
    [new TimeoutError("m"), "TimeoutError", "TIMEOUT"],
    [new ContentTypeError("m"), "ContentTypeError", "CONTENT_TYPE_REJECTED"],
    [new ResponseTooLargeError("m"), "ResponseTooLargeError", "RESPONSE_TOO_LARGE"],
    [new ExtractionError("m"), "ExtractionError", "EXTRACTION_FAILED"],
  ])("%s has its class name and code", (error, name, code) => {
    expect(error).toBeInstanceOf(SummarizerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.message).toBe("m");
  });

  it("keeps the status code on FetchError", () => {
    expect(new FetchError("Not Found", 404).statusCode).toBe(404);
    expect(new FetchError("offline").statusCode).toBeUndefined();
  });
});

describe("formatError", () => {
  it("prefixes HTTP failures with their status", () => {
    expect(formatError(new FetchError("Not Found for https://example.com/a", 404))).toBe(
      "HTTP 404: Not Found for https://example.com/a",
    );
  });

  it("prefixes other pipeline errors with their code", () => {
    expect(formatError(new FetchError("Failed to fetch https://example.com: fetch failed"))).toBe(
      "[FETCH_FAILED] Failed to fetch https://example.com: fetch failed",
    );
    expect(formatError(new ConfigError("set GEMINI_API_KEY in .env"))).toBe(
      "[CONFIG_MISSING] set GEMINI_API_KEY in .env",
    );
  });

  it("names plain errors by class", () => {
    expect(formatError(new TypeError("x is not a function"))).toBe(
      "TypeError: x is not a function",
    );
  });

  it("stringifies non-Error values", () => {
    expect(formatError("something went wrong")).toBe("something went wrong");
    expect(formatError(42)).toBe("42");
  });
});
