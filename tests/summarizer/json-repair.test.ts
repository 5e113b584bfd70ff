/**
 * @fileoverview Tests for model-output parsing.
 *
 * Covers: each strategy of the parse chain, shape coercion, and the
 * raw-text fallback.
 */

import { describe, it, expect } from "vitest";
import {
  parseSummary,
  parseSummaryOutcome,
} from "../../src/summarizer/json-repair.js";

// ---------------------------------------------------------------------------
// parseSummaryOutcome — strategies
// ---------------------------------------------------------------------------

describe("parseSummaryOutcome — strategies", () => {
  it("parses a payload that is JSON as a whole", () => {
    expect(parseSummaryOutcome('{"abstract":"A","bullets":["b1","b2"]}')).toEqual({
      kind: "parsed",
      strategy: "whole",
      summary: { abstract: "A", bullets: ["b1", "b2"] },
    });
  });

  it("parses a fenced json block surrounded by prose", () => {
    const payload =
      'Some prose ```json {"abstract":"x","bullets":["a"]} ``` trailing';

    expect(parseSummaryOutcome(payload)).toEqual({
      kind: "parsed",
      strategy: "fenced",
      summary: { abstract: "x", bullets: ["a"] },
    });
  });

  it("parses a multi-line fenced block", () => {
    const payload = 'Here it is:\n```json\n{\n  "abstract": "multi",\n  "bullets": []\n}\n```\n';

    expect(parseSummary(payload)).toEqual({ abstract: "multi", bullets: [] });
  });

  it("parses the outermost brace span when there is no fence", () => {
    const payload = 'Here you go: {"abstract":"y","bullets":[]} hope it helps';

    expect(parseSummaryOutcome(payload)).toEqual({
      kind: "parsed",
      strategy: "outer-braces",
      summary: { abstract: "y", bullets: [] },
    });
  });
});

// ---------------------------------------------------------------------------
// parseSummary — shape coercion
// ---------------------------------------------------------------------------

describe("parseSummary — shape coercion", () => {
  it("defaults missing keys", () => {
    expect(parseSummary('{"summary":"z"}')).toEqual({ abstract: "", bullets: [] });
  });

  it("replaces a non-string abstract with an empty string", () => {
    expect(parseSummary('{"abstract":42,"bullets":["k"]}')).toEqual({
      abstract: "",
      bullets: ["k"],
    });
  });

  it("keeps only string bullets", () => {
    expect(parseSummary('{"abstract":"q","bullets":["ok",3,null,"fine"]}')).toEqual({
      abstract: "q",
      bullets: ["ok", "fine"],
    });
  });

  it("replaces non-array bullets with an empty list", () => {
    expect(parseSummary('{"abstract":"q","bullets":"one point"}')).toEqual({
      abstract: "q",
      bullets: [],
    });
  });
});

// ---------------------------------------------------------------------------
// parseSummary — fallback
// ---------------------------------------------------------------------------

describe("parseSummary — fallback", () => {
  it("uses plain text as the abstract", () => {
    expect(parseSummaryOutcome("just plain text")).toEqual({
      kind: "fallback",
      summary: { abstract: "just plain text", bullets: [] },
    });
  });

  it("trims the raw text", () => {
    expect(parseSummary("  padded answer \n")).toEqual({
      abstract: "padded answer",
      bullets: [],
    });
  });

  it("falls back on truncated JSON", () => {
    expect(parseSummary('{"abstract":"cut off')).toEqual({
      abstract: '{"abstract":"cut off',
      bullets: [],
    });
  });

  it("falls back when the JSON is not an object", () => {
    expect(parseSummary('["a","b"]')).toEqual({ abstract: '["a","b"]', bullets: [] });
  });

  it("returns an empty abstract for an empty payload", () => {
    expect(parseSummary("")).toEqual({ abstract: "", bullets: [] });
  });
});
