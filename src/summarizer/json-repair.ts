/**
 * @module summarizer/json-repair
 * @fileoverview Turns raw model output into a {@link SectionSummary}.
 *
 * Models asked for "strict JSON" still wrap it in prose or code fences, or
 * stop mid-object. Parsing is therefore an ordered chain of strategies:
 *
 * | # | Strategy        | Candidate text                                  |
 * |---|-----------------|-------------------------------------------------|
 * | 1 | `whole`         | the entire payload                              |
 * | 2 | `fenced`        | contents of the first ```` ```json ```` fence   |
 * | 3 | `outer-braces`  | first `{` through last `}`                      |
 *
 * The first strategy whose candidate parses to a JSON object wins. When none
 * does, the trimmed payload becomes the abstract and the bullets are empty.
 * {@link parseSummary} never throws.
 */

import { z } from "zod";

/** Abstract and bullet points for one block of text. */
export interface SectionSummary {
  abstract: string;
  bullets: string[];
}

/** A named way of pulling a JSON candidate out of the payload. */
interface ParseStrategy {
  name: string;
  candidate(payload: string): string | null;
}

export type ParseOutcome =
  | { kind: "parsed"; strategy: string; summary: SectionSummary }
  | { kind: "fallback"; summary: SectionSummary };

const FENCED_JSON = /```json\s*(\{.*?\})\s*```/s;
const OUTER_BRACES = /(\{.*\})/s;

export const PARSE_STRATEGIES: readonly ParseStrategy[] = [
  { name: "whole", candidate: (payload) => payload },
  { name: "fenced", candidate: (payload) => FENCED_JSON.exec(payload)?.[1] ?? null },
  { name: "outer-braces", candidate: (payload) => OUTER_BRACES.exec(payload)?.[1] ?? null },
];

/**
 * Shape accepted from the model. Any JSON object passes: a non-string
 * abstract reads as `""`, and non-string bullet entries are dropped.
 */
const SummaryPayloadSchema = z.object({
  abstract: z.string().catch(""),
  bullets: z
    .array(z.unknown())
    .catch([])
    .transform((items) => items.filter((item): item is string => typeof item === "string")),
});

function tryParseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

/**
 * Run the strategy chain and report which strategy, if any, succeeded.
 *
 * @example
 * ```ts
 * parseSummaryOutcome('Sure! {"abstract":"x","bullets":[]}');
 * // => { kind: "parsed", strategy: "outer-braces", summary: { abstract: "x", bullets: [] } }
 * ```
 */
export function parseSummaryOutcome(payload: string): ParseOutcome {
  for (const strategy of PARSE_STRATEGIES) {
    const candidate = strategy.candidate(payload);
    if (candidate === null) {
      continue;
    }
    const result = SummaryPayloadSchema.safeParse(tryParseJson(candidate));
    if (result.success) {
      return { kind: "parsed", strategy: strategy.name, summary: result.data };
    }
  }
  return { kind: "fallback", summary: { abstract: payload.trim(), bullets: [] } };
}

/**
 * Parse model output into a summary, degrading to raw text.
 *
 * @example
 * ```ts
 * parseSummary("just plain text");
 * // => { abstract: "just plain text", bullets: [] }
 * ```
 */
export function parseSummary(payload: string): SectionSummary {
  return parseSummaryOutcome(payload).summary;
}
