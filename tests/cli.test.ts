/**
 * @fileoverview Tests for the command-line interface.
 *
 * The pipeline is replaced with a stub; these tests cover argument
 * handling, output, and exit codes.
 */

import { describe, it, expect, vi } from "vitest";
import { parseCliOptions, runCli, type CliIo } from "../src/cli.js";
import type { summarizeUrl } from "../src/summarizer/summarize-url.js";
import { FetchError } from "../src/utils/errors.js";
import { silentLogger } from "../src/utils/logger.js";

const PAGE_URL = "https://example.com/a";

function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

function stubSummarize(bullets: string[] = ["one", "two"]) {
  return vi.fn<typeof summarizeUrl>(async (url) => ({
    title: "Example",
    url,
    abstract: "A short abstract.",
    bullets,
  }));
}

// ---------------------------------------------------------------------------
// runCli — success
// ---------------------------------------------------------------------------

describe("runCli — success", () => {
  it("prints the summary as indented JSON and exits 0", async () => {
    const io = captureIo();
    const summarize = stubSummarize();

    const code = await runCli(["--url", PAGE_URL], { io, summarize, logger: silentLogger });

    expect(code).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out.join("")).toBe(
      [
        "{",
        '  "title": "Example",',
        '  "url": "https://example.com/a",',
        '  "abstract": "A short abstract.",',
        '  "bullets": [',
        '    "one",',
        '    "two"',
        "  ]",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("passes the parsed options to the pipeline", async () => {
    const summarize = stubSummarize();
    const env = { GEMINI_API_KEY: "test-key" };

    await runCli(
      ["--url", PAGE_URL, "--model", "gemini-2.5-pro", "--bullets", "3", "--max-words", "80"],
      { io: captureIo(), summarize, env, logger: silentLogger },
    );

    expect(summarize).toHaveBeenCalledWith(PAGE_URL, {
      model: "gemini-2.5-pro",
      bullets: 3,
      maxWords: 80,
      env,
      logger: silentLogger,
    });
  });

  it("keeps non-ASCII characters unescaped", async () => {
    const io = captureIo();

    await runCli(["--url", PAGE_URL], {
      io,
      summarize: stubSummarize(["Café résumé", "東京"]),
      logger: silentLogger,
    });

    expect(io.out.join("")).toContain('"Café résumé"');
    expect(io.out.join("")).toContain('"東京"');
  });
});

// ---------------------------------------------------------------------------
// runCli — failures
// ---------------------------------------------------------------------------

describe("runCli — failures", () => {
  it("reports pipeline errors on stderr and exits 1", async () => {
    const io = captureIo();
    const summarize = vi.fn<typeof summarizeUrl>(async () => {
      throw new FetchError("Not Found for https://example.com/a", 404);
    });

    const code = await runCli(["--url", PAGE_URL], { io, summarize, logger: silentLogger });

    expect(code).toBe(1);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual(["HTTP 404: Not Found for https://example.com/a\n"]);
  });

  it("exits 1 without calling the pipeline when --url is missing", async () => {
    const io = captureIo();
    const summarize = stubSummarize();

    expect(await runCli([], { io, summarize, logger: silentLogger })).toBe(1);
    expect(summarize).not.toHaveBeenCalled();
    expect(io.err.join("")).toContain("--url <url>");
  });

  it("rejects a URL that is not http or https", async () => {
    const io = captureIo();
    const summarize = stubSummarize();

    expect(
      await runCli(["--url", "ftp://example.com/file"], { io, summarize, logger: silentLogger }),
    ).toBe(1);
    expect(summarize).not.toHaveBeenCalled();
    expect(io.err).toEqual(["error: invalid --url: must be an absolute http or https URL\n"]);
  });
});

// ---------------------------------------------------------------------------
// parseCliOptions
// ---------------------------------------------------------------------------

describe("parseCliOptions", () => {
  it("applies the default limits", () => {
    const options = parseCliOptions(["--url", PAGE_URL, "--model", "gemini-2.5-flash"], captureIo());

    expect(options).toEqual({
      url: PAGE_URL,
      model: "gemini-2.5-flash",
      bullets: 6,
      maxWords: 180,
      verbose: false,
    });
  });

  it("reads --verbose", () => {
    const options = parseCliOptions(["--url", PAGE_URL, "--verbose"], captureIo());

    expect(options).toMatchObject({ verbose: true });
  });

  it("rejects a non-numeric bullet count", () => {
    const io = captureIo();

    expect(parseCliOptions(["--url", PAGE_URL, "--bullets", "abc"], io)).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0]?.startsWith("error: invalid --bullets: ")).toBe(true);
  });

  it("rejects a zero bullet count", () => {
    const io = captureIo();

    expect(parseCliOptions(["--url", PAGE_URL, "--bullets", "0"], io)).toBe(1);
    expect(io.err).toEqual(["error: invalid --bullets: Number must be greater than 0\n"]);
  });

  it("rejects a fractional word cap", () => {
    const io = captureIo();

    expect(parseCliOptions(["--url", PAGE_URL, "--max-words", "1.5"], io)).toBe(1);
    expect(io.err[0]?.startsWith("error: invalid --max-words: ")).toBe(true);
  });

  it("prints help on stdout and exits 0", () => {
    const io = captureIo();

    expect(parseCliOptions(["--help"], io)).toBe(0);
    expect(io.out.join("")).toContain("Usage: url-summarizer [options]");
  });

  it("prints the version on stdout and exits 0", () => {
    const io = captureIo();

    expect(parseCliOptions(["--version"], io)).toBe(0);
    expect(io.out).toEqual(["1.0.0\n"]);
  });
});
