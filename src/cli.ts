/**
 * @module cli
 * @fileoverview url-summarizer CLI
 *
 * Summarizes one web page and prints the result as JSON.
 *
 * @example
 * # Summarize with the defaults (gemini-2.5-flash, 6 bullets, 180 words)
 * url-summarizer --url https://example.com/article
 *
 * # Shorter summary from another model, with debug logs on stderr
 * url-summarizer --url https://example.com/article --model gemini-2.5-pro \
 *   --bullets 3 --max-words 80 --verbose
 *
 * On any failure a message goes to stderr and the exit code is 1; nothing
 * is printed on stdout.
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import { config, type Env } from "./config.js";
import {
  DEFAULT_BULLETS,
  DEFAULT_MAX_WORDS,
  summarizeUrl,
} from "./summarizer/summarize-url.js";
import { formatError } from "./utils/errors.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { isFetchableUrl } from "./utils/url.js";
import { VERSION } from "./version.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  summarize?: typeof summarizeUrl;
  io?: CliIo;
  env?: Env;
  /** Replaces the stderr logger built from `--verbose`. */
  logger?: Logger;
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Options as typed on the command line; commander hands every value over as
 * a string.
 */
const CliOptionsSchema = z.object({
  url: z.string().refine(isFetchableUrl, "must be an absolute http or https URL"),
  model: z.string().min(1),
  bullets: z.coerce.number().int().positive(),
  maxWords: z.coerce.number().int().positive(),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Flag spelling of option keys that commander camel-cases. */
const FLAG_NAMES: Readonly<Record<string, string>> = { maxWords: "max-words" };

function createProgram(io: CliIo): Command {
  return new Command()
    .name("url-summarizer")
    .description("Fetch a web page and print a JSON abstract and bullet-point summary.")
    .version(VERSION)
    .requiredOption("--url <url>", "Page URL to summarize")
    .option("--model <name>", "Gemini model name", config.defaultModel)
    .option("--bullets <n>", "Maximum bullet points", String(DEFAULT_BULLETS))
    .option("--max-words <n>", "Soft word cap for the abstract", String(DEFAULT_MAX_WORDS))
    .option("-v, --verbose", "Enable debug logging on stderr")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

/**
 * Parse `argv` (user arguments only, no `node` or script path) into
 * validated options.
 *
 * @returns The options, or the exit code to stop with (help, version, or a
 *   usage error already reported on stderr).
 */
export function parseCliOptions(argv: readonly string[], io: CliIo): CliOptions | number {
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const result = CliOptionsSchema.safeParse(program.opts());
  if (!result.success) {
    for (const issue of result.error.issues) {
      const key = String(issue.path[0] ?? "option");
      io.stderr(`error: invalid --${FLAG_NAMES[key] ?? key}: ${issue.message}\n`);
    }
    return 1;
  }
  return result.data;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const summarize = deps.summarize ?? summarizeUrl;

  const options = parseCliOptions(argv, io);
  if (typeof options === "number") {
    return options;
  }

  const logger =
    deps.logger ?? createLogger("url-summarizer", options.verbose ? "debug" : config.logLevel);

  try {
    const summary = await summarize(options.url, {
      model: options.model,
      bullets: options.bullets,
      maxWords: options.maxWords,
      env: deps.env,
      logger,
    });
    io.stdout(`${JSON.stringify(summary, null, 2)}\n`);
    return 0;
  } catch (error) {
    logger.debug({ err: error }, "summarization failed");
    io.stderr(`${formatError(error)}\n`);
    return 1;
  }
}
