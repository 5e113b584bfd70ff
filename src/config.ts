/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * All settings have defaults, so the only thing a user must provide is the
 * model credential. Every tunable value of the pipeline flows through this
 * module; it imports nothing from the application except the error classes.
 *
 * ```
 *  +-----------+   +------------+   +-----------+
 *  |  cli/mcp  |   | summarizer |   | services  |
 *  +-----+-----+   +-----+------+   +-----+-----+
 *        |               |                |
 *        +-------+-------+--------+-------+
 *                |                |
 *          +-----v-----+    +-----v-----+
 *          |  config   |    |   utils   |
 *          +-----------+    +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`; a value that does not
 *   parse falls back to the default.
 *
 * Entry points load a `.env` file into `process.env` (via dotenv) before this
 * module is evaluated, so values from the file and from the shell behave the
 * same.
 *
 * @example
 * ```ts
 * import { config, loadConfig } from "./config.js";
 * config.fetchTimeout; // 20000 unless FETCH_TIMEOUT says otherwise
 *
 * const testConfig = loadConfig({ FETCH_TIMEOUT: "5000" });
 * testConfig.fetchTimeout; // 5000
 * ```
 */

import { ConfigError } from "./utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** Environment shape read by this module. */
export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Page fetch timeout in milliseconds.
   *
   * @default 20000
   */
  fetchTimeout: number;

  /**
   * Maximum allowed response body size in bytes.
   *
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * User-Agent header sent with the page request. Some sites refuse
   * requests that do not look like a browser.
   *
   * @default "Mozilla/5.0 (Summarizer)"
   */
  userAgent: string;

  /**
   * Accept-Language header sent with the page request.
   *
   * @default "en"
   */
  acceptLanguage: string;

  /**
   * Gemini model used when the caller names none.
   *
   * @default "gemini-2.5-flash"
   */
  defaultModel: string;

  /**
   * pino log level for the CLI and the MCP server.
   *
   * @default "warn"
   */
  logLevel: string;
}

/** Name of the environment variable holding the Gemini credential. */
export const API_KEY_VARIABLE = "GEMINI_API_KEY";

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Pure: reads `env` at call time and returns a plain object.
 *
 * @param env - Source of variables; `process.env` by default.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    fetchTimeout: readInt(env.FETCH_TIMEOUT, 20000),
    maxResponseSize: readInt(env.MAX_RESPONSE_SIZE, 10485760),
    userAgent: env.USER_AGENT ?? "Mozilla/5.0 (Summarizer)",
    acceptLanguage: env.ACCEPT_LANGUAGE ?? "en",
    defaultModel: env.SUMMARIZER_MODEL ?? "gemini-2.5-flash",
    logLevel: env.LOG_LEVEL ?? "warn",
  };
}

/**
 * Return the Gemini API key, failing the run when it is absent.
 *
 * An empty string counts as absent.
 *
 * @throws {ConfigError} If `GEMINI_API_KEY` is unset or empty.
 */
export function loadApiKey(env: Env = process.env): string {
  const key = env[API_KEY_VARIABLE];
  if (!key) {
    throw new ConfigError(`set ${API_KEY_VARIABLE} in .env`);
  }
  return key;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration snapshot taken at module load time.
 *
 * Call {@link loadConfig} directly for a fresh snapshot (e.g., in tests).
 */
export const config: AppConfig = loadConfig();
