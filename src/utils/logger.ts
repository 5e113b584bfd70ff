/**
 * @module utils/logger
 * @fileoverview pino loggers for the CLI, the MCP server and the pipeline.
 */

import pino, { type Logger } from "pino";
import { config } from "../config.js";

export type { Logger };

/**
 * Create a logger instance writing JSON lines to stderr.
 *
 * stdout is reserved for the summary (CLI) or for JSON-RPC frames (MCP
 * server), so nothing may log there.
 *
 * @param name - Logger name
 * @param level - Log level (default: from `LOG_LEVEL` or "warn")
 */
export function createLogger(
  name: string = "url-summarizer",
  level: string = config.logLevel,
): Logger {
  return pino({ name, level }, pino.destination(2));
}

/**
 * Logger that discards everything. Used when a caller passes none.
 */
export const silentLogger: Logger = pino({ level: "silent" });
