#!/usr/bin/env node
/**
 * @module index
 * @fileoverview url-summarizer MCP server entry point.
 *
 * Creates an {@link McpServer}, registers the `summarize_url` tool, and
 * listens on stdio transport.
 *
 * ## Startup Flow
 * 1. Load `.env` into `process.env` (dotenv)
 * 2. Create the {@link McpServer} instance with name and version
 * 3. Register `summarize_url`
 * 4. Connect via {@link StdioServerTransport}
 *
 * ```
 * MCP Client
 *   |
 *   | stdio (JSON-RPC over stdin/stdout)
 *   v
 * index.ts (this file) -- McpServer
 *   |
 *   +-- summarize_url --> summarizer/summarize-url.ts --> extractor/pipeline.ts
 * ```
 *
 * Logs go to stderr; stdout carries only JSON-RPC frames.
 */
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { SummarizeUrlSchema, createSummarizeUrlHandler } from "./tools/summarize-url.js";
import { summarizeUrl } from "./summarizer/summarize-url.js";
import { createLogger } from "./utils/logger.js";
import { VERSION } from "./version.js";

const logger = createLogger("url-summarizer-mcp");

const server = new McpServer(
  {
    name: "url-summarizer",
    version: VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

/**
 * Tool: summarize_url
 *
 * Fetches a page, strips it to readable text, and returns a JSON abstract
 * plus bullet points produced by Gemini.
 */
server.tool(
  "summarize_url",
  "Fetch a web page and summarize it. Returns JSON with title, url, a short abstract and key-point bullets.",
  SummarizeUrlSchema,
  createSummarizeUrlHandler(summarizeUrl, logger),
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ version: VERSION }, "url-summarizer MCP server listening on stdio");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "server error");
  process.exit(1);
});
