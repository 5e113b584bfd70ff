/** @fileoverview Package version reported by the CLI and the MCP server. */
export const VERSION = "1.0.0";
