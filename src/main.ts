#!/usr/bin/env node
/**
 * @module main
 * @fileoverview `url-summarizer` executable: loads `.env` and runs the CLI.
 */
import "dotenv/config";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
