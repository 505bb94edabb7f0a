#!/usr/bin/env node
/**
 * Compactor CLI
 *
 * Remove intermediate build pages from slide decks exported as PDF.
 *
 * Usage:
 *   npm run compact -- <input_path>          Compact a PDF, or every PDF in a directory
 *   npm run compact -- inspect <pdf_path>    Print slide snapshots and the pages that would be kept
 */

import { runCli } from "./commands";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("\nCompaction failed:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
