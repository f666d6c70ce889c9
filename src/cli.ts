#!/usr/bin/env node
/**
 * query-stats CLI entry point.
 *
 * Uses node:util parseArgs for argument parsing.
 */
import { runCli } from "./commands/analyze";

runCli(process.argv.slice(2), {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("query-stats failed:", error);
    process.exit(1);
  });
