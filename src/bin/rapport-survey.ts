#!/usr/bin/env node
// CLI entry point for rapport-survey

import { parseCliArgs } from "../config.js";
import { runCommand } from "./commands.js";

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));
  return runCommand(args);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  },
);
