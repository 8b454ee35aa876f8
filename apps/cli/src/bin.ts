#!/usr/bin/env npx tsx
/**
 * stockrecon executable.
 *
 * Usage: npx tsx apps/cli/src/bin.ts sync --dry-run
 */

import dotenv from "dotenv";
import { main } from "./main.js";

function envFileArgument(argv: readonly string[]): string {
  const index = argv.indexOf("--env-file");
  return (index >= 0 ? argv[index + 1] : undefined) ?? ".env";
}

const argv = process.argv.slice(2);
dotenv.config({ path: envFileArgument(argv) });

process.exitCode = await main(argv, {
  env: process.env,
  print: (text) => {
    process.stdout.write(`${text}\n`);
  },
});
