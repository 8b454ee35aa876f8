/**
 * Command dispatch.
 *
 * Exit codes: 0 success, 1 a run with errors (or a failed revert write),
 * 2 invalid arguments or configuration.
 */

import { SyncError, SyncErrorCodes, errorMessage } from "@stockrecon/sync-core";
import { USAGE, parseCommandLine } from "./args.js";
import { runRevert } from "./commands/revert.js";
import { runSync } from "./commands/sync.js";
import type { CommandContext } from "./commands/context.js";

export const EXIT_CONFIGURATION = 2;

function describeFailure(error: unknown): string {
  if (SyncError.isSyncError(error)) {
    const issues = error.context?.["issues"];
    const details = Array.isArray(issues) ? issues.map((issue) => `  - ${String(issue)}`) : [];
    return [`${error.code}: ${error.message}`, ...details].join("\n");
  }
  return errorMessage(error);
}

/**
 * Run one command line to completion.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[], context: CommandContext): Promise<number> {
  try {
    const parsed = parseCommandLine(argv, context.env);
    switch (parsed.command) {
      case "help":
        context.print(USAGE);
        return 0;
      case "sync":
        return await runSync(parsed.options, context);
      case "revert":
        return await runRevert(parsed.options, context);
    }
  } catch (error) {
    context.print(describeFailure(error));
    if (SyncError.hasCode(error, SyncErrorCodes.CONFIGURATION_INVALID)) {
      if (error.context?.["usage"] === true) {
        context.print(USAGE);
      }
      return EXIT_CONFIGURATION;
    }
    return 1;
  }
}
