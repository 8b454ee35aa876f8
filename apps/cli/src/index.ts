/**
 * @stockrecon/cli
 *
 * Command-line surface: argument parsing, configuration loading and the
 * `sync` and `revert` commands.
 */

export { main, EXIT_CONFIGURATION } from "./main.js";
export {
  parseCommandLine,
  USAGE,
  type ParsedCommand,
  type SyncCommandOptions,
  type RevertCommandOptions,
  type CommonOptions,
} from "./args.js";
export {
  loadAppConfig,
  loadSuppliersConfig,
  loadShopifyConfig,
  loadEmailConfig,
  readConfigFile,
  type AppConfig,
} from "./config/load-config.js";
export { runSync } from "./commands/sync.js";
export { runRevert, formatRevertSummary } from "./commands/revert.js";
export type { CommandContext } from "./commands/context.js";
