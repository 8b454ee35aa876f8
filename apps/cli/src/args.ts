/**
 * Command Line
 *
 * ```
 * stockrecon sync [--dry-run] [--force] [--supplier <name>]... [--limit <n>] [--eans <a,b>]
 * stockrecon revert <report.json> [--dry-run]
 * ```
 *
 * Shared: `--config-dir` (default `config`), `--log-dir` (default `logs`),
 * `--log-level` (default `LOG_LEVEL`, else INFO), `--env-file`.
 *
 * @module args
 */

import { parseArgs } from "node:util";
import {
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
  SyncError,
  SyncErrorCodes,
  errorMessage,
  isLogLevel,
  parseLogLevel,
  type LogLevel,
} from "@stockrecon/sync-core";
import type { Environment } from "@stockrecon/connectors";

export const USAGE = `Usage:
  stockrecon sync [options]
  stockrecon revert <report.json> [--dry-run]

Sync options:
  --dry-run            Compute and report every decision without writing
  --force              Disable safety checks
  --supplier <name>    Only this supplier (repeatable)
  --limit <n>          At most n records or lookups per supplier
  --eans <a,b,...>     Only these EANs

Common options:
  --config-dir <dir>   Configuration directory (default: config)
  --log-dir <dir>      Report directory (default: logs)
  --log-level <level>  ${LOG_LEVELS.join(" | ")} (default: LOG_LEVEL or ${DEFAULT_LOG_LEVEL})
  --env-file <file>    Environment file (default: .env)
  -h, --help           Show this help`;

export interface CommonOptions {
  configDir: string;
  logDir: string;
  logLevel: LogLevel;
  envFile: string;
}

export interface SyncCommandOptions extends CommonOptions {
  dryRun: boolean;
  force: boolean;
  suppliers: string[];
  limit: number | undefined;
  eans: string[];
}

export interface RevertCommandOptions extends CommonOptions {
  reportPath: string;
  dryRun: boolean;
}

export type ParsedCommand =
  | { command: "sync"; options: SyncCommandOptions }
  | { command: "revert"; options: RevertCommandOptions }
  | { command: "help" };

function usageError(message: string): SyncError {
  return new SyncError(SyncErrorCodes.CONFIGURATION_INVALID, message, { usage: true });
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw usageError(`--limit must be a positive integer, got "${value}"`);
  }
  return limit;
}

function parseLevel(value: string | undefined, env: Environment): LogLevel {
  if (value === undefined) {
    return parseLogLevel(env["LOG_LEVEL"]);
  }
  const upper = value.trim().toUpperCase();
  if (!isLogLevel(upper)) {
    throw usageError(`--log-level must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return upper;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        "dry-run": { type: "boolean" },
        force: { type: "boolean" },
        supplier: { type: "string", multiple: true },
        limit: { type: "string" },
        eans: { type: "string" },
        "config-dir": { type: "string" },
        "log-dir": { type: "string" },
        "log-level": { type: "string" },
        "env-file": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw usageError(errorMessage(error));
  }
}

/**
 * @throws SyncError CONFIGURATION_INVALID (context `usage: true`) on bad arguments
 */
export function parseCommandLine(argv: readonly string[], env: Environment = {}): ParsedCommand {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;

  if (values.help === true || command === undefined || command === "help") {
    return { command: "help" };
  }

  const common: CommonOptions = {
    configDir: values["config-dir"] ?? "config",
    logDir: values["log-dir"] ?? "logs",
    logLevel: parseLevel(values["log-level"], env),
    envFile: values["env-file"] ?? ".env",
  };

  switch (command) {
    case "sync":
      if (rest.length > 0) {
        throw usageError(`Unexpected argument "${rest.join(" ")}"`);
      }
      return {
        command: "sync",
        options: {
          ...common,
          dryRun: values["dry-run"] === true,
          force: values.force === true,
          suppliers: values.supplier ?? [],
          limit: parseLimit(values.limit),
          eans: (values.eans ?? "")
            .split(",")
            .map((ean) => ean.trim())
            .filter((ean) => ean !== ""),
        },
      };
    case "revert": {
      const [reportPath, ...extra] = rest;
      if (reportPath === undefined) {
        throw usageError("revert needs the path of a sync report");
      }
      if (extra.length > 0) {
        throw usageError(`Unexpected argument "${extra.join(" ")}"`);
      }
      return { command: "revert", options: { ...common, reportPath, dryRun: values["dry-run"] === true } };
    }
    default:
      throw usageError(`Unknown command "${command}"`);
  }
}
