/**
 * `stockrecon revert <report.json>`
 *
 * Writes back the quantities a persisted run overwrote.
 *
 * @module commands/revert
 */

import { ShopifyCatalogClient } from "@stockrecon/connectors";
import {
  FileReportStore,
  createChildLogger,
  createScopedLogger,
  revertReport,
  type RevertResult,
  type RevertSummary,
} from "@stockrecon/sync-core";
import type { RevertCommandOptions } from "../args.js";
import { loadShopifyConfig } from "../config/load-config.js";
import type { CommandContext } from "./context.js";

function formatResult(result: RevertResult): string {
  const line = `  ${result.status} ${result.itemId} @ ${result.locationId}: ${result.fromQty} -> ${result.toQty}`;
  return result.message === undefined ? line : `${line} (${result.message})`;
}

export function formatRevertSummary(summary: RevertSummary): string {
  const heading = summary.dryRun
    ? `Revert preview of run ${summary.runId}`
    : `Revert of run ${summary.runId}`;
  return [
    heading,
    ...summary.results.map(formatResult),
    `Reverted: ${summary.reverted}, previewed: ${summary.previewed}, skipped: ${summary.skipped}, failed: ${summary.failed}`,
  ].join("\n");
}

/**
 * @returns Process exit code: 1 when any write failed
 */
export async function runRevert(
  options: RevertCommandOptions,
  context: CommandContext
): Promise<number> {
  const report = await FileReportStore.load(options.reportPath);
  const shopify = await loadShopifyConfig(options.configDir, context.env);
  const catalog = new ShopifyCatalogClient(shopify, {
    fetch: context.fetch,
    sleep: context.sleep,
    logger: createChildLogger("Revert", "Shopify", options.logLevel),
  });

  const summary = await revertReport(report, catalog, {
    dryRun: options.dryRun,
    logger: createScopedLogger("Revert", options.logLevel),
  });

  context.print(formatRevertSummary(summary));
  return summary.failed > 0 ? 1 : 0;
}
