/**
 * Revert
 *
 * Restores the quantities a run overwrote. Applied `update` entries are
 * replayed newest first, each writing its `oldQty` back, so an item updated
 * twice in one run ends at the quantity it had before the run.
 *
 * @module revert
 */

import type { CatalogClient } from "./collaborators.js";
import { errorMessage } from "./errors.js";
import { createNoOpLogger } from "./logging/scoped.js";
import type { Logger } from "./logging/types.js";
import type { SyncRunReport, UpdateEntry } from "./report/schema.js";

export interface RevertOptions {
  /** Report what would be written without writing */
  dryRun?: boolean;
  logger?: Logger | undefined;
}

export type RevertStatus = "reverted" | "previewed" | "failed";

export interface RevertResult {
  itemId: string;
  locationId: string;
  /** Quantity the run wrote */
  fromQty: number;
  /** Quantity restored */
  toQty: number;
  status: RevertStatus;
  message?: string;
}

export interface RevertSummary {
  runId: string;
  dryRun: boolean;
  reverted: number;
  previewed: number;
  /** Update entries that were never applied (preview-mode reports) */
  skipped: number;
  failed: number;
  results: RevertResult[];
}

/**
 * Replay a report's applied updates in reverse.
 *
 * @example
 * ```typescript
 * const report = await FileReportStore.load("logs/sync_2026-01-15_09-05-03.json");
 * const summary = await revertReport(report, shopify, { dryRun: true });
 * ```
 */
export async function revertReport(
  report: SyncRunReport,
  catalog: CatalogClient,
  options: RevertOptions = {}
): Promise<RevertSummary> {
  const dryRun = options.dryRun ?? false;
  const logger = options.logger ?? createNoOpLogger();

  const updates = report.entries.filter((entry): entry is UpdateEntry => entry.type === "update");
  const applied = updates.filter((entry) => entry.applied);
  const summary: RevertSummary = {
    runId: report.runId,
    dryRun,
    reverted: 0,
    previewed: 0,
    skipped: updates.length - applied.length,
    failed: 0,
    results: [],
  };

  logger.info("Reverting run", {
    runId: report.runId,
    updates: applied.length,
    skipped: summary.skipped,
    dryRun,
  });

  for (const entry of [...applied].reverse()) {
    const base = {
      itemId: entry.itemId,
      locationId: entry.locationId,
      fromQty: entry.newQty,
      toQty: entry.oldQty,
    };
    if (dryRun) {
      summary.previewed++;
      summary.results.push({ ...base, status: "previewed" });
      continue;
    }
    try {
      await catalog.updateQuantity(entry.locationId, entry.itemId, entry.oldQty);
      summary.reverted++;
      summary.results.push({ ...base, status: "reverted" });
      logger.debug("Quantity restored", base);
    } catch (error) {
      summary.failed++;
      summary.results.push({ ...base, status: "failed", message: errorMessage(error) });
      logger.error("Quantity restore failed", { ...base, error: errorMessage(error) });
    }
  }

  logger.report("Revert finished", {
    runId: report.runId,
    dryRun,
    reverted: summary.reverted,
    previewed: summary.previewed,
    skipped: summary.skipped,
    failed: summary.failed,
  });
  return summary;
}
