/**
 * Human-readable renderings of a run report: the end-of-run summary printed
 * by the CLI and the plain-text notification body.
 *
 * @module report/format
 */

import { formatIdentifier } from "@stockrecon/recon-decider";
import type { ErrorEntry, FlaggedEntry, NotFoundEntry, SyncRunReport } from "./schema.js";

function describeMode(report: SyncRunReport): string {
  const parts = [report.mode.dryRun ? "dry run" : "live"];
  if (report.mode.force) parts.push("force");
  return parts.join(", ");
}

/**
 * Summary block with a count for every report category.
 *
 * @example
 * ```text
 * Sync run 0190a7c4-... completed (dry run)
 * Suppliers: acme, nordic
 * Catalog items: 3 (unreachable: 0, duplicate identifiers: 1)
 * Supplier records: 3
 * Matched: 2
 * ...
 * ```
 */
export function formatSummary(report: SyncRunReport): string {
  const { summary, catalog } = report;
  const suppliers =
    report.suppliersProcessed.length > 0 ? report.suppliersProcessed.join(", ") : "none";
  return [
    `Sync run ${report.runId} ${report.status} (${describeMode(report)})`,
    `Suppliers: ${suppliers}`,
    `Catalog items: ${catalog.totalItems} (unreachable: ${catalog.unreachableItems.length}, duplicate identifiers: ${catalog.duplicateIdentifiers.length})`,
    `Supplier records: ${summary.totalSupplierRecords}`,
    `Matched: ${summary.matched}`,
    `Updated: ${summary.updated}`,
    `No change: ${summary.noChange}`,
    `Not found: ${summary.notFound}`,
    `Duplicates: ${summary.duplicates}`,
    `Flagged: ${summary.flagged}`,
    `Errors: ${summary.errors}`,
  ].join("\n");
}

/**
 * How many entries of each kind the detail sections list.
 */
export interface DetailLimits {
  notFound: number;
  flagged: number;
  errors: number;
}

export const DEFAULT_DETAIL_LIMITS: DetailLimits = {
  notFound: 20,
  flagged: 20,
  errors: 10,
};

function section<T>(
  heading: string,
  items: readonly T[],
  limit: number,
  render: (item: T) => string
): string[] {
  if (items.length === 0) return [];
  const lines = ["", `${heading} (${items.length}):`];
  for (const item of items.slice(0, limit)) {
    lines.push(`  - ${render(item)}`);
  }
  if (items.length > limit) {
    lines.push(`  ... and ${items.length - limit} more`);
  }
  return lines;
}

function renderNotFound(entry: NotFoundEntry): string {
  return `[${entry.supplier}] ${formatIdentifier(entry.ean, entry.sku)} (status: ${entry.rawStatus})`;
}

function renderFlagged(entry: FlaggedEntry): string {
  const name = entry.title ?? entry.itemId;
  return `[${entry.supplier}] ${name}: ${entry.oldQty} -> ${entry.newQty} (${entry.reason})`;
}

function renderError(entry: ErrorEntry): string {
  const subject = entry.ean !== null || entry.sku !== null ? ` ${formatIdentifier(entry.ean, entry.sku)}` : "";
  return `[${entry.supplier}] ${entry.errorType}${subject}: ${entry.message}`;
}

/**
 * Plain-text report: the summary followed by the first not-found, flagged
 * and error entries.
 */
export function formatReportText(
  report: SyncRunReport,
  limits: DetailLimits = DEFAULT_DETAIL_LIMITS
): string {
  const notFound = report.entries.filter((e): e is NotFoundEntry => e.type === "not_found");
  const flagged = report.entries.filter((e): e is FlaggedEntry => e.type === "flagged");
  const errors = report.entries.filter((e): e is ErrorEntry => e.type === "error");

  return [
    formatSummary(report),
    ...section("Not found on catalog", notFound, limits.notFound, renderNotFound),
    ...section("Flagged for review", flagged, limits.flagged, renderFlagged),
    ...section("Errors", errors, limits.errors, renderError),
  ].join("\n");
}
