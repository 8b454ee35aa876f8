/**
 * Report Builder
 *
 * The only mutable state of a run. The orchestrator owns one builder,
 * appends entries in run order, and calls `finalize` once; the summary is
 * derived from the entries at that point so counts and entries cannot
 * disagree.
 *
 * @module report/builder
 */

import type {
  ApplyDecision,
  CatalogIndex,
  DuplicateConflict,
  FlaggedDecision,
  Matched,
  NoChangeDecision,
  SupplierRecord,
} from "@stockrecon/recon-decider";
import type { UnknownRecord } from "../types.js";
import {
  REPORT_VERSION,
  type CatalogSection,
  type ErrorEntry,
  type ReportEntry,
  type ReportErrorType,
  type ReportSummary,
  type RunStatus,
  type SyncRunReport,
} from "./schema.js";

export interface ReportBuilderOptions {
  runId: string;
  startedAt: Date;
  dryRun: boolean;
  force: boolean;
}

/**
 * Input for an `error` entry.
 */
export interface ErrorEntryInput {
  supplier: string;
  errorType: ReportErrorType;
  message: string;
  ean?: string | null | undefined;
  sku?: string | null | undefined;
  itemId?: string | undefined;
  locationId?: string | undefined;
  oldQty?: number | undefined;
  newQty?: number | undefined;
  context?: UnknownRecord | undefined;
}

/**
 * Supplier-less source name used for catalog-level errors.
 */
export const CATALOG_SOURCE = "catalog";

const EMPTY_CATALOG: CatalogSection = {
  totalItems: 0,
  unreachableItems: [],
  duplicateIdentifiers: [],
};

/**
 * Derive summary counts from the entry list.
 *
 * `matched` counts every entry whose record resolved in the catalog: updates,
 * no-changes, flags, duplicates, and writes that failed after matching.
 */
export function summarizeEntries(
  entries: readonly ReportEntry[],
  totalSupplierRecords: number
): ReportSummary {
  const summary: ReportSummary = {
    totalSupplierRecords,
    matched: 0,
    updated: 0,
    noChange: 0,
    notFound: 0,
    duplicates: 0,
    flagged: 0,
    errors: 0,
  };
  for (const entry of entries) {
    switch (entry.type) {
      case "update":
        summary.updated++;
        summary.matched++;
        break;
      case "no_change":
        summary.noChange++;
        summary.matched++;
        break;
      case "flagged":
        summary.flagged++;
        summary.matched++;
        break;
      case "duplicate":
        summary.duplicates++;
        summary.matched++;
        break;
      case "not_found":
        summary.notFound++;
        break;
      case "error":
        summary.errors++;
        if (entry.errorType === "catalog_write") summary.matched++;
        break;
    }
  }
  return summary;
}

export class ReportBuilder {
  private readonly entries: ReportEntry[] = [];
  private readonly suppliers: string[] = [];
  private catalog: CatalogSection = EMPTY_CATALOG;
  private totalSupplierRecords = 0;
  private finalized: SyncRunReport | null = null;

  constructor(private readonly options: ReportBuilderOptions) {}

  get runId(): string {
    return this.options.runId;
  }

  /**
   * Record the catalog pre-scan: size, unreachable items, duplicate identifiers.
   */
  recordCatalog(index: CatalogIndex): void {
    this.catalog = {
      totalItems: index.items.length,
      unreachableItems: index.unreachable.map((item) =>
        item.title === undefined ? { itemId: item.itemId } : { itemId: item.itemId, title: item.title }
      ),
      duplicateIdentifiers: index.duplicates().map((duplicate) => ({
        identifier: duplicate.identifier,
        type: duplicate.type,
        itemIds: duplicate.items.map((item) => item.itemId),
      })),
    };
  }

  beginSupplier(name: string): void {
    this.suppliers.push(name);
  }

  addSupplierRecords(count: number): void {
    this.totalSupplierRecords += count;
  }

  recordUpdate(match: Matched, decision: ApplyDecision, applied: boolean): void {
    this.push({
      type: "update",
      ...recordIdentity(match.supplierRecord),
      itemId: decision.itemId,
      locationId: decision.locationId,
      title: match.catalogItem.title,
      matchedBy: match.matchedBy,
      oldQty: decision.oldQty,
      newQty: decision.newQty,
      change: decision.newQty - decision.oldQty,
      applied,
    });
  }

  recordNoChange(match: Matched, decision: NoChangeDecision): void {
    this.push({
      type: "no_change",
      ...recordIdentity(match.supplierRecord),
      itemId: decision.itemId,
      title: match.catalogItem.title,
      matchedBy: match.matchedBy,
      oldQty: decision.oldQty,
    });
  }

  recordFlagged(match: Matched, decision: FlaggedDecision): void {
    this.push({
      type: "flagged",
      ...recordIdentity(match.supplierRecord),
      itemId: decision.itemId,
      locationId: match.catalogItem.locationId,
      title: match.catalogItem.title,
      matchedBy: match.matchedBy,
      oldQty: decision.oldQty,
      newQty: decision.newQty,
      change: decision.newQty - decision.oldQty,
      reason: decision.reasonCode,
    });
  }

  recordNotFound(record: SupplierRecord): void {
    this.push({
      type: "not_found",
      ...recordIdentity(record),
      newQty: record.quantity,
      rawStatus: record.rawStatus,
    });
  }

  recordDuplicate(conflict: DuplicateConflict): void {
    const candidateItemIds = conflict.candidateCatalogItems.map((item) => item.itemId);
    this.push({
      type: "duplicate",
      ...recordIdentity(conflict.supplierRecord),
      matchedBy: conflict.matchedBy,
      identifier: conflict.identifier,
      candidateItemIds,
      newQty: conflict.supplierRecord.quantity,
      reason: `${conflict.matchedBy.toUpperCase()} ${conflict.identifier} matches ${candidateItemIds.length} catalog items`,
    });
  }

  recordError(input: ErrorEntryInput): void {
    const entry: ErrorEntry = {
      type: "error",
      supplier: input.supplier,
      ean: input.ean ?? null,
      sku: input.sku ?? null,
      errorType: input.errorType,
      message: input.message,
    };
    if (input.itemId !== undefined) entry.itemId = input.itemId;
    if (input.locationId !== undefined) entry.locationId = input.locationId;
    if (input.oldQty !== undefined) entry.oldQty = input.oldQty;
    if (input.newQty !== undefined) entry.newQty = input.newQty;
    if (input.context !== undefined) entry.context = input.context;
    this.push(entry);
  }

  /**
   * Freeze the report. Subsequent calls return the same report.
   */
  finalize(status: RunStatus, finishedAt: Date): SyncRunReport {
    if (this.finalized) {
      return this.finalized;
    }
    const entries = [...this.entries];
    this.finalized = deepFreeze({
      version: REPORT_VERSION,
      runId: this.options.runId,
      startedAt: this.options.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      status,
      mode: { dryRun: this.options.dryRun, force: this.options.force },
      suppliersProcessed: [...this.suppliers],
      summary: summarizeEntries(entries, this.totalSupplierRecords),
      catalog: this.catalog,
      entries,
    });
    return this.finalized;
  }

  private push(entry: ReportEntry): void {
    if (this.finalized) {
      throw new Error(`Report ${this.options.runId} is already finalized`);
    }
    this.entries.push(entry);
  }
}

function recordIdentity(record: SupplierRecord): {
  supplier: string;
  ean: string | null;
  sku: string | null;
} {
  return { supplier: record.supplierName, ean: record.ean, sku: record.sku };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
