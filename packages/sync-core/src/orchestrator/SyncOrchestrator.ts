/**
 * ## Sync Orchestrator
 *
 * Drives one reconciliation run: catalog snapshot, then every selected
 * supplier in turn against the same frozen index, then report, persistence
 * and notification.
 *
 * Failure isolation:
 * - catalog snapshot failure aborts the run (report status `aborted`)
 * - authentication and fetch failures skip that supplier only
 * - invalid records and failed writes become error entries; the run continues
 * - persistence and notification failures are logged
 *
 * @example
 * ```typescript
 * const orchestrator = new SyncOrchestrator({
 *   catalog: shopify,
 *   suppliers: [acme, nordic],
 *   statusMapping: config.statusMapping,
 *   reportStore: new FileReportStore("logs"),
 *   logger: createScopedLogger("Sync", "INFO"),
 * });
 * const outcome = await orchestrator.run({ dryRun: true });
 * process.exitCode = outcome.exitCode;
 * ```
 *
 * @module orchestrator/SyncOrchestrator
 */

import { v7 as uuidv7 } from "uuid";
import {
  assertNever,
  buildCatalogIndex,
  evaluateSafety,
  normalizeIdentifier,
  normalizeStatusMapping,
  partitionSupplierRecords,
  reconcile,
  resolveQuantity,
  resolveSafetyConfig,
  type CatalogIndex,
  type CatalogItem,
  type Matched,
  type MatchResult,
  type SafetyConfig,
  type StatusMapping,
  type SupplierRecord,
} from "@stockrecon/recon-decider";
import type {
  CatalogClient,
  Notifier,
  RawSupplierRecord,
  ReportStore,
  SupplierConnector,
} from "../collaborators.js";
import { errorMessage, SyncError, SyncErrorCodes } from "../errors.js";
import { createNoOpLogger } from "../logging/scoped.js";
import type { Logger } from "../logging/types.js";
import {
  DEFAULT_NOTIFICATION_POLICY,
  shouldNotify,
  type NotificationPolicy,
} from "../notification/policy.js";
import { CATALOG_SOURCE, ReportBuilder } from "../report/builder.js";
import type { ReportErrorType, RunStatus, SyncRunReport } from "../report/schema.js";
import type { UnknownRecord } from "../types.js";
import { withTimeout } from "./timeout.js";

/**
 * `rawStatus` of the zero-quantity records added for identifiers a lookup
 * supplier did not return.
 */
export const NOT_FOUND_ON_SUPPLIER = "not_found_on_supplier";

export const DEFAULT_FETCH_TIMEOUT_MS = 120_000;

// =============================================================================
// Configuration
// =============================================================================

export interface SyncOrchestratorConfig {
  catalog: CatalogClient;
  /** Enabled suppliers, in processing order */
  suppliers: readonly SupplierConnector[];
  /** Status text to quantity; keys are matched case-insensitively */
  statusMapping?: Readonly<Record<string, number>> | undefined;
  safetyLimits?:
    | Partial<Pick<SafetyConfig, "maxQuantityDropPercent" | "minQuantityForZeroCheck">>
    | undefined;
  fetchTimeoutMs?: number | undefined;
  reportStore?: ReportStore | undefined;
  notifier?: Notifier | undefined;
  notificationPolicy?: NotificationPolicy | undefined;
  logger?: Logger | undefined;
  /** Clock, for deterministic reports in tests */
  now?: (() => Date) | undefined;
  generateRunId?: (() => string) | undefined;
}

export interface SyncRunOptions {
  /** Compute and report every decision without writing to the catalog */
  dryRun?: boolean;
  /** Disable safety checks: every delta becomes an update */
  force?: boolean;
  /** Restrict the run to these supplier names (case-insensitive) */
  suppliers?: readonly string[];
  /** Process at most this many records (or lookups) per supplier */
  limit?: number;
  /** Process only records (or lookups) for these EANs */
  eans?: readonly string[];
}

export interface SyncOutcome {
  report: SyncRunReport;
  /** Where the report was persisted; null without a store or on failure */
  reportLocation: string | null;
  notified: boolean;
  /** 1 when the run aborted, recorded any error entry, or could not be persisted */
  exitCode: 0 | 1;
}

interface RunContext {
  readonly builder: ReportBuilder;
  readonly index: CatalogIndex;
  readonly safety: SafetyConfig;
  readonly dryRun: boolean;
  readonly limit: number | undefined;
  readonly eanFilter: ReadonlySet<string> | null;
}

function errorContext(error: unknown): UnknownRecord | undefined {
  if (SyncError.isSyncError(error)) {
    return { code: error.code, ...error.context };
  }
  return undefined;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class SyncOrchestrator {
  private readonly catalog: CatalogClient;
  private readonly suppliers: readonly SupplierConnector[];
  private readonly statusMapping: StatusMapping;
  private readonly safetyLimits: Partial<SafetyConfig>;
  private readonly fetchTimeoutMs: number;
  private readonly reportStore: ReportStore | undefined;
  private readonly notifier: Notifier | undefined;
  private readonly notificationPolicy: NotificationPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateRunId: () => string;

  constructor(config: SyncOrchestratorConfig) {
    this.catalog = config.catalog;
    this.suppliers = config.suppliers;
    this.statusMapping = normalizeStatusMapping(config.statusMapping ?? {});
    this.safetyLimits = config.safetyLimits ?? {};
    this.fetchTimeoutMs = config.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.reportStore = config.reportStore;
    this.notifier = config.notifier;
    this.notificationPolicy = config.notificationPolicy ?? DEFAULT_NOTIFICATION_POLICY;
    this.logger = config.logger ?? createNoOpLogger();
    this.now = config.now ?? (() => new Date());
    this.generateRunId = config.generateRunId ?? (() => uuidv7());
  }

  async run(options: SyncRunOptions = {}): Promise<SyncOutcome> {
    const dryRun = options.dryRun ?? false;
    const force = options.force ?? false;
    const builder = new ReportBuilder({
      runId: this.generateRunId(),
      startedAt: this.now(),
      dryRun,
      force,
    });
    this.logger.info("Sync run started", { runId: builder.runId, dryRun, force });

    let items: readonly CatalogItem[];
    try {
      items = await this.catalog.listItems();
    } catch (error) {
      this.logger.error("Catalog snapshot failed, aborting run", { error: errorMessage(error) });
      builder.recordError({
        supplier: CATALOG_SOURCE,
        errorType: "catalog_snapshot",
        message: `Catalog snapshot failed: ${errorMessage(error)}`,
        context: errorContext(error),
      });
      return this.finish(builder, "aborted");
    }

    const index = buildCatalogIndex(items);
    builder.recordCatalog(index);
    this.logCatalog(index);

    const eanFilter = options.eans
      ? new Set(options.eans.map(normalizeIdentifier).filter((e): e is string => e !== null))
      : null;
    const context: RunContext = {
      builder,
      index,
      safety: resolveSafetyConfig({ ...this.safetyLimits, enableSafetyChecks: !force }),
      dryRun,
      limit: options.limit,
      eanFilter: eanFilter && eanFilter.size > 0 ? eanFilter : null,
    };

    for (const connector of this.selectSuppliers(options.suppliers)) {
      await this.processSupplier(connector, context);
    }

    return this.finish(builder, "completed");
  }

  // ---------------------------------------------------------------------------
  // Suppliers
  // ---------------------------------------------------------------------------

  private selectSuppliers(filter: readonly string[] | undefined): readonly SupplierConnector[] {
    if (!filter || filter.length === 0) {
      return this.suppliers;
    }
    const known = new Set(this.suppliers.map((c) => c.name.toLowerCase()));
    for (const name of filter) {
      if (!known.has(name.toLowerCase())) {
        this.logger.warn("Supplier filter names an unknown or disabled supplier", {
          supplier: name,
        });
      }
    }
    const wanted = new Set(filter.map((name) => name.toLowerCase()));
    return this.suppliers.filter((c) => wanted.has(c.name.toLowerCase()));
  }

  private async processSupplier(connector: SupplierConnector, run: RunContext): Promise<void> {
    run.builder.beginSupplier(connector.name);
    this.logger.info("Processing supplier", { supplier: connector.name, kind: connector.kind });
    try {
      await this.syncSupplier(connector, run);
    } finally {
      await this.closeConnector(connector);
    }
  }

  private async syncSupplier(connector: SupplierConnector, run: RunContext): Promise<void> {
    const supplier = connector.name;

    try {
      await connector.authenticate();
    } catch (error) {
      this.recordSupplierFailure(run, supplier, "authentication", error);
      return;
    }

    const eans = connector.kind === "lookup" ? this.lookupEans(run) : [];
    let raw: readonly RawSupplierRecord[];
    try {
      raw = await withTimeout(
        (signal) => connector.fetchInventory({ eans, signal }),
        this.fetchTimeoutMs,
        `${supplier} inventory fetch`
      );
    } catch (error) {
      this.recordSupplierFailure(run, supplier, "fetch", error);
      return;
    }

    let records: SupplierRecord[];
    if (connector.kind === "lookup") {
      if (raw.length === 0 && eans.length > 0) {
        // Zero-filling every identifier here would empty the catalog.
        this.recordSupplierFailure(
          run,
          supplier,
          "fetch",
          new SyncError(
            SyncErrorCodes.SUPPLIER_EMPTY_RESULT,
            `Supplier returned none of the ${eans.length} requested identifiers`,
            { requested: eans.length }
          )
        );
        return;
      }
      const missing = this.missingLookups(supplier, raw, eans);
      run.builder.addSupplierRecords(missing.length);
      records = [...this.resolveRecords(supplier, raw, run), ...missing];
    } else {
      records = this.resolveRecords(supplier, this.filterFeed(raw, run), run);
    }

    this.logger.info("Supplier records fetched", { supplier, received: raw.length });

    const { valid, invalid } = partitionSupplierRecords(records);
    for (const record of invalid) {
      run.builder.recordError({
        supplier,
        errorType: "invalid_record",
        message: "Record has neither EAN nor SKU",
        ean: record.ean,
        sku: record.sku,
        context: { rawStatus: record.rawStatus },
      });
    }
    if (invalid.length > 0) {
      this.logger.warn("Records without identifiers excluded", {
        supplier,
        count: invalid.length,
      });
    }

    for (const result of reconcile(valid, run.index)) {
      await this.handleResult(result, run);
    }
  }

  private lookupEans(run: RunContext): string[] {
    const filter = run.eanFilter;
    const eans = filter ? run.index.eans().filter((ean) => filter.has(ean)) : [...run.index.eans()];
    return run.limit === undefined ? eans : eans.slice(0, run.limit);
  }

  private filterFeed(
    raw: readonly RawSupplierRecord[],
    run: RunContext
  ): readonly RawSupplierRecord[] {
    const filter = run.eanFilter;
    const filtered = filter
      ? raw.filter((record) => {
          const ean = normalizeIdentifier(record.ean);
          return ean !== null && filter.has(ean);
        })
      : raw;
    return run.limit === undefined ? filtered : filtered.slice(0, run.limit);
  }

  /**
   * Zero-quantity records for requested identifiers the lookup did not return.
   */
  private missingLookups(
    supplier: string,
    raw: readonly RawSupplierRecord[],
    eans: readonly string[]
  ): SupplierRecord[] {
    const found = new Set<string>();
    for (const record of raw) {
      const ean = normalizeIdentifier(record.ean);
      if (ean !== null) found.add(ean);
    }
    const missing = eans.filter((ean) => !found.has(ean));
    if (missing.length > 0) {
      this.logger.info("Identifiers not found on supplier, treating as out of stock", {
        supplier,
        count: missing.length,
      });
    }
    return missing.map((ean) => ({
      ean,
      sku: null,
      quantity: 0,
      rawStatus: NOT_FOUND_ON_SUPPLIER,
      supplierName: supplier,
    }));
  }

  /**
   * Resolve statuses to quantities; unresolvable records become error entries.
   */
  private resolveRecords(
    supplier: string,
    raw: readonly RawSupplierRecord[],
    run: RunContext
  ): SupplierRecord[] {
    run.builder.addSupplierRecords(raw.length);
    const records: SupplierRecord[] = [];
    for (const record of raw) {
      const ean = record.ean ?? null;
      const sku = record.sku ?? null;
      const resolution = resolveQuantity(record.status, this.statusMapping);
      if (!resolution.ok) {
        run.builder.recordError({
          supplier,
          errorType: resolution.reason === "unmapped_status" ? "unmapped_status" : "invalid_record",
          message: resolution.message,
          ean,
          sku,
          context: {
            code:
              resolution.reason === "unmapped_status"
                ? SyncErrorCodes.UNMAPPED_STATUS
                : SyncErrorCodes.INVALID_RECORD,
            rawStatus: record.status,
          },
        });
        this.logger.warn("Record excluded", { supplier, ean, sku, reason: resolution.message });
        continue;
      }
      records.push({
        ean,
        sku,
        quantity: resolution.quantity,
        rawStatus: record.status,
        supplierName: supplier,
      });
    }
    return records;
  }

  // ---------------------------------------------------------------------------
  // Results
  // ---------------------------------------------------------------------------

  private async handleResult(result: MatchResult, run: RunContext): Promise<void> {
    switch (result.kind) {
      case "not_found":
        run.builder.recordNotFound(result.supplierRecord);
        this.logger.debug("Not found in catalog", {
          supplier: result.supplierRecord.supplierName,
          ean: result.supplierRecord.ean,
          sku: result.supplierRecord.sku,
        });
        return;
      case "duplicate_conflict":
        run.builder.recordDuplicate(result);
        this.logger.warn("Identifier matches several catalog items, skipped", {
          supplier: result.supplierRecord.supplierName,
          identifier: result.identifier,
          itemIds: result.candidateCatalogItems.map((item) => item.itemId),
        });
        return;
      case "matched":
        await this.handleMatch(result, run);
        return;
      default:
        assertNever(result);
    }
  }

  private async handleMatch(match: Matched, run: RunContext): Promise<void> {
    const decision = evaluateSafety(match, run.safety);
    const record = match.supplierRecord;
    switch (decision.kind) {
      case "no_change":
        run.builder.recordNoChange(match, decision);
        return;
      case "flagged":
        run.builder.recordFlagged(match, decision);
        this.logger.warn("Change flagged for review", {
          supplier: record.supplierName,
          itemId: decision.itemId,
          oldQty: decision.oldQty,
          newQty: decision.newQty,
          reason: decision.reasonCode,
        });
        return;
      case "apply":
        break;
      default:
        assertNever(decision);
    }

    const change = { itemId: decision.itemId, oldQty: decision.oldQty, newQty: decision.newQty };
    if (run.dryRun) {
      run.builder.recordUpdate(match, decision, false);
      this.logger.debug("Would update quantity", { supplier: record.supplierName, ...change });
      return;
    }

    try {
      await this.catalog.updateQuantity(decision.locationId, decision.itemId, decision.newQty);
    } catch (error) {
      run.builder.recordError({
        supplier: record.supplierName,
        errorType: "catalog_write",
        message: `Catalog write failed: ${errorMessage(error)}`,
        ean: record.ean,
        sku: record.sku,
        itemId: decision.itemId,
        locationId: decision.locationId,
        oldQty: decision.oldQty,
        newQty: decision.newQty,
        context: errorContext(error),
      });
      this.logger.error("Catalog write failed", {
        supplier: record.supplierName,
        ...change,
        error: errorMessage(error),
      });
      return;
    }
    run.builder.recordUpdate(match, decision, true);
    this.logger.info("Quantity updated", { supplier: record.supplierName, ...change });
  }

  // ---------------------------------------------------------------------------
  // Run boundaries
  // ---------------------------------------------------------------------------

  private recordSupplierFailure(
    run: RunContext,
    supplier: string,
    errorType: Extract<ReportErrorType, "authentication" | "fetch">,
    error: unknown
  ): void {
    run.builder.recordError({
      supplier,
      errorType,
      message: errorMessage(error),
      context: errorContext(error),
    });
    this.logger.error("Supplier skipped", { supplier, errorType, error: errorMessage(error) });
  }

  private async closeConnector(connector: SupplierConnector): Promise<void> {
    if (!connector.close) return;
    try {
      await connector.close();
    } catch (error) {
      this.logger.warn("Supplier connector did not close cleanly", {
        supplier: connector.name,
        error: errorMessage(error),
      });
    }
  }

  private logCatalog(index: CatalogIndex): void {
    this.logger.info("Catalog snapshot loaded", { ...index.stats() });
    for (const duplicate of index.duplicates()) {
      this.logger.warn("Duplicate identifier in catalog", {
        identifier: duplicate.identifier,
        type: duplicate.type,
        itemIds: duplicate.items.map((item) => item.itemId),
      });
    }
    if (index.unreachable.length > 0) {
      this.logger.warn("Catalog items without EAN or SKU are never updated", {
        count: index.unreachable.length,
        itemIds: index.unreachable.map((item) => item.itemId),
      });
    }
  }

  private async finish(builder: ReportBuilder, status: RunStatus): Promise<SyncOutcome> {
    const report = builder.finalize(status, this.now());

    let reportLocation: string | null = null;
    let persisted = true;
    if (this.reportStore) {
      try {
        reportLocation = await this.reportStore.save(report);
        this.logger.info("Report saved", { path: reportLocation });
      } catch (error) {
        persisted = false;
        this.logger.error("Failed to persist report", {
          runId: report.runId,
          error: errorMessage(error),
        });
      }
    }

    this.logger.report("Sync run finished", {
      runId: report.runId,
      status: report.status,
      ...report.mode,
      ...report.summary,
    });

    const notified = await this.notify(report);
    const failed = status === "aborted" || report.summary.errors > 0 || !persisted;
    return { report, reportLocation, notified, exitCode: failed ? 1 : 0 };
  }

  private async notify(report: SyncRunReport): Promise<boolean> {
    if (!this.notifier) {
      return false;
    }
    if (!shouldNotify(report, this.notificationPolicy)) {
      this.logger.debug("Notification not required", { runId: report.runId });
      return false;
    }
    try {
      await this.notifier.send(report);
      this.logger.info("Notification sent", { runId: report.runId });
      return true;
    } catch (error) {
      this.logger.error("Notification failed", {
        runId: report.runId,
        code: SyncErrorCodes.NOTIFICATION_FAILED,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
