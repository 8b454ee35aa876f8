/**
 * Unit tests for SyncOrchestrator.
 */
import { describe, it, expect } from "vitest";
import type { CatalogItem } from "@stockrecon/recon-decider";
import { catalogItem } from "@stockrecon/recon-decider/testing";
import {
  SyncError,
  SyncErrorCodes,
  SyncOrchestrator,
  type SupplierConnector,
  type SyncOrchestratorConfig,
} from "../../src/index.js";
import {
  createMockLogger,
  InMemoryCatalog,
  InMemoryReportStore,
  RecordingNotifier,
  StaticSupplier,
  steppingClock,
} from "../../src/testing/index.js";

const dupB = catalogItem({ itemId: "B", ean: "222", currentQuantity: 4 });
const dupC = catalogItem({ itemId: "C", ean: "222", currentQuantity: 6 });
const itemA = catalogItem({ itemId: "A", ean: "333", sku: "SKU-A", currentQuantity: 10 });
const itemD = catalogItem({ itemId: "D", ean: "444", currentQuantity: 20 });
const itemE = catalogItem({ itemId: "E", ean: "555", currentQuantity: 60 });
const itemF = catalogItem({ itemId: "F", ean: "666", currentQuantity: 3 });

function setup(
  items: CatalogItem[],
  suppliers: SupplierConnector[],
  extra: Partial<SyncOrchestratorConfig> = {}
) {
  const catalog = new InMemoryCatalog(items);
  const logger = createMockLogger();
  const reportStore = new InMemoryReportStore();
  const orchestrator = new SyncOrchestrator({
    catalog,
    suppliers,
    logger,
    reportStore,
    now: steppingClock(new Date("2026-01-15T09:00:00.000Z")),
    generateRunId: () => "run-1",
    ...extra,
  });
  return { catalog, logger, reportStore, orchestrator };
}

describe("SyncOrchestrator", () => {
  describe("end-to-end", () => {
    it("reconciles a duplicate, a safe update and an unknown EAN", async () => {
      const acme = new StaticSupplier("acme", [
        { ean: "222", status: 3 },
        { ean: "333", status: 15 },
        { ean: "999", status: 5 },
      ]);
      const { catalog, orchestrator, reportStore } = setup([dupB, dupC, itemA], [acme]);

      const outcome = await orchestrator.run();

      expect(outcome.exitCode).toBe(0);
      expect(outcome.reportLocation).toBe("memory://run-1");
      expect(reportStore.saved).toEqual([outcome.report]);
      expect(outcome.report.summary).toEqual({
        totalSupplierRecords: 3,
        matched: 2,
        updated: 1,
        noChange: 0,
        notFound: 1,
        duplicates: 1,
        flagged: 0,
        errors: 0,
      });
      expect(outcome.report.entries).toEqual([
        {
          type: "duplicate",
          supplier: "acme",
          ean: "222",
          sku: null,
          matchedBy: "ean",
          identifier: "222",
          candidateItemIds: ["B", "C"],
          newQty: 3,
          reason: "EAN 222 matches 2 catalog items",
        },
        {
          type: "update",
          supplier: "acme",
          ean: "333",
          sku: null,
          itemId: "A",
          locationId: "loc-1",
          title: "A",
          matchedBy: "ean",
          oldQty: 10,
          newQty: 15,
          change: 5,
          applied: true,
        },
        {
          type: "not_found",
          supplier: "acme",
          ean: "999",
          sku: null,
          newQty: 5,
          rawStatus: 5,
        },
      ]);
      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "A", quantity: 15 }]);
      expect(outcome.report).toMatchObject({
        runId: "run-1",
        status: "completed",
        startedAt: "2026-01-15T09:00:00.000Z",
        finishedAt: "2026-01-15T09:00:01.000Z",
        suppliersProcessed: ["acme"],
        catalog: {
          totalItems: 3,
          unreachableItems: [],
          duplicateIdentifiers: [{ identifier: "222", type: "ean", itemIds: ["B", "C"] }],
        },
      });
      expect(acme.closed).toBe(true);
    });
  });

  describe("modes", () => {
    it("performs no writes in dry-run mode but reports the updates", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const { catalog, orchestrator } = setup([itemA], [acme]);

      const outcome = await orchestrator.run({ dryRun: true });

      expect(catalog.writes).toEqual([]);
      expect(outcome.report.mode).toEqual({ dryRun: true, force: false });
      expect(outcome.report.summary.updated).toBe(1);
      expect(outcome.report.entries[0]).toMatchObject({ type: "update", applied: false });
    });

    it("withholds a large drop for review", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "444", status: 2 }]);
      const { catalog, orchestrator, logger } = setup([itemD], [acme]);

      const outcome = await orchestrator.run();

      expect(catalog.writes).toEqual([]);
      expect(outcome.exitCode).toBe(0);
      expect(outcome.report.entries[0]).toMatchObject({
        type: "flagged",
        itemId: "D",
        oldQty: 20,
        newQty: 2,
        change: -18,
        reason: "quantity_drop_90%",
      });
      expect(logger.hasLoggedAt("WARN", "Change flagged for review")).toBe(true);
    });

    it("applies flagged changes in force mode", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "444", status: 2 }]);
      const { catalog, orchestrator } = setup([itemD], [acme]);

      const outcome = await orchestrator.run({ force: true });

      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "D", quantity: 2 }]);
      expect(outcome.report.summary.flagged).toBe(0);
      expect(outcome.report.summary.updated).toBe(1);
    });

    it("uses configured safety limits", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "444", status: 2 }]);
      const { orchestrator } = setup([itemD], [acme], {
        safetyLimits: { maxQuantityDropPercent: 95 },
      });

      const outcome = await orchestrator.run();

      expect(outcome.report.summary.updated).toBe(1);
    });

    it("records no-change entries for equal quantities", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 10 }]);
      const { catalog, orchestrator } = setup([itemA], [acme]);

      const outcome = await orchestrator.run();

      expect(catalog.writes).toEqual([]);
      expect(outcome.report.summary.noChange).toBe(1);
    });
  });

  describe("supplier selection", () => {
    it("runs only the named suppliers and warns about unknown names", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const nordic = new StaticSupplier("nordic", [{ ean: "444", status: 21 }]);
      const { orchestrator, logger } = setup([itemA, itemD], [acme, nordic]);

      const outcome = await orchestrator.run({ suppliers: ["NORDIC", "ghost"] });

      expect(outcome.report.suppliersProcessed).toEqual(["nordic"]);
      expect(acme.authenticated).toBe(false);
      expect(logger.getLastCallAt("WARN")?.data).toEqual({ supplier: "ghost" });
    });

    it("limits records and filters by EAN", async () => {
      const acme = new StaticSupplier("acme", [
        { ean: "333", status: 15 },
        { ean: "444", status: 21 },
        { ean: "555", status: 61 },
      ]);
      const { catalog, orchestrator } = setup([itemA, itemD, itemE], [acme]);

      await orchestrator.run({ eans: ["4-44", "555"], limit: 1 });

      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "D", quantity: 21 }]);
    });
  });

  describe("failure isolation", () => {
    it("skips a supplier whose authentication fails and continues", async () => {
      const broken = new StaticSupplier("broken", [{ ean: "333", status: 1 }], {
        authError: new SyncError(SyncErrorCodes.AUTHENTICATION_FAILED, "Login rejected", {
          status: 401,
        }),
      });
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const { catalog, orchestrator, logger } = setup([itemA], [broken, acme]);

      const outcome = await orchestrator.run();

      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.suppliersProcessed).toEqual(["broken", "acme"]);
      expect(outcome.report.entries[0]).toEqual({
        type: "error",
        supplier: "broken",
        ean: null,
        sku: null,
        errorType: "authentication",
        message: "Login rejected",
        context: { code: "AUTHENTICATION_FAILED", status: 401 },
      });
      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "A", quantity: 15 }]);
      expect(broken.queries).toEqual([]);
      expect(broken.closed).toBe(true);
      expect(logger.hasLoggedAt("ERROR", "Supplier skipped")).toBe(true);
    });

    it("records a fetch failure as a supplier error", async () => {
      const acme = new StaticSupplier("acme", [], { fetchError: new Error("socket hang up") });
      const { orchestrator } = setup([itemA], [acme]);

      const outcome = await orchestrator.run();

      expect(outcome.report.entries).toEqual([
        {
          type: "error",
          supplier: "acme",
          ean: null,
          sku: null,
          errorType: "fetch",
          message: "socket hang up",
        },
      ]);
    });

    it("treats a fetch timeout as that supplier's failure", async () => {
      const slow = new StaticSupplier("slow", [], { hang: true });
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const { catalog, orchestrator } = setup([itemA], [slow, acme], { fetchTimeoutMs: 10 });

      const outcome = await orchestrator.run();

      expect(outcome.report.entries[0]).toEqual({
        type: "error",
        supplier: "slow",
        ean: null,
        sku: null,
        errorType: "fetch",
        message: "slow inventory fetch timed out after 10 ms",
        context: { code: "FETCH_TIMEOUT", timeoutMs: 10 },
      });
      expect(slow.queries[0]?.signal.aborted).toBe(true);
      expect(catalog.writes).toHaveLength(1);
    });

    it("aborts when the catalog snapshot fails", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const notifier = new RecordingNotifier();
      const { catalog, orchestrator, reportStore } = setup([itemA], [acme], { notifier });
      catalog.snapshotError = new Error("401 Unauthorized");

      const outcome = await orchestrator.run();

      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.status).toBe("aborted");
      expect(outcome.report.suppliersProcessed).toEqual([]);
      expect(outcome.report.entries).toEqual([
        {
          type: "error",
          supplier: "catalog",
          ean: null,
          sku: null,
          errorType: "catalog_snapshot",
          message: "Catalog snapshot failed: 401 Unauthorized",
        },
      ]);
      expect(acme.authenticated).toBe(false);
      expect(reportStore.saved).toHaveLength(1);
      expect(notifier.sent).toHaveLength(1);
    });

    it("keeps writing after a failed write", async () => {
      const acme = new StaticSupplier("acme", [
        { ean: "333", status: 15 },
        { ean: "444", status: 25 },
      ]);
      const { catalog, orchestrator } = setup([itemA, itemD], [acme]);
      catalog.failingItemIds.add("A");

      const outcome = await orchestrator.run();

      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "D", quantity: 25 }]);
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.summary).toMatchObject({ matched: 2, updated: 1, errors: 1 });
      expect(outcome.report.entries[0]).toEqual({
        type: "error",
        supplier: "acme",
        ean: "333",
        sku: null,
        errorType: "catalog_write",
        message: "Catalog write failed: write rejected for A",
        itemId: "A",
        locationId: "loc-1",
        oldQty: 10,
        newQty: 15,
      });
    });
  });

  describe("record resolution", () => {
    it("maps status text and reports unmapped and identifier-less records", async () => {
      const acme = new StaticSupplier("acme", [
        { ean: "333", status: "PÅ LAGER" },
        { ean: "444", status: "Backorder" },
        { status: 5 },
      ]);
      const { catalog, orchestrator } = setup([itemA, itemD], [acme], {
        statusMapping: { "På lager": 15 },
      });

      const outcome = await orchestrator.run();

      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "A", quantity: 15 }]);
      expect(outcome.report.summary).toMatchObject({
        totalSupplierRecords: 3,
        updated: 1,
        errors: 2,
      });
      expect(outcome.report.entries.slice(0, 2)).toEqual([
        {
          type: "error",
          supplier: "acme",
          ean: "444",
          sku: null,
          errorType: "unmapped_status",
          message: 'No quantity mapping for status "Backorder"',
          context: { code: "UNMAPPED_STATUS", rawStatus: "Backorder" },
        },
        {
          type: "error",
          supplier: "acme",
          ean: null,
          sku: null,
          errorType: "invalid_record",
          message: "Record has neither EAN nor SKU",
          context: { rawStatus: 5 },
        },
      ]);
    });
  });

  describe("lookup suppliers", () => {
    it("queries catalog EANs and zero-fills identifiers the supplier did not return", async () => {
      const lookup = new StaticSupplier("lookup", [{ ean: "333", status: 12 }], {
        kind: "lookup",
      });
      const { catalog, orchestrator } = setup([itemA, itemE, itemF], [lookup]);

      const outcome = await orchestrator.run();

      expect(lookup.queries[0]?.eans).toEqual(["333", "555", "666"]);
      expect(catalog.writes).toEqual([{ locationId: "loc-1", itemId: "A", quantity: 12 }]);
      expect(outcome.report.summary).toMatchObject({
        totalSupplierRecords: 3,
        updated: 1,
        flagged: 2,
      });
      expect(
        outcome.report.entries
          .filter((entry) => entry.type === "flagged")
          .map((entry) => (entry.type === "flagged" ? [entry.itemId, entry.reason] : []))
      ).toEqual([
        ["E", "high_quantity_to_zero"],
        ["F", "quantity_drop_100%"],
      ]);
    });

    it("applies the EAN filter and limit to lookups", async () => {
      const lookup = new StaticSupplier("lookup", [{ ean: "666", status: 3 }], { kind: "lookup" });
      const { orchestrator } = setup([itemA, itemE, itemF], [lookup]);

      await orchestrator.run({ eans: ["666", "555"], limit: 1 });

      expect(lookup.queries[0]?.eans).toEqual(["555"]);
    });

    it("fails the supplier when nothing at all was found", async () => {
      const lookup = new StaticSupplier("lookup", [], { kind: "lookup" });
      const { catalog, orchestrator } = setup([itemA, itemE], [lookup]);

      const outcome = await orchestrator.run({ force: true });

      expect(catalog.writes).toEqual([]);
      expect(outcome.report.entries).toEqual([
        {
          type: "error",
          supplier: "lookup",
          ean: null,
          sku: null,
          errorType: "fetch",
          message: "Supplier returned none of the 2 requested identifiers",
          context: { code: "SUPPLIER_EMPTY_RESULT", requested: 2 },
        },
      ]);
    });
  });

  describe("run boundaries", () => {
    it("notifies on warnings and survives a failing notifier", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "999", status: 1 }]);
      const notifier = new RecordingNotifier(new Error("smtp down"));
      const { orchestrator, logger } = setup([itemA], [acme], { notifier });

      const outcome = await orchestrator.run();

      expect(outcome.notified).toBe(false);
      expect(outcome.exitCode).toBe(0);
      expect(logger.getLastCallAt("ERROR")?.data).toEqual({
        runId: "run-1",
        code: "NOTIFICATION_FAILED",
        error: "smtp down",
      });
    });

    it("does not notify a clean run by default", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const notifier = new RecordingNotifier();
      const { orchestrator } = setup([itemA], [acme], { notifier });

      const outcome = await orchestrator.run();

      expect(outcome.notified).toBe(false);
      expect(notifier.sent).toEqual([]);
    });

    it("fails the run when the report cannot be persisted", async () => {
      const acme = new StaticSupplier("acme", [{ ean: "333", status: 15 }]);
      const { orchestrator, logger } = setup([itemA], [acme], {
        reportStore: {
          save: async () => {
            throw new Error("disk full");
          },
        },
      });

      const outcome = await orchestrator.run();

      expect(outcome.reportLocation).toBeNull();
      expect(outcome.exitCode).toBe(1);
      expect(logger.hasLoggedAt("ERROR", "Failed to persist report")).toBe(true);
    });

    it("logs the summary at REPORT level and catalog problems as warnings", async () => {
      const unreachable = catalogItem({ itemId: "Z" });
      const { orchestrator, logger } = setup([dupB, dupC, unreachable], []);

      await orchestrator.run();

      expect(logger.getLastCallAt("REPORT")).toMatchObject({
        message: "Sync run finished",
        data: { runId: "run-1", status: "completed", dryRun: false, errors: 0 },
      });
      expect(logger.hasLoggedAt("WARN", "Duplicate identifier in catalog")).toBe(true);
      expect(logger.getLastCallAt("WARN")?.data).toEqual({ count: 1, itemIds: ["Z"] });
    });
  });
});
