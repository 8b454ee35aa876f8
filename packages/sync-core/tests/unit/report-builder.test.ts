/**
 * Unit tests for ReportBuilder and summary derivation.
 */
import { describe, it, expect } from "vitest";
import {
  apply,
  buildCatalogIndex,
  flagged,
  noChange,
  type DuplicateConflict,
  type Matched,
} from "@stockrecon/recon-decider";
import { catalogItem, supplierRecord } from "@stockrecon/recon-decider/testing";
import { ReportBuilder, SyncRunReportSchema } from "../../src/index.js";

const itemA = catalogItem({ itemId: "A", ean: "111", currentQuantity: 10, title: "Dog food" });
const itemB = catalogItem({ itemId: "B", ean: "222", currentQuantity: 4 });
const itemC = catalogItem({ itemId: "C", ean: "222", currentQuantity: 6 });
const itemD = catalogItem({ itemId: "D" });

function match(item = itemA, quantity = 15): Matched {
  return {
    kind: "matched",
    catalogItem: item,
    supplierRecord: supplierRecord({ ean: item.ean, quantity, supplierName: "acme" }),
    matchedBy: "ean",
    identifier: item.ean ?? "",
  };
}

function newBuilder(): ReportBuilder {
  return new ReportBuilder({
    runId: "run-1",
    startedAt: new Date("2026-01-15T09:00:00.000Z"),
    dryRun: false,
    force: false,
  });
}

describe("ReportBuilder", () => {
  it("records the catalog pre-scan", () => {
    const builder = newBuilder();
    builder.recordCatalog(buildCatalogIndex([itemA, itemB, itemC, itemD]));
    const report = builder.finalize("completed", new Date("2026-01-15T09:01:00.000Z"));

    expect(report.catalog).toEqual({
      totalItems: 4,
      unreachableItems: [{ itemId: "D", title: "D" }],
      duplicateIdentifiers: [{ identifier: "222", type: "ean", itemIds: ["B", "C"] }],
    });
  });

  it("writes entries carrying quantities and reasons", () => {
    const builder = newBuilder();
    builder.beginSupplier("acme");
    builder.addSupplierRecords(5);

    builder.recordUpdate(match(itemA, 15), apply(itemA, 15), true);
    builder.recordNoChange(match(itemA, 10), noChange(itemA));
    builder.recordFlagged(match(itemA, 1), flagged(itemA, 1, "quantity_drop_90%"));
    const conflict: DuplicateConflict = {
      kind: "duplicate_conflict",
      supplierRecord: supplierRecord({ ean: "222", quantity: 3, supplierName: "acme" }),
      candidateCatalogItems: [itemB, itemC],
      matchedBy: "ean",
      identifier: "222",
    };
    builder.recordDuplicate(conflict);
    builder.recordNotFound(
      supplierRecord({ ean: "999", quantity: 2, rawStatus: "Few left", supplierName: "acme" })
    );

    const report = builder.finalize("completed", new Date("2026-01-15T09:01:00.000Z"));

    expect(report.entries).toEqual([
      {
        type: "update",
        supplier: "acme",
        ean: "111",
        sku: null,
        itemId: "A",
        locationId: "loc-1",
        title: "Dog food",
        matchedBy: "ean",
        oldQty: 10,
        newQty: 15,
        change: 5,
        applied: true,
      },
      {
        type: "no_change",
        supplier: "acme",
        ean: "111",
        sku: null,
        itemId: "A",
        title: "Dog food",
        matchedBy: "ean",
        oldQty: 10,
      },
      {
        type: "flagged",
        supplier: "acme",
        ean: "111",
        sku: null,
        itemId: "A",
        locationId: "loc-1",
        title: "Dog food",
        matchedBy: "ean",
        oldQty: 10,
        newQty: 1,
        change: -9,
        reason: "quantity_drop_90%",
      },
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
        type: "not_found",
        supplier: "acme",
        ean: "999",
        sku: null,
        newQty: 2,
        rawStatus: "Few left",
      },
    ]);
    expect(report.summary).toEqual({
      totalSupplierRecords: 5,
      matched: 4,
      updated: 1,
      noChange: 1,
      notFound: 1,
      duplicates: 1,
      flagged: 1,
      errors: 0,
    });
    expect(report.suppliersProcessed).toEqual(["acme"]);
  });

  it("counts failed writes as matched errors", () => {
    const builder = newBuilder();
    builder.recordError({
      supplier: "acme",
      errorType: "catalog_write",
      message: "Catalog write failed: 500",
      itemId: "A",
      oldQty: 10,
      newQty: 15,
    });
    builder.recordError({ supplier: "beta", errorType: "authentication", message: "denied" });

    const report = builder.finalize("completed", new Date("2026-01-15T09:01:00.000Z"));

    expect(report.summary.errors).toBe(2);
    expect(report.summary.matched).toBe(1);
    expect(report.entries[1]).toEqual({
      type: "error",
      supplier: "beta",
      ean: null,
      sku: null,
      errorType: "authentication",
      message: "denied",
    });
  });

  it("produces a report that passes the persisted schema", () => {
    const builder = newBuilder();
    builder.recordCatalog(buildCatalogIndex([itemA]));
    builder.recordUpdate(match(), apply(itemA, 15), false);
    const report = builder.finalize("completed", new Date("2026-01-15T09:01:00.000Z"));

    expect(SyncRunReportSchema.safeParse(JSON.parse(JSON.stringify(report))).success).toBe(true);
    expect(report).toMatchObject({
      version: 1,
      runId: "run-1",
      startedAt: "2026-01-15T09:00:00.000Z",
      finishedAt: "2026-01-15T09:01:00.000Z",
      status: "completed",
      mode: { dryRun: false, force: false },
    });
  });

  it("freezes the report and rejects further entries", () => {
    const builder = newBuilder();
    const report = builder.finalize("aborted", new Date("2026-01-15T09:01:00.000Z"));

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
    expect(builder.finalize("completed", new Date())).toBe(report);
    expect(() => builder.recordNotFound(supplierRecord({ ean: "1" }))).toThrow(
      "Report run-1 is already finalized"
    );
  });
});
