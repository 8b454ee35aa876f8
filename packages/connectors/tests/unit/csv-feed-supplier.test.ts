/**
 * Unit tests for CSV feed parsing and CsvFeedSupplier.
 */
import { describe, it, expect } from "vitest";
import { CsvFeedConfigSchema, SupplierEntrySchema, SyncError, SyncErrorCodes } from "@stockrecon/sync-core";
import { createMockLogger } from "@stockrecon/sync-core/testing";
import { createSupplierConnector, parseCsvFeed } from "../../src/index.js";
import { stubFetch } from "../support/http.js";

const DEFAULT_COLUMNS = CsvFeedConfigSchema.parse({ url: "https://supplier.test/stock.csv" });

describe("parseCsvFeed", () => {
  it("maps configured columns with an explicit delimiter", () => {
    const text = "EAN;SKU;Stock;Name\n5901234567890;A-1;På lager;Socks\n;B-2;0;Hat\n";

    const records = parseCsvFeed(text, {
      delimiter: ";",
      fields: { ean: "EAN", sku: "SKU", status: "Stock", title: "Name" },
    });

    expect(records).toEqual([
      { ean: "5901234567890", sku: "A-1", status: "På lager", title: "Socks" },
      { ean: null, sku: "B-2", status: "0", title: "Hat" },
    ]);
  });

  it("detects a comma delimiter and trims header names", () => {
    const records = parseCsvFeed(" ean , sku ,stock\n111,X-1,5\n\n", DEFAULT_COLUMNS);

    expect(records).toEqual([{ ean: "111", sku: "X-1", status: "5" }]);
  });

  it("rejects a feed without the status column", () => {
    expect(() => parseCsvFeed("ean,qty\n111,5\n", DEFAULT_COLUMNS)).toThrow(
      "CSV feed is missing configured columns"
    );
  });

  it("rejects a feed without any identifier column", () => {
    let caught: unknown;
    try {
      parseCsvFeed("name,stock\nSocks,5\n", DEFAULT_COLUMNS);
    } catch (error) {
      caught = error;
    }

    expect(SyncError.hasCode(caught, SyncErrorCodes.FETCH_FAILED)).toBe(true);
    expect(caught).toMatchObject({
      context: { status: "stock", identifiers: ["ean", "sku"], columns: ["name", "stock"] },
    });
  });

  it("returns no records for a header-only feed", () => {
    expect(parseCsvFeed("ean,sku,stock\n", DEFAULT_COLUMNS)).toEqual([]);
  });

  it("warns about malformed rows and keeps the rest", () => {
    const logger = createMockLogger();

    const records = parseCsvFeed("ean,sku,stock\n111,X-1,5\n222\n", DEFAULT_COLUMNS, logger);

    expect(records[0]).toEqual({ ean: "111", sku: "X-1", status: "5" });
    expect(logger.hasLoggedAt("WARN", "Skipped malformed CSV row")).toBe(true);
  });
});

describe("CsvFeedSupplier", () => {
  it("downloads and parses the feed", async () => {
    const stub = stubFetch(() => new Response("ean,sku,stock\n111,X-1,In stock\n"));
    const entry = SupplierEntrySchema.parse({
      name: "nordic",
      type: "csv_feed",
      config: { url: "https://supplier.test/stock.csv" },
    });
    const supplier = createSupplierConnector(entry, { env: {}, fetch: stub.fetch });

    await supplier.authenticate();
    const records = await supplier.fetchInventory({
      eans: [],
      signal: new AbortController().signal,
    });

    expect(supplier.kind).toBe("feed");
    expect(stub.requests.map((r) => r.url)).toEqual(["https://supplier.test/stock.csv"]);
    expect(records).toEqual([{ ean: "111", sku: "X-1", status: "In stock" }]);
  });
});
