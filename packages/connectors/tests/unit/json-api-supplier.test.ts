/**
 * Unit tests for JsonApiSupplier and the session authentication modes.
 */
import { describe, it, expect } from "vitest";
import { SupplierEntrySchema, SyncError, SyncErrorCodes } from "@stockrecon/sync-core";
import { createSupplierConnector, noJitter, type Environment } from "../../src/index.js";
import { json, recordSleeps, status, stubFetch, type RequestHandler } from "../support/http.js";

const STOCK_URL = "https://supplier.test/stock";
const LOGIN_URL = "https://supplier.test/login";

function connector(config: Record<string, unknown>, handler: RequestHandler, env: Environment = {}) {
  const stub = stubFetch(handler);
  const entry = SupplierEntrySchema.parse({
    name: "acme",
    type: "json_api",
    config: { url: STOCK_URL, ...config },
  });
  const supplier = createSupplierConnector(entry, {
    env,
    fetch: stub.fetch,
    sleep: recordSleeps().sleep,
    backoff: { jitterFn: noJitter },
  });
  return { supplier, requests: stub.requests };
}

const query = () => ({ eans: [], signal: new AbortController().signal });

describe("JsonApiSupplier", () => {
  it("reads records at the configured path through the field map", async () => {
    const { supplier } = connector(
      {
        recordsPath: "data.items",
        fields: { ean: "gtin", sku: "code", status: "availability", title: "name" },
      },
      () =>
        json({
          data: {
            items: [
              { gtin: "5901234567890", code: "A-1", availability: "In stock", name: "Socks" },
              { gtin: 4006381333931, availability: 3 },
              "junk",
            ],
          },
        })
    );

    await supplier.authenticate();
    const records = await supplier.fetchInventory(query());

    expect(supplier.kind).toBe("feed");
    expect(records).toEqual([
      { ean: "5901234567890", sku: "A-1", status: "In stock", title: "Socks" },
      { ean: "4006381333931", sku: null, status: 3 },
      { ean: null, sku: null, status: "" },
    ]);
  });

  it("reads a top-level array with the default field names", async () => {
    const { supplier } = connector({}, () => json([{ ean: "111", sku: "S-1", stock: "5" }]));

    await expect(supplier.fetchInventory(query())).resolves.toEqual([
      { ean: "111", sku: "S-1", status: "5" },
    ]);
  });

  it("fails the fetch when the record array is missing", async () => {
    const { supplier } = connector({ recordsPath: "data.items" }, () => json({ data: {} }));

    await expect(supplier.fetchInventory(query())).rejects.toSatisfy(
      (error: unknown) =>
        SyncError.hasCode(error, SyncErrorCodes.FETCH_FAILED) &&
        error.message === 'Response has no record array at "data.items"'
    );
  });

  it("fails the fetch on a non-2xx response", async () => {
    const { supplier } = connector({}, () => status(403, "forbidden"));

    await expect(supplier.fetchInventory(query())).rejects.toSatisfy(
      (error: unknown) =>
        SyncError.hasCode(error, SyncErrorCodes.FETCH_FAILED) &&
        error.message === `HTTP 403 from ${STOCK_URL}`
    );
  });

  it("sends configured static headers", async () => {
    const { supplier, requests } = connector({ headers: { "X-Client": "stockrecon" } }, () =>
      json([])
    );

    await supplier.fetchInventory(query());

    expect(requests[0]?.headers["x-client"]).toBe("stockrecon");
  });
});

describe("supplier authentication", () => {
  it("sends the API key in the configured header", async () => {
    const { supplier, requests } = connector(
      { auth: "api_key", apiKeyHeader: "X-Api-Token" },
      () => json([]),
      { ACME_API_KEY: "test-key" }
    );

    await supplier.authenticate();
    await supplier.fetchInventory(query());

    expect(requests[0]?.headers["x-api-token"]).toBe("test-key");
  });

  it("rejects API key auth without a key", async () => {
    const { supplier } = connector({ auth: "api_key" }, () => json([]));

    await expect(supplier.authenticate()).rejects.toSatisfy(
      (error: unknown) =>
        SyncError.hasCode(error, SyncErrorCodes.AUTHENTICATION_FAILED) &&
        error.message === "API key authentication needs an API key"
    );
  });

  it("sends HTTP basic credentials", async () => {
    const { supplier, requests } = connector({ auth: "basic" }, () => json([]), {
      ACME_USERNAME: "shop",
      ACME_PASSWORD: "test-pass",
    });

    await supplier.authenticate();
    await supplier.fetchInventory(query());

    expect(requests[0]?.headers["authorization"]).toBe(
      `Basic ${Buffer.from("shop:test-pass").toString("base64")}`
    );
  });

  it("rejects basic auth without a password", async () => {
    const { supplier } = connector({ auth: "basic" }, () => json([]), { ACME_USERNAME: "shop" });

    await expect(supplier.authenticate()).rejects.toThrow(
      "basic authentication needs a username and password"
    );
  });

  it("logs in for a token and sends it as a bearer token", async () => {
    const { supplier, requests } = connector(
      { auth: "token", tokenUrl: LOGIN_URL, tokenField: "access.token" },
      (request) =>
        request.url === LOGIN_URL ? json({ access: { token: "test-token" } }) : json([]),
      { ACME_USERNAME: "shop", ACME_PASSWORD: "test-pass" }
    );

    await supplier.authenticate();
    await supplier.fetchInventory(query());

    expect(requests[0]?.method).toBe("POST");
    expect(JSON.parse(requests[0]?.body ?? "")).toEqual({ username: "shop", password: "test-pass" });
    expect(requests[1]?.headers["authorization"]).toBe("Bearer test-token");
  });

  it("rejects a refused login with AUTHENTICATION_FAILED", async () => {
    const { supplier } = connector(
      { auth: "token", tokenUrl: LOGIN_URL },
      () => status(401),
      { ACME_USERNAME: "shop", ACME_PASSWORD: "wrong" }
    );

    await expect(supplier.authenticate()).rejects.toSatisfy(
      (error: unknown) =>
        SyncError.hasCode(error, SyncErrorCodes.AUTHENTICATION_FAILED) &&
        error.message === `HTTP 401 from ${LOGIN_URL}`
    );
  });

  it("rejects a login response without a token", async () => {
    const { supplier } = connector(
      { auth: "token", tokenUrl: LOGIN_URL },
      () => json({ session: "x" }),
      { ACME_USERNAME: "shop", ACME_PASSWORD: "test-pass" }
    );

    await expect(supplier.authenticate()).rejects.toThrow('Token response has no "token"');
  });
});
