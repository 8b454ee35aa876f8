/**
 * ## Shopify Catalog Client
 *
 * `CatalogClient` over the Shopify REST Admin API.
 *
 * - `listItems` pages through `products.json` (250 per page, `Link` header
 *   cursors) and turns every variant into a `CatalogItem` keyed by its
 *   inventory item id.
 * - `updateQuantity` sets the absolute available quantity through
 *   `inventory_levels/set.json`.
 *
 * Every request shares one throttle (`requestsPerSecond`, 2 by default, the
 * Basic plan limit) and the retry rules of `HttpClient`.
 *
 * @module shopify/ShopifyCatalogClient
 */

import type { CatalogItem } from "@stockrecon/recon-decider";
import { SyncError, SyncErrorCodes, createNoOpLogger } from "@stockrecon/sync-core";
import type { CatalogClient, Logger, ShopifyConfig } from "@stockrecon/sync-core";
import { HttpClient, expectOk, parseBody, readJson, type FetchLike } from "../http/HttpClient.js";
import type { BackoffOptions } from "../http/backoff.js";
import { RequestThrottle, type Sleep } from "../http/throttle.js";
import { nextPageUrl } from "./link-header.js";
import {
  LocationsResponseSchema,
  ProductsPageSchema,
  type ShopifyLocation,
  type ShopifyProduct,
  type ShopifyVariant,
} from "./schemas.js";

export const PRODUCTS_PAGE_SIZE = 250;

/** Variant title Shopify gives products without options. */
const DEFAULT_VARIANT_TITLE = "Default Title";

export interface ShopifyCatalogClientOptions {
  fetch?: FetchLike | undefined;
  sleep?: Sleep | undefined;
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
  backoff?: Partial<BackoffOptions> | undefined;
}

// =============================================================================
// Mapping
// =============================================================================

/**
 * `https://<shop>/admin/api/<version>`, whatever scheme or trailing slash
 * the configured shop URL carries.
 */
export function adminApiBaseUrl(shopUrl: string, apiVersion: string): string {
  const host = shopUrl
    .trim()
    .replace(/^https?:\/\//i, "")
    .replace(/\/+$/, "");
  return `https://${host}/admin/api/${apiVersion}`;
}

/**
 * Active legacy location, else the first active one, else the first.
 */
export function selectPrimaryLocation(
  locations: readonly ShopifyLocation[]
): ShopifyLocation | undefined {
  return (
    locations.find((location) => location.active === true && location.legacy === true) ??
    locations.find((location) => location.active === true) ??
    locations[0]
  );
}

function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

export function variantToCatalogItem(
  product: ShopifyProduct,
  variant: ShopifyVariant,
  locationId: string
): CatalogItem {
  const variantTitle = blankToNull(variant.title);
  const title =
    variantTitle === null || variantTitle === DEFAULT_VARIANT_TITLE
      ? product.title
      : `${product.title} - ${variantTitle}`;
  const quantity = variant.inventory_quantity ?? 0;

  return {
    itemId: variant.inventory_item_id,
    ean: blankToNull(variant.barcode),
    sku: blankToNull(variant.sku),
    // Oversold variants report negative stock
    currentQuantity: Math.max(0, Math.trunc(quantity)),
    locationId,
    title,
  };
}

/** Shopify ids are numeric; anything else is passed through as given. */
function toApiId(id: string): number | string {
  return /^\d+$/.test(id) ? Number(id) : id;
}

// =============================================================================
// Client
// =============================================================================

export class ShopifyCatalogClient implements CatalogClient {
  private readonly baseUrl: string;
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly accessToken: string;
  private locationId: string | undefined;

  constructor(config: ShopifyConfig, options: ShopifyCatalogClientOptions = {}) {
    this.baseUrl = adminApiBaseUrl(config.shopUrl, config.apiVersion);
    this.accessToken = config.accessToken;
    this.locationId = config.locationId;
    this.logger = options.logger ?? createNoOpLogger();
    this.http = new HttpClient({
      fetch: options.fetch,
      sleep: options.sleep,
      logger: this.logger,
      maxRetries: config.maxRetries,
      backoff: options.backoff,
      throttle: new RequestThrottle(config.requestsPerSecond, {
        now: options.now,
        sleep: options.sleep,
      }),
    });
  }

  async listItems(): Promise<readonly CatalogItem[]> {
    const locationId = await this.resolveLocationId();
    const items: CatalogItem[] = [];
    let url: string | null = `${this.baseUrl}/products.json?limit=${PRODUCTS_PAGE_SIZE}`;
    let pages = 0;

    while (url !== null) {
      const response = await expectOk(await this.http.request(url, this.init("GET")), url);
      const page: { products: ShopifyProduct[] } = parseBody(ProductsPageSchema, await readJson(response, url), url);
      pages += 1;

      for (const product of page.products) {
        for (const variant of product.variants) {
          items.push(variantToCatalogItem(product, variant, locationId));
        }
      }

      this.logger.debug("Fetched products page", {
        page: pages,
        products: page.products.length,
        items: items.length,
      });
      url = page.products.length === 0 ? null : nextPageUrl(response.headers.get("Link"));
    }

    this.logger.info("Catalog listed", { items: items.length, pages, locationId });
    return items;
  }

  async updateQuantity(locationId: string, itemId: string, quantity: number): Promise<void> {
    const url = `${this.baseUrl}/inventory_levels/set.json`;
    const response = await this.http.request(
      url,
      this.init("POST", {
        location_id: toApiId(locationId),
        inventory_item_id: toApiId(itemId),
        available: quantity,
      })
    );
    await expectOk(response, url, SyncErrorCodes.CATALOG_WRITE_FAILED);
    await response.body?.cancel();
    this.logger.debug("Inventory level set", { locationId, itemId, quantity });
  }

  /**
   * Configured location, else the shop's primary location (looked up once).
   */
  async resolveLocationId(): Promise<string> {
    if (this.locationId !== undefined) {
      return this.locationId;
    }
    const url = `${this.baseUrl}/locations.json`;
    const response = await expectOk(await this.http.request(url, this.init("GET")), url);
    const { locations } = parseBody(LocationsResponseSchema, await readJson(response, url), url);
    const primary = selectPrimaryLocation(locations);
    if (primary === undefined) {
      throw new SyncError(SyncErrorCodes.CATALOG_SNAPSHOT_FAILED, "Shop has no inventory locations", {
        url,
      });
    }
    this.logger.info("Using primary location", { locationId: primary.id, name: primary.name });
    this.locationId = primary.id;
    return primary.id;
  }

  private init(method: "GET" | "POST", body?: Record<string, unknown>): RequestInit {
    const headers = {
      "X-Shopify-Access-Token": this.accessToken,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    return body === undefined ? { method, headers } : { method, headers, body: JSON.stringify(body) };
  }
}
