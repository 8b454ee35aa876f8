/**
 * Value builders for tests.
 *
 * Defaults keep scenarios short: only the fields a test is about need to
 * be spelled out.
 *
 * @module @stockrecon/recon-decider/testing
 */

import type { CatalogItem, Matched, SupplierRecord } from "../types.js";

/**
 * Build a catalog item. `itemId` doubles as the default title.
 *
 * @example
 * ```typescript
 * const item = catalogItem({ itemId: "inv-1", ean: "5901234567890", currentQuantity: 10 });
 * ```
 */
export function catalogItem(
  fields: Partial<CatalogItem> & Pick<CatalogItem, "itemId">
): CatalogItem {
  return {
    ean: null,
    sku: null,
    currentQuantity: 0,
    locationId: "loc-1",
    title: fields.itemId,
    ...fields,
  };
}

/**
 * Build a supplier record. `rawStatus` defaults to the quantity.
 */
export function supplierRecord(fields: Partial<SupplierRecord>): SupplierRecord {
  const quantity = fields.quantity ?? 0;
  return {
    ean: null,
    sku: null,
    quantity,
    rawStatus: quantity,
    supplierName: "test-supplier",
    ...fields,
  };
}

/**
 * Build a matched result for safety policy tests.
 *
 * @example
 * ```typescript
 * const match = matchedPair(100, 18);
 * evaluateSafety(match, DEFAULT_SAFETY_CONFIG); // flagged quantity_drop_82%
 * ```
 */
export function matchedPair(oldQty: number, newQty: number): Matched {
  const item = catalogItem({ itemId: "inv-1", ean: "5901234567890", currentQuantity: oldQty });
  return {
    kind: "matched",
    catalogItem: item,
    supplierRecord: supplierRecord({ ean: "5901234567890", quantity: newQty }),
    matchedBy: "ean",
    identifier: "5901234567890",
  };
}
