/**
 * Catalog Index
 *
 * Lookup structures over one catalog snapshot. Items that share an
 * identifier are all kept, so a duplicate in the catalog surfaces as a
 * conflict at lookup time instead of one item being picked silently.
 *
 * EAN resolves before SKU: a barcode is globally unique while a SKU is
 * store-local and prone to reuse across variants.
 */

import { normalizeIdentifier } from "./identifiers.js";
import type { CatalogItem, IdentifierType } from "./types.js";

/**
 * Result of looking up one identifier pair.
 */
export type CatalogLookup =
  | {
      readonly kind: "unique";
      readonly item: CatalogItem;
      readonly matchedBy: IdentifierType;
      readonly identifier: string;
    }
  | {
      readonly kind: "duplicate";
      readonly candidates: readonly CatalogItem[];
      readonly matchedBy: IdentifierType;
      readonly identifier: string;
    }
  | { readonly kind: "none" };

/**
 * An identifier value carried by more than one catalog item.
 */
export interface DuplicateIdentifier {
  readonly identifier: string;
  readonly type: IdentifierType;
  readonly items: readonly CatalogItem[];
}

export interface CatalogIndexStats {
  readonly totalItems: number;
  readonly itemsWithEan: number;
  readonly itemsWithSku: number;
  readonly duplicateEans: number;
  readonly duplicateSkus: number;
  readonly unreachableItems: number;
}

/**
 * Read-only index over a catalog snapshot.
 */
export interface CatalogIndex {
  /** Every item the index was built from, in snapshot order. */
  readonly items: readonly CatalogItem[];

  /** Items with neither EAN nor SKU: never matched, never updated. */
  readonly unreachable: readonly CatalogItem[];

  /**
   * Resolve normalized identifiers to catalog items.
   *
   * 1. unique EAN hit → matched by EAN
   * 2. several EAN hits → duplicate
   * 3. unique SKU hit → matched by SKU
   * 4. several SKU hits → duplicate
   * 5. otherwise none
   */
  lookup(ean: string | null, sku: string | null): CatalogLookup;

  /** Identifiers shared by more than one item, EANs first. */
  duplicates(): readonly DuplicateIdentifier[];

  /** Distinct normalized EANs in snapshot order. */
  eans(): readonly string[];

  /** Distinct SKUs in snapshot order, with the first EAN seen for each. */
  identifierPairs(): ReadonlyArray<{ readonly sku: string; readonly ean: string | null }>;

  stats(): CatalogIndexStats;
}

function addTo(map: Map<string, CatalogItem[]>, key: string, item: CatalogItem): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(item);
  } else {
    map.set(key, [item]);
  }
}

function collectDuplicates(
  map: ReadonlyMap<string, readonly CatalogItem[]>,
  type: IdentifierType
): DuplicateIdentifier[] {
  const result: DuplicateIdentifier[] = [];
  for (const [identifier, items] of map) {
    if (items.length > 1) {
      result.push({ identifier, type, items });
    }
  }
  return result;
}

/**
 * Build the index once per run. The returned object and its arrays are frozen.
 *
 * @example
 * ```typescript
 * const index = buildCatalogIndex(await catalog.listItems());
 * const hit = index.lookup("5901234567890", null);
 * ```
 */
export function buildCatalogIndex(items: readonly CatalogItem[]): CatalogIndex {
  const byEan = new Map<string, CatalogItem[]>();
  const bySku = new Map<string, CatalogItem[]>();
  const unreachable: CatalogItem[] = [];

  for (const item of items) {
    const ean = normalizeIdentifier(item.ean);
    const sku = normalizeIdentifier(item.sku);
    if (ean === null && sku === null) {
      unreachable.push(item);
      continue;
    }
    if (ean !== null) addTo(byEan, ean, item);
    if (sku !== null) addTo(bySku, sku, item);
  }

  for (const bucket of byEan.values()) Object.freeze(bucket);
  for (const bucket of bySku.values()) Object.freeze(bucket);

  const snapshot = Object.freeze([...items]);
  const frozenUnreachable = Object.freeze(unreachable);
  const duplicateList = Object.freeze([
    ...collectDuplicates(byEan, "ean"),
    ...collectDuplicates(bySku, "sku"),
  ]);

  function resolve(
    map: ReadonlyMap<string, readonly CatalogItem[]>,
    key: string,
    matchedBy: IdentifierType
  ): CatalogLookup | null {
    const bucket = map.get(key);
    if (!bucket) return null;
    const [first] = bucket;
    if (bucket.length === 1 && first) {
      return { kind: "unique", item: first, matchedBy, identifier: key };
    }
    return { kind: "duplicate", candidates: bucket, matchedBy, identifier: key };
  }

  return Object.freeze({
    items: snapshot,
    unreachable: frozenUnreachable,

    lookup(ean: string | null, sku: string | null): CatalogLookup {
      const normalizedEan = normalizeIdentifier(ean);
      if (normalizedEan !== null) {
        const hit = resolve(byEan, normalizedEan, "ean");
        if (hit) return hit;
      }
      const normalizedSku = normalizeIdentifier(sku);
      if (normalizedSku !== null) {
        const hit = resolve(bySku, normalizedSku, "sku");
        if (hit) return hit;
      }
      return { kind: "none" };
    },

    duplicates(): readonly DuplicateIdentifier[] {
      return duplicateList;
    },

    eans(): readonly string[] {
      return [...byEan.keys()];
    },

    identifierPairs(): ReadonlyArray<{ readonly sku: string; readonly ean: string | null }> {
      return [...bySku.entries()].map(([sku, bucket]) => ({
        sku,
        ean: normalizeIdentifier(bucket[0]?.ean),
      }));
    },

    stats(): CatalogIndexStats {
      let itemsWithEan = 0;
      let itemsWithSku = 0;
      for (const item of snapshot) {
        if (normalizeIdentifier(item.ean) !== null) itemsWithEan++;
        if (normalizeIdentifier(item.sku) !== null) itemsWithSku++;
      }
      return {
        totalItems: snapshot.length,
        itemsWithEan,
        itemsWithSku,
        duplicateEans: duplicateList.filter((d) => d.type === "ean").length,
        duplicateSkus: duplicateList.filter((d) => d.type === "sku").length,
        unreachableItems: frozenUnreachable.length,
      };
    },
  });
}
