/**
 * Reconciliation Engine
 *
 * Resolves supplier records against the catalog index, one independent
 * lookup per record. Output order follows input order; the index is the
 * only shared input and it is read-only.
 */

import type { CatalogIndex } from "./catalog-index.js";
import { normalizeIdentifier } from "./identifiers.js";
import type { MatchResult, SupplierRecord } from "./types.js";

/**
 * Records split by whether they can be matched at all.
 */
export interface PartitionedRecords {
  readonly valid: readonly SupplierRecord[];
  /** Records with neither EAN nor SKU after normalization. */
  readonly invalid: readonly SupplierRecord[];
}

/**
 * Separate records that carry no usable identifier.
 *
 * The orchestrator reports the invalid ones as item errors and passes
 * only the valid ones to `reconcile`.
 */
export function partitionSupplierRecords(records: readonly SupplierRecord[]): PartitionedRecords {
  const valid: SupplierRecord[] = [];
  const invalid: SupplierRecord[] = [];
  for (const record of records) {
    if (normalizeIdentifier(record.ean) === null && normalizeIdentifier(record.sku) === null) {
      invalid.push(record);
    } else {
      valid.push(record);
    }
  }
  return { valid, invalid };
}

/**
 * Resolve one record.
 */
export function matchRecord(record: SupplierRecord, index: CatalogIndex): MatchResult {
  const hit = index.lookup(normalizeIdentifier(record.ean), normalizeIdentifier(record.sku));
  switch (hit.kind) {
    case "unique":
      return {
        kind: "matched",
        catalogItem: hit.item,
        supplierRecord: record,
        matchedBy: hit.matchedBy,
        identifier: hit.identifier,
      };
    case "duplicate":
      return {
        kind: "duplicate_conflict",
        supplierRecord: record,
        candidateCatalogItems: hit.candidates,
        matchedBy: hit.matchedBy,
        identifier: hit.identifier,
      };
    case "none":
      return { kind: "not_found", supplierRecord: record };
  }
}

/**
 * Resolve every record against the index.
 *
 * @example
 * ```typescript
 * const results = reconcile(partitioned.valid, index);
 * const notFound = results.filter(isNotFound);
 * ```
 */
export function reconcile(
  records: readonly SupplierRecord[],
  index: CatalogIndex
): MatchResult[] {
  return records.map((record) => matchRecord(record, index));
}
