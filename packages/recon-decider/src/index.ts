/**
 * Pure reconciliation core: identifier normalization, catalog index,
 * matching, safety policy and status resolution.
 *
 * Nothing in this package performs I/O. The same catalog snapshot and the
 * same supplier records always yield the same match results and decisions.
 *
 * @example
 * ```typescript
 * import {
 *   buildCatalogIndex,
 *   partitionSupplierRecords,
 *   reconcile,
 *   evaluateSafety,
 *   isMatched,
 *   DEFAULT_SAFETY_CONFIG,
 * } from "@stockrecon/recon-decider";
 *
 * const index = buildCatalogIndex(catalogItems);
 * const { valid } = partitionSupplierRecords(records);
 * const decisions = reconcile(valid, index)
 *   .filter(isMatched)
 *   .map((match) => evaluateSafety(match, DEFAULT_SAFETY_CONFIG));
 * ```
 *
 * @module @stockrecon/recon-decider
 */

// Types
export type {
  UnknownRecord,
  CatalogItem,
  SupplierRecord,
  IdentifierType,
  Matched,
  NotFound,
  DuplicateConflict,
  MatchResult,
  FlagReasonCode,
  ApplyDecision,
  NoChangeDecision,
  FlaggedDecision,
  Decision,
  SafetyConfig,
} from "./types.js";

// Decision helpers and configuration
export { apply, noChange, flagged, DEFAULT_SAFETY_CONFIG, resolveSafetyConfig } from "./types.js";

// Type Guards
export {
  isApply,
  isNoChange,
  isFlagged,
  isMatched,
  isNotFound,
  isDuplicateConflict,
  assertNever,
} from "./types.js";

// Identifiers
export { normalizeIdentifier, formatIdentifier } from "./identifiers.js";

// Catalog index
export {
  buildCatalogIndex,
  type CatalogIndex,
  type CatalogLookup,
  type CatalogIndexStats,
  type DuplicateIdentifier,
} from "./catalog-index.js";

// Reconciliation
export {
  reconcile,
  matchRecord,
  partitionSupplierRecords,
  type PartitionedRecords,
} from "./reconcile.js";

// Safety policy
export { evaluateSafety, quantityDropPercent } from "./safety-policy.js";

// Status mapping
export {
  resolveQuantity,
  normalizeStatusMapping,
  type StatusMapping,
  type QuantityResolution,
} from "./status-mapping.js";
