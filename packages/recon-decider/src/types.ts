/**
 * ## Reconciliation Decider - Pure Matching and Safety Decisions
 *
 * The reconciliation core separates pure decision logic from the I/O that
 * feeds it, so every match and every safety verdict can be unit tested
 * without a catalog, a supplier or a network.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `CatalogItem` | One saleable unit as read from the catalog snapshot |
 * | `SupplierRecord` | One inventory fact reported by a supplier (quantity resolved) |
 * | `MatchResult` | Union of matched, not found, or duplicate conflict |
 * | `Decision` | Union of apply, no change needed, or flagged for review |
 * | `SafetyConfig` | Thresholds evaluated by the safety policy |
 *
 * ### Helper Functions
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `apply()` | `ApplyDecision` | Build a write decision |
 * | `noChange()` | `NoChangeDecision` | Build a no-op decision |
 * | `flagged()` | `FlaggedDecision` | Build a withheld decision with a reason code |
 * | `isApply()` / `isNoChange()` / `isFlagged()` | `boolean` | Decision type guards |
 * | `isMatched()` / `isNotFound()` / `isDuplicateConflict()` | `boolean` | Match type guards |
 *
 * ### Decider vs Orchestrator
 *
 * | Concern | Decider (**Pure**) | Orchestrator (Effectful) |
 * |---------|-------------------|---------------------|
 * | I/O | None | Catalog snapshot, supplier fetch, catalog writes |
 * | Testability | Unit tests | Tests with in-process collaborators |
 * | Side effects | Never | Always |
 * | Returns | `MatchResult` / `Decision` | `SyncRunReport` |
 *
 * @example
 * ```typescript
 * import { buildCatalogIndex, reconcile, evaluateSafety, isMatched } from "@stockrecon/recon-decider";
 *
 * const index = buildCatalogIndex(items);
 * for (const match of reconcile(records, index)) {
 *   if (isMatched(match)) {
 *     const decision = evaluateSafety(match, DEFAULT_SAFETY_CONFIG);
 *   }
 * }
 * ```
 *
 * @module @stockrecon/recon-decider
 */

// =============================================================================
// Core Type Aliases
// =============================================================================

/**
 * Alias for Record<string, unknown>.
 */
export type UnknownRecord = Record<string, unknown>;

// =============================================================================
// Catalog and Supplier Values
// =============================================================================

/**
 * One saleable unit in the retail catalog.
 *
 * Read fresh at the start of each run and never mutated: quantity changes
 * go back through the catalog client, not into this structure.
 */
export interface CatalogItem {
  /** Opaque handle owned by the catalog system (Shopify inventory item id). */
  readonly itemId: string;
  readonly ean: string | null;
  readonly sku: string | null;
  /** Non-negative quantity currently recorded in the catalog. */
  readonly currentQuantity: number;
  /** Inventory location the quantity is written to. */
  readonly locationId: string;
  /** Display title, used in reports only. */
  readonly title?: string;
}

/**
 * One inventory fact reported by a supplier for this run.
 *
 * `quantity` is already resolved from the supplier's status text;
 * `rawStatus` keeps the original value for the audit trail.
 */
export interface SupplierRecord {
  readonly ean: string | null;
  readonly sku: string | null;
  readonly quantity: number;
  readonly rawStatus: string | number;
  readonly supplierName: string;
}

/**
 * Which identifier resolved a lookup.
 */
export type IdentifierType = "ean" | "sku";

// =============================================================================
// Match Results
// =============================================================================

/**
 * The record resolved to exactly one catalog item.
 */
export interface Matched {
  readonly kind: "matched";
  readonly catalogItem: CatalogItem;
  readonly supplierRecord: SupplierRecord;
  readonly matchedBy: IdentifierType;
  /** Normalized identifier that produced the match. */
  readonly identifier: string;
}

/**
 * No catalog item carries the record's identifiers.
 */
export interface NotFound {
  readonly kind: "not_found";
  readonly supplierRecord: SupplierRecord;
}

/**
 * More than one catalog item shares the identifier the record resolved to.
 * All candidates are kept so the conflict can be fixed in the catalog.
 */
export interface DuplicateConflict {
  readonly kind: "duplicate_conflict";
  readonly supplierRecord: SupplierRecord;
  readonly candidateCatalogItems: readonly CatalogItem[];
  readonly matchedBy: IdentifierType;
  readonly identifier: string;
}

/**
 * Outcome of resolving one supplier record against the catalog index.
 */
export type MatchResult = Matched | NotFound | DuplicateConflict;

// =============================================================================
// Decisions
// =============================================================================

/**
 * Reason a delta was withheld for human review.
 *
 * `quantity_drop_<X>%` carries the integer drop percent.
 */
export type FlagReasonCode = "high_quantity_to_zero" | `quantity_drop_${number}%`;

/**
 * The delta is safe: write `newQty` to the catalog.
 */
export interface ApplyDecision {
  readonly kind: "apply";
  readonly itemId: string;
  readonly locationId: string;
  readonly oldQty: number;
  readonly newQty: number;
}

/**
 * Catalog and supplier already agree.
 */
export interface NoChangeDecision {
  readonly kind: "no_change";
  readonly itemId: string;
  readonly oldQty: number;
}

/**
 * The delta crossed a safety threshold and is withheld.
 */
export interface FlaggedDecision {
  readonly kind: "flagged";
  readonly itemId: string;
  readonly oldQty: number;
  readonly newQty: number;
  readonly reasonCode: FlagReasonCode;
}

/**
 * Outcome of applying the safety policy to a matched record.
 */
export type Decision = ApplyDecision | NoChangeDecision | FlaggedDecision;

// =============================================================================
// Safety Configuration
// =============================================================================

/**
 * Thresholds evaluated by the safety policy.
 */
export interface SafetyConfig {
  /**
   * A drop larger than this percentage of the old quantity is flagged.
   */
  readonly maxQuantityDropPercent: number;

  /**
   * Going to zero from at least this quantity is flagged.
   */
  readonly minQuantityForZeroCheck: number;

  /**
   * When false every delta is applied (force mode).
   */
  readonly enableSafetyChecks: boolean;
}

export const DEFAULT_SAFETY_CONFIG: SafetyConfig = {
  maxQuantityDropPercent: 80,
  minQuantityForZeroCheck: 50,
  enableSafetyChecks: true,
};

/**
 * Fill unset safety options with their defaults.
 */
export function resolveSafetyConfig(partial: Partial<SafetyConfig> = {}): SafetyConfig {
  return {
    maxQuantityDropPercent:
      partial.maxQuantityDropPercent ?? DEFAULT_SAFETY_CONFIG.maxQuantityDropPercent,
    minQuantityForZeroCheck:
      partial.minQuantityForZeroCheck ?? DEFAULT_SAFETY_CONFIG.minQuantityForZeroCheck,
    enableSafetyChecks: partial.enableSafetyChecks ?? DEFAULT_SAFETY_CONFIG.enableSafetyChecks,
  };
}

// =============================================================================
// Helper Functions for Creating Decisions
// =============================================================================

/**
 * Create an apply decision.
 *
 * @example
 * ```typescript
 * return apply(item, 15);
 * ```
 */
export function apply(item: CatalogItem, newQty: number): ApplyDecision {
  return {
    kind: "apply",
    itemId: item.itemId,
    locationId: item.locationId,
    oldQty: item.currentQuantity,
    newQty,
  };
}

/**
 * Create a no-change decision.
 */
export function noChange(item: CatalogItem): NoChangeDecision {
  return { kind: "no_change", itemId: item.itemId, oldQty: item.currentQuantity };
}

/**
 * Create a flagged decision.
 *
 * @example
 * ```typescript
 * return flagged(item, 0, "high_quantity_to_zero");
 * ```
 */
export function flagged(
  item: CatalogItem,
  newQty: number,
  reasonCode: FlagReasonCode
): FlaggedDecision {
  return {
    kind: "flagged",
    itemId: item.itemId,
    oldQty: item.currentQuantity,
    newQty,
    reasonCode,
  };
}

// =============================================================================
// Type Guards
// =============================================================================

export function isApply(decision: Decision): decision is ApplyDecision {
  return decision.kind === "apply";
}

export function isNoChange(decision: Decision): decision is NoChangeDecision {
  return decision.kind === "no_change";
}

export function isFlagged(decision: Decision): decision is FlaggedDecision {
  return decision.kind === "flagged";
}

export function isMatched(result: MatchResult): result is Matched {
  return result.kind === "matched";
}

export function isNotFound(result: MatchResult): result is NotFound {
  return result.kind === "not_found";
}

export function isDuplicateConflict(result: MatchResult): result is DuplicateConflict {
  return result.kind === "duplicate_conflict";
}

/**
 * Exhaustiveness check for switches over the unions above.
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
