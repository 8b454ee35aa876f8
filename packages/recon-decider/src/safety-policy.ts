/**
 * Safety Policy
 *
 * Decides whether a matched delta is written, skipped, or withheld for
 * review. Zero-out protection is checked before the drop-percent rule so a
 * high-stock item going to zero reports `high_quantity_to_zero` rather than
 * `quantity_drop_100%`.
 */

import {
  apply,
  flagged,
  noChange,
  type Decision,
  type Matched,
  type SafetyConfig,
} from "./types.js";

/**
 * Whole percentage of `oldQty` lost when moving to `newQty`, rounded down.
 * Scales before dividing.
 *
 * Zero when the old quantity is not positive or the quantity did not fall.
 *
 * @example
 * ```typescript
 * quantityDropPercent(100, 43); // 57
 * quantityDropPercent(10, 15);  // 0
 * ```
 */
export function quantityDropPercent(oldQty: number, newQty: number): number {
  if (oldQty <= 0 || newQty >= oldQty) {
    return 0;
  }
  return Math.floor(((oldQty - newQty) * 100) / oldQty);
}

/**
 * `(old - new) / old > max / 100`, cross-multiplied.
 */
function exceedsDropLimit(oldQty: number, newQty: number, maxPercent: number): boolean {
  return (oldQty - newQty) * 100 > maxPercent * oldQty;
}

/**
 * Evaluate one matched record.
 *
 * 1. `old == new` → no change
 * 2. checks disabled → apply
 * 3. `new == 0` and `old >= minQuantityForZeroCheck` → flagged `high_quantity_to_zero`
 * 4. `old > 0` and drop above `maxQuantityDropPercent` → flagged `quantity_drop_<X>%`
 * 5. otherwise apply
 *
 * @example
 * ```typescript
 * const decision = evaluateSafety(match, resolveSafetyConfig({ enableSafetyChecks: !force }));
 * ```
 */
export function evaluateSafety(match: Matched, config: SafetyConfig): Decision {
  const item = match.catalogItem;
  const oldQty = item.currentQuantity;
  const newQty = match.supplierRecord.quantity;

  if (oldQty === newQty) {
    return noChange(item);
  }

  if (!config.enableSafetyChecks) {
    return apply(item, newQty);
  }

  if (newQty === 0 && oldQty >= config.minQuantityForZeroCheck) {
    return flagged(item, newQty, "high_quantity_to_zero");
  }

  if (oldQty > 0 && exceedsDropLimit(oldQty, newQty, config.maxQuantityDropPercent)) {
    return flagged(item, newQty, `quantity_drop_${quantityDropPercent(oldQty, newQty)}%`);
  }

  return apply(item, newQty);
}
