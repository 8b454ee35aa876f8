/**
 * Status-to-Quantity Resolution
 *
 * Suppliers report stock either as a count or as locale-specific text
 * ("På lager", "Out of stock"). The mapping table is configuration data;
 * a status missing from it is an error for that record, never a silent zero.
 */

/**
 * Status text (any case) to quantity.
 */
export type StatusMapping = Readonly<Record<string, number>>;

export type QuantityResolution =
  | { readonly ok: true; readonly quantity: number }
  | {
      readonly ok: false;
      readonly reason: "unmapped_status" | "invalid_quantity";
      readonly message: string;
    };

const NUMERIC = /^[+-]?\d+(\.\d+)?$/;

function fromNumber(value: number): QuantityResolution {
  if (!Number.isFinite(value) || value < 0) {
    return {
      ok: false,
      reason: "invalid_quantity",
      message: `Quantity must be a non-negative number, got ${value}`,
    };
  }
  return { ok: true, quantity: Math.trunc(value) };
}

/**
 * Lower-case and trim every key so lookups are case-insensitive.
 */
export function normalizeStatusMapping(mapping: Readonly<Record<string, number>>): StatusMapping {
  const normalized: Record<string, number> = {};
  for (const [status, quantity] of Object.entries(mapping)) {
    normalized[status.trim().toLowerCase()] = quantity;
  }
  return normalized;
}

/**
 * Resolve a supplier-reported status to a quantity.
 *
 * @example
 * ```typescript
 * resolveQuantity(12, {});                           // { ok: true, quantity: 12 }
 * resolveQuantity(" 7 ", {});                        // { ok: true, quantity: 7 }
 * resolveQuantity("På lager", { "på lager": 15 });   // { ok: true, quantity: 15 }
 * resolveQuantity("Backorder", { "på lager": 15 });  // { ok: false, reason: "unmapped_status", ... }
 * ```
 */
export function resolveQuantity(
  raw: string | number,
  mapping: Readonly<Record<string, number>>
): QuantityResolution {
  if (typeof raw === "number") {
    return fromNumber(raw);
  }

  const text = raw.trim();
  if (NUMERIC.test(text)) {
    return fromNumber(Number(text));
  }

  const key = text.toLowerCase();
  const mapped = Object.prototype.hasOwnProperty.call(mapping, key)
    ? mapping[key]
    : normalizeStatusMapping(mapping)[key];
  if (mapped === undefined) {
    return {
      ok: false,
      reason: "unmapped_status",
      message: `No quantity mapping for status "${text}"`,
    };
  }
  return fromNumber(mapped);
}
