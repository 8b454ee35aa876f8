/**
 * Identifier Normalization
 *
 * Canonical form for EAN and SKU values. Every lookup and every equality
 * check between supplier and catalog identifiers goes through
 * `normalizeIdentifier`, so "5901-234-567890" and "5901234567890" compare
 * equal.
 */

const SEPARATORS = /[\s-]+/g;

/**
 * Canonicalize a raw identifier.
 *
 * - null, empty or whitespace-only input yields null
 * - dashes and whitespace are removed wherever they occur
 * - letters are upper-cased
 *
 * The function is idempotent: `normalizeIdentifier(normalizeIdentifier(x))`
 * equals `normalizeIdentifier(x)`.
 *
 * @example
 * ```typescript
 * normalizeIdentifier(" 590-123 456 "); // "590123456"
 * normalizeIdentifier("abc-12");        // "ABC12"
 * normalizeIdentifier("   ");           // null
 * ```
 */
export function normalizeIdentifier(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const normalized = raw.replace(SEPARATORS, "").toUpperCase();
  return normalized.length > 0 ? normalized : null;
}

/**
 * Render an identifier pair for log lines and report messages.
 *
 * @example
 * ```typescript
 * formatIdentifier("5901234567890", "ABC-123"); // "EAN: 5901234567890 / SKU: ABC-123"
 * formatIdentifier(null, null);                 // "No identifier"
 * ```
 */
export function formatIdentifier(
  ean: string | null | undefined,
  sku: string | null | undefined
): string {
  const parts: string[] = [];
  if (ean) parts.push(`EAN: ${ean}`);
  if (sku) parts.push(`SKU: ${sku}`);
  return parts.length > 0 ? parts.join(" / ") : "No identifier";
}
