/**
 * Reading supplier records out of loosely shaped payloads.
 *
 * @module suppliers/fields
 */

import type { FieldMap, RawSupplierRecord } from "@stockrecon/sync-core";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Follow a dot path (`data.items`) into a JSON value. An empty path is the
 * value itself; a missing segment yields undefined.
 */
export function getPath(value: unknown, path: string): unknown {
  if (path === "") {
    return value;
  }
  let current = value;
  for (const segment of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function stringField(source: Record<string, unknown>, field: string | undefined): string | null {
  if (field === undefined) {
    return null;
  }
  const value = getPath(source, field);
  if (typeof value === "string") {
    return value.trim() === "" ? null : value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    // Numeric barcodes lose nothing below 2^53
    return String(value);
  }
  return null;
}

/**
 * Map one payload object through the configured field names.
 * A missing status becomes the empty string and fails status resolution.
 */
export function toRawRecord(source: Record<string, unknown>, fields: FieldMap): RawSupplierRecord {
  const status = getPath(source, fields.status);
  const title = stringField(source, fields.title);
  return {
    ean: stringField(source, fields.ean),
    sku: stringField(source, fields.sku),
    status: typeof status === "number" || typeof status === "string" ? status : "",
    ...(title === null ? {} : { title }),
  };
}
