/**
 * URL of the `rel="next"` entry of an RFC 8288 `Link` header, if any.
 *
 * @example
 * ```typescript
 * nextPageUrl('<https://shop.example/admin/api/2024-01/products.json?page_info=abc>; rel="next"');
 * // "https://shop.example/admin/api/2024-01/products.json?page_info=abc"
 * ```
 */
export function nextPageUrl(header: string | null): string | null {
  if (header === null) {
    return null;
  }
  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return null;
}
