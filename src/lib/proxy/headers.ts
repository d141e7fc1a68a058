/**
 * Header helpers
 *
 * @module lib/proxy/headers
 */

/**
 * Add a header, appending to an existing value instead of replacing it.
 *
 * Used for Via and Warning so that chained proxies accumulate entries.
 * Lookup is case-insensitive.
 *
 * @example
 * ```typescript
 * addHeader(headers, 'via', '1.1 edge');   // via: 1.1 edge
 * addHeader(headers, 'Via', '1.1 proxy');  // via: 1.1 edge, 1.1 proxy
 * ```
 */
export function addHeader(headers: Headers, name: string, value: string): void {
  const existing = headers.get(name);
  headers.set(name, existing === null ? value : `${existing}, ${value}`);
}
