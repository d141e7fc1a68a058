/**
 * Location header rewriting
 *
 * Points redirects from the upstream back at the proxy where possible.
 *
 * @module lib/proxy/location
 */

function pathSegments(pathname: string): string[] {
  return pathname.split('/').filter((segment) => segment !== '');
}

/**
 * Path of `target` relative to `base`, or null when `target` is not strictly
 * under `base`.
 *
 * Both URLs must share an origin and the base path segments must prefix the
 * target's. `target` equal to `base` is not within it. The target's query and
 * fragment are kept.
 *
 * @example
 * ```typescript
 * relativeWithin(new URL('http://up.test/app'), new URL('http://up.test/app/a/b?x=1')); // 'a/b?x=1'
 * relativeWithin(new URL('http://up.test/app'), new URL('http://up.test/other'));      // null
 * ```
 */
export function relativeWithin(base: URL, target: URL): string | null {
  if (base.origin !== target.origin) {
    return null;
  }

  const baseSegments = pathSegments(base.pathname);
  const targetSegments = pathSegments(target.pathname);
  if (targetSegments.length <= baseSegments.length) {
    return null;
  }
  if (baseSegments.some((segment, i) => segment !== targetSegments[i])) {
    return null;
  }

  const trailingSlash = target.pathname.endsWith('/') ? '/' : '';
  return targetSegments.slice(baseSegments.length).join('/') + trailingSlash + target.search + target.hash;
}

/**
 * Rewrite a Location value received from the upstream.
 *
 * @param location - Location header value as sent by the upstream
 * @param requestUrl - URL of the outbound request the redirect answers
 * @param upstream - Upstream base URL
 * @returns Root-relative path when the target is under the upstream base,
 *   otherwise the absolute target URL
 */
export function rewriteLocation(location: string, requestUrl: URL, upstream: URL): string {
  const target = new URL(location, requestUrl);
  const relative = relativeWithin(upstream, target);
  return relative === null ? target.href : `/${relative}`;
}
