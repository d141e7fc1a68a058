/**
 * Index fallback predicate
 *
 * @module lib/proxy/redirection
 */

/**
 * Check whether a path is served from the upstream's index.html.
 *
 * Only a single non-empty segment without a dot qualifies: `/dashboard`
 * does, while `/`, `/app.js`, `/users/42` and `/users/` do not.
 *
 * @param path - Request pathname, without query string
 */
export function needsRedirection(path: string): boolean {
  if (!path.startsWith('/')) {
    return false;
  }

  const segments = path.substring(1).split('/');
  if (segments.length !== 1) {
    return false;
  }

  const [segment] = segments;
  return segment !== '' && !segment.includes('.');
}
