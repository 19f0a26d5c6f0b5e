/**
 * URL normalization for duplicate comparison.
 *
 * Drops the query string and fragment, trailing slashes, and case:
 * `https://X.com/a/?ref=1#top` → `https://x.com/a`.
 *
 * Every trailing slash goes, not just one, so that the result is stable
 * under a second pass (`a//` would otherwise become `a/` and then `a`).
 */
export function normalizeUrl(rawUrl: string): string {
  const withoutQuery = rawUrl.split('?')[0].split('#')[0];
  return withoutQuery.replace(/\/+$/, '').toLowerCase();
}
