/**
 * Resolve raw link strings to absolute, canonical URLs
 */

const SCRIPT_SCHEMES = /^\s*(javascript|vbscript|data):/i;

/** scheme://… or protocol-relative //… */
const HAS_AUTHORITY = /^([a-z][a-z\d+.-]*:)?\/\//i;

/**
 * Normalize a link found on `pageUrl`.
 *
 * Returns null for fragment-only links, script-invocation schemes and anything
 * that fails to parse. Links without an authority are resolved against the page;
 * links with one are re-serialized as-is.
 */
export function normalizeLink(raw: string, pageUrl: string): string | null {
  const link = raw.trim();
  if (!link || link.startsWith('#')) return null;
  if (SCRIPT_SCHEMES.test(link)) return null;

  try {
    if (HAS_AUTHORITY.test(link) && !link.startsWith('//')) {
      return new URL(link).href;
    }
    return new URL(link, pageUrl).href;
  } catch {
    return null;
  }
}

/**
 * URL that relative links on a page resolve against: the document's <base href>
 * resolved against the page's final URL, or the final URL itself.
 */
export function resolveBaseUrl(pageUrl: string, baseHref?: string): string {
  if (!baseHref?.trim()) return pageUrl;
  try {
    return new URL(baseHref.trim(), pageUrl).href;
  } catch {
    return pageUrl;
  }
}

/** Normalize a batch of links, dropping the ones that yield no target. Order is kept. */
export function normalizeLinks(raw: readonly string[], pageUrl: string): string[] {
  const out: string[] = [];
  for (const link of raw) {
    const url = normalizeLink(link, pageUrl);
    if (url !== null) out.push(url);
  }
  return out;
}
