/**
 * URL Canonicalization Utility
 * Normalizes URLs for consistent comparison and deduplication
 */

const SKIPPED_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:'];

/**
 * Canonical form used as a stable dedup key: query string and fragment removed.
 * Unparseable input is returned trimmed but otherwise untouched.
 */
export function canonicalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url.trim());
    urlObj.search = '';
    urlObj.hash = '';
    return urlObj.toString();
  } catch {
    return url.trim();
  }
}

/**
 * Resolves an href against a base URL.
 * @returns Absolute http(s) URL, or null for anchors, script links and garbage
 */
export function resolveUrl(href: string | null | undefined, baseUrl: string): string | null {
  if (!href) return null;

  const trimmed = href.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) return null;

  const lower = trimmed.toLowerCase();
  if (SKIPPED_SCHEMES.some((scheme) => lower.startsWith(scheme))) return null;

  try {
    const absolute = new URL(trimmed, baseUrl);
    if (absolute.protocol !== 'http:' && absolute.protocol !== 'https:') {
      return null;
    }
    return absolute.toString();
  } catch {
    return null;
  }
}

/**
 * Extracts lowercase hostname from URL
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Checks if two URLs share a hostname (case-insensitive)
 */
export function isSameDomain(url: string, otherUrl: string): boolean {
  const domain = extractDomain(url);
  return domain !== '' && domain === extractDomain(otherUrl);
}

/**
 * Origin of a URL with a path appended, e.g. siteRootUrl('https://a.com/x/y', '/robots.txt')
 */
export function siteRootUrl(url: string, path: string): string {
  return new URL(path, new URL(url).origin).toString();
}
