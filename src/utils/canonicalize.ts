/**
 * URL helpers for directory pages
 * Resolves relative links and checks that company URLs stay on the directory site
 */

/**
 * Extracts domain from URL (lowercase, without 'www.')
 */
export function extractDomain(url: string): string {
  try {
    const urlObj = new URL(url);
    let host = urlObj.hostname.toLowerCase();
    if (host.startsWith('www.')) {
      host = host.substring(4);
    }
    return host;
  } catch {
    return '';
  }
}

/**
 * Resolve an href against the site root
 * Returns null for empty, fragment-only, javascript: and unparseable links
 */
export function resolveUrl(href: string | undefined | null, baseUrl: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.toLowerCase().startsWith('javascript:')) {
    return null;
  }

  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return null;
    }
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Checks if URL belongs to the directory site (subdomains included)
 */
export function isSiteUrl(url: string, baseUrl: string): boolean {
  const urlDomain = extractDomain(url);
  const siteDomain = extractDomain(baseUrl);
  if (!urlDomain || !siteDomain) {
    return false;
  }
  return urlDomain === siteDomain || urlDomain.endsWith(`.${siteDomain}`);
}

/**
 * Address of the reviews view of a company page
 */
export function buildReviewsUrl(companyUrl: string): string {
  return `${companyUrl}#reviews`;
}
