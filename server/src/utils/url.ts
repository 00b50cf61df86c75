/**
 * @fileoverview URL and domain helpers shared by the fetcher, the URL loader
 * and the misleading-ads detector.
 */

/**
 * Extract the hostname from a URL string.
 *
 * @param url - The full URL to parse
 * @returns The hostname (e.g., 'www.example.com') or 'unknown' if parsing fails
 *
 * @example
 * extractDomain('https://www.example.com/path') // Returns 'www.example.com'
 * extractDomain('invalid-url') // Returns 'unknown'
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname
  } catch {
    return 'unknown'
  }
}

/**
 * Extract the base domain (last two or three labels) from a hostname.
 * Handles common multi-part TLDs like co.uk, com.au, etc.
 *
 * @example
 * getBaseDomain('www.example.com') // Returns 'example.com'
 * getBaseDomain('sub.domain.co.uk') // Returns 'domain.co.uk'
 */
export function getBaseDomain(domain: string): string {
  const parts = domain.split('.')
  if (parts.length > 2 && parts[parts.length - 2].length <= 3) {
    return parts.slice(-3).join('.')
  }
  return parts.slice(-2).join('.')
}

/**
 * Determine whether a link target belongs to a different site than the page.
 * Relative links resolve against the page and are never third-party.
 *
 * @example
 * isThirdParty('https://ads.tracker.net/c', 'https://shop.example.com') // true
 * isThirdParty('/checkout', 'https://shop.example.com') // false
 */
export function isThirdParty(targetUrl: string, pageUrl: string): boolean {
  try {
    const target = new URL(targetUrl, pageUrl)
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      return false
    }
    return getBaseDomain(target.hostname) !== getBaseDomain(extractDomain(pageUrl))
  } catch {
    return false
  }
}

/**
 * Check that a string is an absolute http(s) URL with a host.
 */
export function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0
  } catch {
    return false
  }
}

/**
 * Turn a URL into a filesystem-safe stem, e.g. 'shop_example_com'.
 */
export function urlToFileStem(url: string): string {
  const host = extractDomain(url)
  const stem = (host === 'unknown' ? url : host).replace(/[^a-zA-Z0-9_-]+/g, '_').replace(/^_+|_+$/g, '')
  return stem.length > 0 ? stem.slice(0, 80) : 'site'
}
