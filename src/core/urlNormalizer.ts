/**
 * URL Normalizer - CRITICAL COMPONENT
 * All deduplication depends on consistent URL normalization
 *
 * The identity of a page = normalized URL
 */

import { IGNORED_EXTENSIONS, TRACKING_PARAMS } from '../config/constants';
import { errorMessage } from './errors';

/**
 * Link acceptance policy applied on top of normalization
 */
export interface LinkPolicy {
  /** Hostname links must match when sameDomainOnly is set */
  allowedHost: string;
  sameDomainOnly: boolean;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;
const HTTP_SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Normalize a URL for consistent comparison and deduplication
 *
 * Rules (applied in order):
 * 1. Add https:// if protocol missing
 * 2. Parse with URL API (lowercases scheme and host, drops default ports)
 * 3. Reject anything but http(s)
 * 4. Remove fragment (#)
 * 5. Strip tracking parameters
 * 6. Sort remaining query parameters alphabetically
 * 7. Remove trailing slash (except root /)
 *
 * @param url - Raw absolute URL string
 * @returns Normalized URL
 */
export function normalizeUrl(url: string): string {
  if (!url || typeof url !== 'string') {
    throw new Error('Invalid URL: must be a non-empty string');
  }

  let normalized = url.trim();

  // Add protocol if missing ("example.com/path")
  if (!HTTP_SCHEME_PATTERN.test(normalized) && !hasScheme(normalized)) {
    normalized = `https://${normalized}`;
  }

  let urlObj: URL;
  try {
    urlObj = new URL(normalized);
  } catch (error) {
    throw new Error(`Failed to normalize URL "${url}": ${errorMessage(error)}`);
  }

  if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
    throw new Error(`Failed to normalize URL "${url}": unsupported scheme ${urlObj.protocol}`);
  }
  if (!urlObj.hostname) {
    throw new Error(`Failed to normalize URL "${url}": missing host`);
  }

  urlObj.hostname = urlObj.hostname.toLowerCase();
  urlObj.hash = '';

  const searchParams = new URLSearchParams(urlObj.search);
  TRACKING_PARAMS.forEach((param) => {
    searchParams.delete(param);
  });

  // Sort remaining parameters alphabetically for consistency
  const sortedParams = new URLSearchParams(
    Array.from(searchParams.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
  urlObj.search = sortedParams.toString();

  let pathname = urlObj.pathname;
  if (pathname !== '/' && pathname.endsWith('/')) {
    pathname = pathname.replace(/\/+$/, '') || '/';
  }
  urlObj.pathname = pathname;

  return urlObj.toString();
}

/**
 * "host:port/path" parses as a scheme in the URL grammar, so only treat the
 * prefix as a scheme when it is not followed by a port number
 */
function hasScheme(url: string): boolean {
  return SCHEME_PATTERN.test(url) && !/^[^:/]+:\d+(\/|$)/.test(url);
}

/**
 * Resolve and normalize a link found on a page
 *
 * @param rawLink - href value as written in the document
 * @param sourceUrl - URL of the page the link was found on
 * @param policy - Domain restriction policy
 * @returns Canonical URL, or null when the link must not be crawled
 */
export function normalizeLink(
  rawLink: string,
  sourceUrl: string,
  policy?: LinkPolicy
): string | null {
  const trimmed = rawLink.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;

  let resolved: URL;
  try {
    resolved = new URL(trimmed, sourceUrl);
  } catch {
    return null;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
  if (hasIgnoredExtension(resolved.pathname)) return null;

  let normalized: string;
  try {
    normalized = normalizeUrl(resolved.toString());
  } catch {
    return null;
  }

  if (policy?.sameDomainOnly && extractDomain(normalized) !== policy.allowedHost) {
    return null;
  }

  return normalized;
}

function hasIgnoredExtension(pathname: string): boolean {
  const lower = pathname.toLowerCase();
  return IGNORED_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Extract domain from URL
 *
 * @param url - Full URL
 * @returns Domain (e.g., "example.com")
 */
export function extractDomain(url: string): string {
  try {
    return new URL(normalizeUrl(url)).hostname;
  } catch (error) {
    throw new Error(`Failed to extract domain from "${url}": ${errorMessage(error)}`);
  }
}

/**
 * Validate URL format
 *
 * @param url - URL to validate
 * @returns True if valid URL
 */
export function isValidUrl(url: string): boolean {
  if (!url || typeof url !== 'string') return false;

  try {
    normalizeUrl(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if two URLs are equivalent (after normalization)
 */
export function areUrlsEquivalent(url1: string, url2: string): boolean {
  try {
    return normalizeUrl(url1) === normalizeUrl(url2);
  } catch {
    return false;
  }
}
