/**
 * Hashing utilities
 * Used for content change detection between crawl runs
 */

import crypto from 'crypto';

/**
 * Generate MD5 hash of content
 *
 * @returns MD5 hash string (32 characters)
 */
export function md5Hash(content: string): string {
  return crypto.createHash('md5').update(content).digest('hex');
}

/**
 * Generate content hash from a page body
 * Collapses whitespace first so formatting-only changes hash the same
 *
 * @param body - Page body
 * @returns MD5 hash, or undefined for an empty body
 */
export function hashPageContent(body: string): string | undefined {
  const normalized = body.replace(/\s+/g, ' ').trim();
  if (!normalized) return undefined;
  return md5Hash(normalized);
}
