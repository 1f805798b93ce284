/**
 * Global constants for the crawler
 */

/**
 * URL tracking parameters to strip during normalization
 * These don't affect content but create duplicate URLs
 */
export const TRACKING_PARAMS = [
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'utm_id',
  'fbclid',
  'gclid',
  'msclkid',
  'mc_cid',
  'mc_eid',
  '_ga',
  '_gl',
];

/**
 * Link targets that are never crawled (binary assets)
 */
export const IGNORED_EXTENSIONS = [
  '.pdf',
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.svg',
  '.webp',
  '.ico',
  '.zip',
  '.gz',
  '.mp3',
  '.mp4',
  '.css',
  '.js',
];

/**
 * Crawl defaults
 */
export const DEFAULT_MAX_DEPTH = 3;
export const DEFAULT_MAX_PAGES = 100;
export const DEFAULT_NUM_WORKERS = 5;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024;
export const DEFAULT_RETRIES = 0;
export const RETRY_DELAY_MS = 500;

/**
 * How long an idle worker waits on the frontier before re-checking stop conditions
 */
export const FRONTIER_POLL_MS = 250;

/**
 * Log progress every N processed pages
 */
export const PROGRESS_LOG_INTERVAL = 10;

/**
 * User agent string
 */
export const USER_AGENT = 'Mozilla/5.0 (compatible; FrontierCrawler/1.0)';
