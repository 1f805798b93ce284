/**
 * Crawl-related type definitions
 */

/**
 * A URL waiting in (or taken from) the frontier
 */
export interface FrontierItem {
  readonly url: string;
  readonly depth: number;
}

export type PageStatus = 'Success' | 'FetchError' | 'ParseError' | 'Skipped';

export const PAGE_STATUSES: readonly PageStatus[] = [
  'Success',
  'FetchError',
  'ParseError',
  'Skipped',
];

/**
 * Why a fetch did not produce a usable body
 */
export type FetchFailure =
  | { kind: 'NetworkError'; message: string }
  | { kind: 'HttpError'; statusCode: number; message: string }
  | { kind: 'TooLarge'; limitBytes: number; message: string };

export type FetchFailureKind = FetchFailure['kind'];

export const FETCH_FAILURE_KINDS: readonly FetchFailureKind[] = ['NetworkError', 'HttpError', 'TooLarge'];

export type FetchOutcome =
  | { ok: true; body: string; statusCode: number; contentType: string | null }
  | { ok: false; failure: FetchFailure };

/**
 * Outcome of processing one frontier item
 */
export interface PageResult {
  readonly url: string;
  readonly depth: number;
  readonly status: PageStatus;
  readonly httpStatusCode?: number;
  readonly errorMessage?: string;
  readonly failureKind?: FetchFailureKind;
  readonly fetchedAt: Date;
  readonly contentHash?: string;
  readonly links: readonly string[];
}

/**
 * Crawl options
 */
export interface CrawlOptions {
  baseUrl: string;
  maxDepth: number;
  maxPages: number;
  numWorkers: number;
  /** Follow links to other hosts than the seed's */
  allDomains?: boolean;
  /** Extra attempts for network failures */
  retries?: number;
  runId: string;
  signal?: AbortSignal;
}

export type WorkerExitReason = 'budget' | 'drained' | 'aborted';

/**
 * Summary written at the end of a crawl
 */
export interface CrawlReport {
  runId: string;
  baseUrl: string;
  maxDepthReached: number;
  pagesCrawled: number;
  errorCount: number;
  durationSeconds: number;
  visitedUrls: string[];
  statusCounts: Record<PageStatus, number>;
  /** Results readable from the store; lower than pagesCrawled when writes failed */
  storedResults: number;
}
