/**
 * Worker pool: N async workers draining the shared frontier
 *
 * Each worker loops: check stop conditions, reserve a budget slot, pop,
 * fetch, extract, push discovered links, record, complete. A failure on one
 * page becomes that page's PageResult and never stops the pool.
 */

import { setTimeout as sleep } from 'timers/promises';
import { FRONTIER_POLL_MS, RETRY_DELAY_MS } from '../config/constants';
import { isHtmlContentType, extractLinks } from '../parsers/linkExtractor';
import { ResultStore } from '../db/resultStore';
import {
  FetchFailure,
  FetchOutcome,
  FrontierItem,
  PageResult,
  WorkerExitReason,
} from '../types/crawl.types';
import { hashPageContent } from '../utils/hash';
import { logger } from '../utils/logger';
import { CrawlCounters } from './counters';
import { ParseError, errorMessage } from './errors';
import { Frontier } from './frontier';
import { LinkPolicy, normalizeLink } from './urlNormalizer';

export interface PageFetcher {
  fetch(url: string): Promise<FetchOutcome>;
}

export interface WorkerPoolDeps {
  frontier: Frontier;
  counters: CrawlCounters;
  fetcher: PageFetcher;
  store: ResultStore;
  /** Omit to follow links to any host */
  linkPolicy?: LinkPolicy;
}

export interface WorkerPoolOptions {
  numWorkers: number;
  runId: string | null;
  /** Extra attempts after a network failure */
  retries?: number;
  retryDelayMs?: number;
  /** Longest a worker waits on an empty frontier before re-checking stop conditions */
  pollMs?: number;
  signal?: AbortSignal;
  onPageProcessed?: (result: PageResult) => void;
}

/**
 * Run the pool until every worker has stopped
 *
 * @returns Exit reason of each worker, by worker index
 */
export async function runWorkerPool(
  deps: WorkerPoolDeps,
  options: WorkerPoolOptions
): Promise<WorkerExitReason[]> {
  const { frontier } = deps;
  const onAbort = () => frontier.close();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const workers = Array.from({ length: options.numWorkers }, (_, index) =>
      runWorker(index, deps, options)
    );
    return await Promise.all(workers);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}

async function runWorker(
  workerId: number,
  deps: WorkerPoolDeps,
  options: WorkerPoolOptions
): Promise<WorkerExitReason> {
  const { frontier, counters } = deps;
  const pollMs = options.pollMs ?? FRONTIER_POLL_MS;

  logger.debug({ workerId }, 'Worker started');

  for (;;) {
    if (options.signal?.aborted) return exit(workerId, 'aborted');
    if (!counters.tryReserve()) return exit(workerId, 'budget');

    const popped = await frontier.pop(pollMs);

    if (popped.kind === 'timeout') {
      counters.release();
      continue;
    }
    if (popped.kind === 'empty') {
      counters.release();
      return exit(workerId, options.signal?.aborted ? 'aborted' : 'drained');
    }

    const item = popped.item;
    try {
      await handleItem(workerId, item, deps, options);
    } finally {
      frontier.complete(item);
    }
  }
}

function exit(workerId: number, reason: WorkerExitReason): WorkerExitReason {
  logger.debug({ workerId, reason }, 'Worker stopped');
  return reason;
}

/**
 * Process one item and account for it; every popped item yields exactly one PageResult
 */
async function handleItem(
  workerId: number,
  item: FrontierItem,
  deps: WorkerPoolDeps,
  options: WorkerPoolOptions
): Promise<void> {
  let result: PageResult;
  try {
    result = await processItem(item, deps, options);
  } catch (error) {
    logger.error({ workerId, url: item.url, error: errorMessage(error) }, 'Unexpected error processing page');
    result = {
      url: item.url,
      depth: item.depth,
      status: 'FetchError',
      errorMessage: errorMessage(error),
      fetchedAt: new Date(),
      links: [],
    };
  }

  deps.counters.recordProcessed(result.url, result.depth, result.status);

  if (result.status === 'Success') {
    logger.info({ workerId, url: item.url, depth: item.depth, links: result.links.length }, 'Page crawled');
  } else {
    logger.warn(
      { workerId, url: item.url, status: result.status, error: result.errorMessage },
      'Page not crawled'
    );
  }

  try {
    await deps.store.record(result, options.runId);
  } catch (error) {
    logger.error({ workerId, url: item.url, error: errorMessage(error) }, 'Failed to save page');
  }

  options.onPageProcessed?.(result);
}

async function processItem(
  item: FrontierItem,
  deps: WorkerPoolDeps,
  options: WorkerPoolOptions
): Promise<PageResult> {
  const outcome = await fetchWithRetry(deps.fetcher, item.url, options);
  const fetchedAt = new Date();

  if (!outcome.ok) {
    return failedResult(item, outcome.failure, fetchedAt);
  }

  const base = {
    url: item.url,
    depth: item.depth,
    httpStatusCode: outcome.statusCode,
    fetchedAt,
    contentHash: hashPageContent(outcome.body),
  };

  if (!isHtmlContentType(outcome.contentType)) {
    return {
      ...base,
      status: 'Skipped',
      errorMessage: `Not an HTML document (${outcome.contentType})`,
      links: [],
    };
  }

  let rawLinks: string[];
  try {
    rawLinks = extractLinks(outcome.body, item.url);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    return { ...base, status: 'ParseError', errorMessage: error.message, links: [] };
  }

  const links = pushDiscovered(item, rawLinks, deps);
  return { ...base, status: 'Success', links };
}

/**
 * Normalize extracted links and offer them to the frontier
 *
 * @returns Accepted links found on the page, first occurrence order
 */
function pushDiscovered(item: FrontierItem, rawLinks: string[], deps: WorkerPoolDeps): string[] {
  const seen = new Set<string>();
  let queued = 0;

  for (const raw of rawLinks) {
    const link = normalizeLink(raw, item.url, deps.linkPolicy);
    if (!link || seen.has(link)) continue;
    seen.add(link);
    if (deps.frontier.tryPush(link, item.depth + 1)) queued++;
  }

  logger.debug({ url: item.url, found: seen.size, queued }, 'Links discovered');
  return Array.from(seen);
}

async function fetchWithRetry(
  fetcher: PageFetcher,
  url: string,
  options: WorkerPoolOptions
): Promise<FetchOutcome> {
  const retries = options.retries ?? 0;
  let attempt = 0;

  for (;;) {
    const outcome = await fetcher.fetch(url);
    if (outcome.ok || outcome.failure.kind !== 'NetworkError' || attempt >= retries) {
      return outcome;
    }
    attempt++;
    logger.debug({ url, attempt, error: outcome.failure.message }, 'Retrying after network error');
    await sleep(options.retryDelayMs ?? RETRY_DELAY_MS);
  }
}

function failedResult(item: FrontierItem, failure: FetchFailure, fetchedAt: Date): PageResult {
  return {
    url: item.url,
    depth: item.depth,
    status: 'FetchError',
    failureKind: failure.kind,
    httpStatusCode: failure.kind === 'HttpError' ? failure.statusCode : undefined,
    errorMessage: failure.message,
    fetchedAt,
    links: [],
  };
}
