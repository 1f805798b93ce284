/**
 * Crawl coordinator
 * Seeds the frontier, runs the worker pool to completion and builds the report
 */

import { PROGRESS_LOG_INTERVAL } from '../config/constants';
import { ResultStore } from '../db/resultStore';
import { CrawlOptions, CrawlReport, PageResult } from '../types/crawl.types';
import { logCrawlProgress, logger } from '../utils/logger';
import { CrawlCounters } from './counters';
import { InvalidOptionError, InvalidSeedUrlError, errorMessage } from './errors';
import { Frontier } from './frontier';
import { buildReport } from './report';
import { LinkPolicy, extractDomain, normalizeUrl } from './urlNormalizer';
import { PageFetcher, runWorkerPool } from './workerPool';

export interface CrawlDeps {
  fetcher: PageFetcher;
  store: ResultStore;
  /** Frontier wait between stop-condition checks */
  pollMs?: number;
  retryDelayMs?: number;
}

/**
 * Run a crawl with the given options
 *
 * @param options - Crawl configuration
 * @param deps - Fetcher and result store
 * @returns Crawl report
 * @throws InvalidSeedUrlError or InvalidOptionError before any worker starts
 */
export async function runCrawl(options: CrawlOptions, deps: CrawlDeps): Promise<CrawlReport> {
  validateOptions(options);

  let seedUrl: string;
  try {
    seedUrl = normalizeUrl(options.baseUrl);
  } catch (error) {
    throw new InvalidSeedUrlError(options.baseUrl, errorMessage(error));
  }

  const startTime = Date.now();
  const frontier = new Frontier(options.maxDepth);
  const counters = new CrawlCounters(options.maxPages);
  frontier.seed(seedUrl);

  const linkPolicy: LinkPolicy | undefined = options.allDomains
    ? undefined
    : { allowedHost: extractDomain(seedUrl), sameDomainOnly: true };

  logger.info(
    {
      runId: options.runId,
      seedUrl,
      maxDepth: options.maxDepth,
      maxPages: options.maxPages,
      numWorkers: options.numWorkers,
      sameDomainOnly: linkPolicy !== undefined,
    },
    'Starting crawl'
  );

  const exits = await runWorkerPool(
    { frontier, counters, fetcher: deps.fetcher, store: deps.store, linkPolicy },
    {
      numWorkers: options.numWorkers,
      runId: options.runId,
      retries: options.retries,
      retryDelayMs: deps.retryDelayMs,
      pollMs: deps.pollMs,
      signal: options.signal,
      onPageProcessed: () => {
        if (counters.pagesProcessed % PROGRESS_LOG_INTERVAL === 0) {
          logCrawlProgress({
            processed: counters.pagesProcessed,
            maxPages: options.maxPages,
            errors: counters.errorCount,
            queued: frontier.size,
          });
        }
      },
    }
  );

  let storedResults: PageResult[] = [];
  try {
    storedResults = await deps.store.queryAll(options.runId);
  } catch (error) {
    logger.error({ runId: options.runId, error: errorMessage(error) }, 'Failed to read stored results');
  }

  if (storedResults.length !== counters.pagesProcessed) {
    logger.warn(
      { processed: counters.pagesProcessed, stored: storedResults.length },
      'Stored results do not match processed pages'
    );
  }

  const report = buildReport({
    runId: options.runId,
    baseUrl: options.baseUrl,
    counters,
    storedResults,
    durationMs: Date.now() - startTime,
  });

  logger.info(
    {
      runId: options.runId,
      pagesCrawled: report.pagesCrawled,
      errors: report.errorCount,
      leftInFrontier: frontier.size,
      exits,
      durationSec: report.durationSeconds,
    },
    'Crawl completed'
  );

  return report;
}

function validateOptions(options: CrawlOptions): void {
  requireInteger('maxDepth', options.maxDepth, 0);
  requireInteger('maxPages', options.maxPages, 1);
  requireInteger('numWorkers', options.numWorkers, 1);
  if (options.retries !== undefined) requireInteger('retries', options.retries, 0);
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidOptionError(name, `expected an integer >= ${min}, got ${value}`);
  }
}
