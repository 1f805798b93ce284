#!/usr/bin/env node

/**
 * CLI entry point for the crawler
 */

import fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { v4 as uuidv4 } from 'uuid';
import { runCrawl } from './core/crawler';
import { InvalidSeedUrlError, errorMessage } from './core/errors';
import { isValidUrl } from './core/urlNormalizer';
import { Fetcher } from './core/fetcher';
import { toReportJson } from './core/report';
import { testConnection, ensureSchema, closePool } from './config/database';
import { createCrawlRun, finishCrawlRun } from './db/queries';
import { InMemoryResultStore, ResultStore, SqlResultStore } from './db/resultStore';
import { GotHttpClient } from './http/httpClient';
import { CrawlOptions } from './types/crawl.types';
import { logger } from './utils/logger';
import {
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_PAGES,
  DEFAULT_NUM_WORKERS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRIES,
} from './config/constants';

interface CliOptions {
  maxDepth: number;
  maxPages: number;
  numThreads: number;
  timeout: number;
  maxBytes: number;
  retries: number;
  allDomains?: boolean;
  output?: string;
  db: boolean;
  debug?: boolean;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('crawl')
  .description('Bounded multi-worker web crawler')
  .version('1.0.0')
  .argument('<base_url>', 'Seed URL to start crawling from')
  .option('--max-depth <n>', 'Maximum link depth from the seed', parseNonNegativeInt, DEFAULT_MAX_DEPTH)
  .option('--max-pages <n>', 'Maximum pages to process', parsePositiveInt, DEFAULT_MAX_PAGES)
  .option('--num-threads <n>', 'Number of concurrent workers', parsePositiveInt, DEFAULT_NUM_WORKERS)
  .option('--timeout <ms>', 'Per-request timeout', parsePositiveInt, DEFAULT_REQUEST_TIMEOUT_MS)
  .option('--max-bytes <n>', 'Maximum response body size', parsePositiveInt, DEFAULT_MAX_BODY_BYTES)
  .option('--retries <n>', 'Retries after a network error', parseNonNegativeInt, DEFAULT_RETRIES)
  .option('--all-domains', 'Follow links to other hosts')
  .option('-o, --output <file>', 'Also write the JSON report to a file')
  .option('--no-db', 'Keep results in memory instead of MySQL')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (baseUrl: string, options: CliOptions) => {
    try {
      await main(baseUrl, options);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Crawl failed');
      await closePool().catch((closeError: unknown) => {
        logger.error({ error: errorMessage(closeError) }, 'Failed to close database pool');
      });
      process.exitCode = 1;
    }
  });

/**
 * Main crawl execution
 */
async function main(baseUrl: string, cliOptions: CliOptions) {
  const runId = uuidv4();

  if (cliOptions.debug) {
    logger.level = 'debug';
  }

  // Reject a bad seed before touching the database
  if (!isValidUrl(baseUrl)) {
    throw new InvalidSeedUrlError(baseUrl, 'not an http(s) URL');
  }

  logger.info({ runId, options: cliOptions }, 'Crawler starting');

  let store: ResultStore;
  if (cliOptions.db) {
    await testConnection();
    await ensureSchema();
    store = new SqlResultStore();
  } else {
    store = new InMemoryResultStore();
  }

  const crawlOptions: CrawlOptions = {
    baseUrl,
    maxDepth: cliOptions.maxDepth,
    maxPages: cliOptions.maxPages,
    numWorkers: cliOptions.numThreads,
    allDomains: cliOptions.allDomains,
    retries: cliOptions.retries,
    runId,
    signal: shutdownSignal(),
  };

  if (cliOptions.db) {
    await createCrawlRun({
      run_id: runId,
      base_url: baseUrl,
      max_depth: crawlOptions.maxDepth,
      max_pages: crawlOptions.maxPages,
      num_workers: crawlOptions.numWorkers,
    });
  }

  const fetcher = new Fetcher(new GotHttpClient(), {
    timeoutMs: cliOptions.timeout,
    maxBytes: cliOptions.maxBytes,
  });

  const report = await runCrawl(crawlOptions, { fetcher, store });

  if (cliOptions.db) {
    await finishCrawlRun(runId, {
      pages_crawled: report.pagesCrawled,
      error_count: report.errorCount,
    });
    await closePool();
  }

  const json = JSON.stringify(toReportJson(report), null, 2);
  if (cliOptions.output) {
    await fs.promises.writeFile(cliOptions.output, `${json}\n`, 'utf-8');
    logger.info({ file: cliOptions.output }, 'Report written');
  }
  process.stdout.write(`${json}\n`);
}

/**
 * Abort signal fired on SIGINT/SIGTERM; workers finish their current page and stop
 */
function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Stopping crawl');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}

// Parse CLI arguments
program.parseAsync().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Fatal error');
  process.exit(1);
});
