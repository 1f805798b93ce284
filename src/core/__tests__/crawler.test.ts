/**
 * Crawl coordinator tests
 */

import { runCrawl } from '../crawler';
import { InvalidOptionError, InvalidSeedUrlError } from '../errors';
import { InMemoryResultStore, ResultStore } from '../../db/resultStore';
import { CrawlOptions } from '../../types/crawl.types';
import { FakeSite, createChainSite, createSiteFetcher } from '../../__tests__/helpers/fixtures';

function options(overrides: Partial<CrawlOptions> = {}): CrawlOptions {
  return {
    baseUrl: 'http://example.com',
    maxDepth: 3,
    maxPages: 100,
    numWorkers: 3,
    runId: 'run-42',
    ...overrides,
  };
}

describe('runCrawl', () => {
  it('crawls only the seed when maxDepth is 0', async () => {
    const site = createChainSite(10, 3);
    const store = new InMemoryResultStore();

    const report = await runCrawl(options({ maxDepth: 0, maxPages: 10 }), {
      fetcher: createSiteFetcher(site),
      store,
      pollMs: 5,
    });

    expect(store.size).toBe(1);
    expect(report.pagesCrawled).toBe(1);
    expect(report.maxDepthReached).toBe(0);
    expect(report.visitedUrls).toEqual(['http://example.com/']);
    expect(report.baseUrl).toBe('http://example.com');
    expect(report.runId).toBe('run-42');
  });

  it('stops after maxPages with unique visited URLs', async () => {
    const store = new InMemoryResultStore();

    const report = await runCrawl(options({ maxPages: 5, maxDepth: 10 }), {
      fetcher: createSiteFetcher(createChainSite(20, 3)),
      store,
      pollMs: 5,
    });

    expect(report.pagesCrawled).toBe(5);
    expect(report.visitedUrls).toHaveLength(5);
    expect(new Set(report.visitedUrls).size).toBe(5);
    expect(report.storedResults).toBe(5);
    expect(report.statusCounts).toEqual({ Success: 5, FetchError: 0, ParseError: 0, Skipped: 0 });
  });

  it('counts a failing page and still completes', async () => {
    const site: FakeSite = {
      'http://example.com/': { links: ['/ok', '/fail'] },
      'http://example.com/ok': { links: [] },
      'http://example.com/fail': { status: 500 },
    };

    const report = await runCrawl(options(), {
      fetcher: createSiteFetcher(site),
      store: new InMemoryResultStore(),
      pollMs: 5,
    });

    expect(report.pagesCrawled).toBe(3);
    expect(report.errorCount).toBe(1);
    expect(report.maxDepthReached).toBe(1);
    expect(report.statusCounts).toEqual({ Success: 2, FetchError: 1, ParseError: 0, Skipped: 0 });
  });

  it('stays on the seed host unless allDomains is set', async () => {
    const site: FakeSite = {
      'http://example.com/': { links: ['https://other.org/'] },
      'https://other.org/': { links: [] },
    };

    const sameDomain = await runCrawl(options(), {
      fetcher: createSiteFetcher(site),
      store: new InMemoryResultStore(),
      pollMs: 5,
    });
    const allDomains = await runCrawl(options({ allDomains: true }), {
      fetcher: createSiteFetcher(site),
      store: new InMemoryResultStore(),
      pollMs: 5,
    });

    expect(sameDomain.visitedUrls).toEqual(['http://example.com/']);
    expect(allDomains.visitedUrls).toEqual(['http://example.com/', 'https://other.org/']);
  });

  it('rejects an invalid seed before fetching anything', async () => {
    const fetcher = createSiteFetcher({});

    await expect(
      runCrawl(options({ baseUrl: 'ftp://example.com/' }), { fetcher, store: new InMemoryResultStore() })
    ).rejects.toBeInstanceOf(InvalidSeedUrlError);
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  const invalidOptions: Array<[string, Partial<CrawlOptions>]> = [
    ['maxDepth', { maxDepth: -1 }],
    ['maxPages', { maxPages: 0 }],
    ['numWorkers', { numWorkers: 1.5 }],
    ['retries', { retries: -2 }],
  ];

  it.each(invalidOptions)('rejects an invalid %s', async (_name, overrides) => {
    await expect(
      runCrawl(options(overrides), { fetcher: createSiteFetcher({}), store: new InMemoryResultStore() })
    ).rejects.toBeInstanceOf(InvalidOptionError);
  });

  it('still reports when reading back the store fails', async () => {
    const store: ResultStore = {
      record: async () => undefined,
      queryAll: async () => {
        throw new Error('connection lost');
      },
    };

    const report = await runCrawl(options({ maxDepth: 0 }), {
      fetcher: createSiteFetcher({ 'http://example.com/': {} }),
      store,
      pollMs: 5,
    });

    expect(report.pagesCrawled).toBe(1);
    expect(report.storedResults).toBe(0);
    expect(report.statusCounts.Success).toBe(0);
  });

  it('reports a non-negative duration in seconds', async () => {
    const report = await runCrawl(options({ maxDepth: 0 }), {
      fetcher: createSiteFetcher({ 'http://example.com/': {} }),
      store: new InMemoryResultStore(),
      pollMs: 5,
    });

    expect(report.durationSeconds).toBeGreaterThanOrEqual(0);
  });
});
