/**
 * Test fixtures: in-memory sites served through a fake fetcher
 */

import { PageFetcher } from '../../core/workerPool';
import { FetchFailure, FetchOutcome, PageResult } from '../../types/crawl.types';

export interface FakePage {
  links?: string[];
  /** Respond with this HTTP status instead of a page */
  status?: number;
  contentType?: string | null;
  /** Raw body; built from links when omitted */
  body?: string;
  failure?: FetchFailure;
}

export type FakeSite = Record<string, FakePage>;

export function htmlWithLinks(links: string[]): string {
  const anchors = links.map((href) => `<a href="${href}">link</a>`).join('\n');
  return `<!doctype html><html><head><title>t</title></head><body>${anchors}</body></html>`;
}

/**
 * Fetcher answering from a map of URL to page
 * Unknown URLs answer 404. Each call yields to the event loop first so that
 * workers interleave the way they do on real I/O.
 */
export function createSiteFetcher(site: FakeSite): PageFetcher & {
  fetch: jest.Mock<Promise<FetchOutcome>, [string]>;
} {
  return {
    fetch: jest.fn(async (url: string): Promise<FetchOutcome> => {
      await new Promise<void>((resolve) => setImmediate(resolve));

      const page = site[url];
      if (!page) {
        return { ok: false, failure: { kind: 'HttpError', statusCode: 404, message: 'HTTP 404' } };
      }
      if (page.failure) {
        return { ok: false, failure: page.failure };
      }
      if (page.status !== undefined && page.status >= 400) {
        return {
          ok: false,
          failure: { kind: 'HttpError', statusCode: page.status, message: `HTTP ${page.status}` },
        };
      }
      return {
        ok: true,
        statusCode: page.status ?? 200,
        contentType: page.contentType === undefined ? 'text/html; charset=utf-8' : page.contentType,
        body: page.body ?? htmlWithLinks(page.links ?? []),
      };
    }),
  };
}

/**
 * Site where every page links to the next `fanout` pages, `size` pages total:
 * http://example.com/ , http://example.com/p1 ... http://example.com/p{size-1}
 */
export function createChainSite(size: number, fanout: number): FakeSite {
  const url = (i: number) => (i === 0 ? 'http://example.com/' : `http://example.com/p${i}`);
  const site: FakeSite = {};
  for (let i = 0; i < size; i++) {
    const links: string[] = [];
    for (let j = 1; j <= fanout && i + j < size; j++) {
      links.push(url(i + j));
    }
    site[url(i)] = { links };
  }
  return site;
}

export function pageResult(overrides: Partial<PageResult> & { url: string }): PageResult {
  return {
    depth: 0,
    status: 'Success',
    fetchedAt: new Date('2024-01-02T03:04:05.000Z'),
    links: [],
    ...overrides,
  };
}
