/**
 * Shared crawl counters
 *
 * One instance per run, handed to every worker. Workers reserve a budget slot
 * before popping so that concurrent workers can never process more than
 * maxPages items between them.
 */

import { PageStatus } from '../types/crawl.types';

export class CrawlCounters {
  private processed = 0;
  private reserved = 0;
  private errors = 0;
  private deepest = -1;
  private readonly urls: string[] = [];

  constructor(readonly maxPages: number) {}

  /**
   * Claim one page of budget
   *
   * @returns false when processed + reserved pages already reach maxPages
   */
  tryReserve(): boolean {
    if (this.processed + this.reserved >= this.maxPages) return false;
    this.reserved++;
    return true;
  }

  /**
   * Give back a slot that was reserved but not used
   */
  release(): void {
    if (this.reserved > 0) this.reserved--;
  }

  /**
   * Convert a reservation into a processed page
   */
  recordProcessed(url: string, depth: number, status: PageStatus): void {
    this.release();
    this.processed++;
    this.urls.push(url);
    if (depth > this.deepest) this.deepest = depth;
    if (status === 'FetchError' || status === 'ParseError') this.errors++;
  }

  get pagesProcessed(): number {
    return this.processed;
  }

  get errorCount(): number {
    return this.errors;
  }

  /** -1 until the first page is processed */
  get maxDepthSeen(): number {
    return this.deepest;
  }

  get budgetExhausted(): boolean {
    return this.processed >= this.maxPages;
  }

  /** URLs in completion order */
  get visitedUrls(): readonly string[] {
    return this.urls;
  }
}
