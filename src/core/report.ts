/**
 * Crawl report assembly and serialization
 */

import { CrawlReport, PageResult, PageStatus } from '../types/crawl.types';
import { CrawlCounters } from './counters';

/**
 * JSON shape printed by the CLI
 */
export interface CrawlReportJson {
  base_url: string;
  max_depth_reached: number;
  pages_crawled: number;
  error_count: number;
  duration_seconds: number;
  visited_urls: string[];
  run_id: string;
  status_counts: Record<PageStatus, number>;
  stored_results: number;
}

export function countStatuses(results: readonly PageResult[]): Record<PageStatus, number> {
  const counts = emptyStatusCounts();
  for (const result of results) {
    counts[result.status]++;
  }
  return counts;
}

function emptyStatusCounts(): Record<PageStatus, number> {
  return { Success: 0, FetchError: 0, ParseError: 0, Skipped: 0 };
}

/**
 * Build the final report from the run's counters and its stored results
 */
export function buildReport(params: {
  runId: string;
  baseUrl: string;
  counters: CrawlCounters;
  storedResults: readonly PageResult[];
  durationMs: number;
}): CrawlReport {
  const { counters } = params;
  return {
    runId: params.runId,
    baseUrl: params.baseUrl,
    maxDepthReached: Math.max(0, counters.maxDepthSeen),
    pagesCrawled: counters.pagesProcessed,
    errorCount: counters.errorCount,
    durationSeconds: Math.round(params.durationMs / 10) / 100,
    visitedUrls: [...counters.visitedUrls],
    statusCounts: countStatuses(params.storedResults),
    storedResults: params.storedResults.length,
  };
}

export function toReportJson(report: CrawlReport): CrawlReportJson {
  return {
    base_url: report.baseUrl,
    max_depth_reached: report.maxDepthReached,
    pages_crawled: report.pagesCrawled,
    error_count: report.errorCount,
    duration_seconds: report.durationSeconds,
    visited_urls: report.visitedUrls,
    run_id: report.runId,
    status_counts: report.statusCounts,
    stored_results: report.storedResults,
  };
}
