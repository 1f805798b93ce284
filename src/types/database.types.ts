/**
 * Database type definitions
 * Corresponds to MySQL schema in src/db/schema.sql
 */

import { FetchFailureKind, PageStatus } from './crawl.types';

/**
 * pages table
 */
export interface PageRow {
  id: number;
  run_id: string | null;
  url: string;
  depth: number;
  status: PageStatus;
  failure_kind: FetchFailureKind | null;
  http_status: number | null;
  error_message: string | null;
  fetched_at: Date;
  content_hash: string | null;
  links_found: string[] | string | null;
}

/**
 * crawl_runs table
 */
export interface CrawlRun {
  run_id: string;
  base_url: string;
  max_depth: number;
  max_pages: number;
  num_workers: number;
  started_at: Date;
  finished_at: Date | null;
  pages_crawled: number;
  error_count: number;
}

/**
 * Insert type for crawl_runs
 */
export interface CrawlRunInsert {
  run_id: string;
  base_url: string;
  max_depth: number;
  max_pages: number;
  num_workers: number;
}

/**
 * Final statistics for crawl_runs
 */
export interface CrawlRunFinish {
  pages_crawled: number;
  error_count: number;
}
