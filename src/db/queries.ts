/**
 * Database query functions
 * The pages table is append-only: one row per processed frontier item
 */

import { RowDataPacket } from 'mysql2';
import { getPool } from '../config/database';
import {
  FETCH_FAILURE_KINDS,
  FetchFailureKind,
  PAGE_STATUSES,
  PageResult,
  PageStatus,
} from '../types/crawl.types';
import { CrawlRun, CrawlRunFinish, CrawlRunInsert, PageRow } from '../types/database.types';

/**
 * Append a page result
 *
 * @param page - Result to store
 * @param runId - Crawl run UUID, null for ad-hoc writes
 */
export async function insertPage(page: PageResult, runId: string | null): Promise<void> {
  const query = `
    INSERT INTO pages (
      run_id, url, depth, status, failure_kind, http_status, error_message,
      fetched_at, content_hash, links_found
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `;

  const params = [
    runId,
    page.url,
    page.depth,
    page.status,
    page.failureKind ?? null,
    page.httpStatusCode ?? null,
    page.errorMessage ?? null,
    page.fetchedAt,
    page.contentHash ?? null,
    JSON.stringify(page.links),
  ];

  await getPool().execute(query, params);
}

/**
 * Get stored pages in insertion order
 *
 * @param runId - Restrict to one crawl run
 * @returns Page results
 */
export async function selectPages(runId?: string): Promise<PageResult[]> {
  const [rows] = runId
    ? await getPool().execute<RowDataPacket[]>(
        'SELECT * FROM pages WHERE run_id = ? ORDER BY id',
        [runId]
      )
    : await getPool().execute<RowDataPacket[]>('SELECT * FROM pages ORDER BY id');

  return rows.map((row) => rowToPageResult(toPageRow(row)));
}

/**
 * Map a pages row back into a PageResult
 */
export function rowToPageResult(row: PageRow): PageResult {
  return {
    url: row.url,
    depth: row.depth,
    status: row.status,
    failureKind: row.failure_kind ?? undefined,
    httpStatusCode: row.http_status ?? undefined,
    errorMessage: row.error_message ?? undefined,
    fetchedAt: row.fetched_at,
    contentHash: row.content_hash ?? undefined,
    links: parseLinks(row.links_found),
  };
}

function parseLinks(value: PageRow['links_found']): string[] {
  if (value === null) return [];
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  return Array.isArray(parsed) ? parsed.filter((link): link is string => typeof link === 'string') : [];
}

function toPageStatus(value: unknown): PageStatus {
  const status = PAGE_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown page status in database: ${String(value)}`);
  }
  return status;
}

function toFailureKind(value: unknown): FetchFailureKind | null {
  return FETCH_FAILURE_KINDS.find((candidate) => candidate === value) ?? null;
}

function toPageRow(row: RowDataPacket): PageRow {
  return {
    id: Number(row.id),
    run_id: row.run_id ?? null,
    url: String(row.url),
    depth: Number(row.depth),
    status: toPageStatus(row.status),
    failure_kind: toFailureKind(row.failure_kind),
    http_status: row.http_status == null ? null : Number(row.http_status),
    error_message: row.error_message ?? null,
    fetched_at: row.fetched_at instanceof Date ? row.fetched_at : new Date(row.fetched_at),
    content_hash: row.content_hash ?? null,
    links_found: row.links_found ?? null,
  };
}

/**
 * Create a new crawl run
 *
 * @param run - Crawl run data
 */
export async function createCrawlRun(run: CrawlRunInsert): Promise<void> {
  const query = `
    INSERT INTO crawl_runs (
      run_id, base_url, max_depth, max_pages, num_workers
    ) VALUES (?, ?, ?, ?, ?)
  `;

  await getPool().execute(query, [
    run.run_id,
    run.base_url,
    run.max_depth,
    run.max_pages,
    run.num_workers,
  ]);
}

/**
 * Finish a crawl run (set finished_at and totals)
 *
 * @param runId - Crawl run UUID
 * @param stats - Final totals
 */
export async function finishCrawlRun(runId: string, stats: CrawlRunFinish): Promise<void> {
  const query = `
    UPDATE crawl_runs
    SET finished_at = CURRENT_TIMESTAMP, pages_crawled = ?, error_count = ?
    WHERE run_id = ?
  `;
  await getPool().execute(query, [stats.pages_crawled, stats.error_count, runId]);
}

/**
 * Get crawl run by ID
 *
 * @param runId - Crawl run UUID
 * @returns Crawl run data or null
 */
export async function getCrawlRun(runId: string): Promise<CrawlRun | null> {
  const query = 'SELECT * FROM crawl_runs WHERE run_id = ? LIMIT 1';
  const [rows] = await getPool().execute<RowDataPacket[]>(query, [runId]);

  if (rows.length === 0) return null;

  const row = rows[0];
  return {
    run_id: String(row.run_id),
    base_url: String(row.base_url),
    max_depth: Number(row.max_depth),
    max_pages: Number(row.max_pages),
    num_workers: Number(row.num_workers),
    started_at: row.started_at,
    finished_at: row.finished_at ?? null,
    pages_crawled: Number(row.pages_crawled),
    error_count: Number(row.error_count),
  };
}
