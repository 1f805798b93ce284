#!/usr/bin/env node
/**
 * Print the stored page results of a crawl run
 *
 * Usage:
 *   node dist/scripts/listPages.js <runId> [--json]
 */

import { closePool, testConnection } from '../config/database';
import { getCrawlRun } from '../db/queries';
import { SqlResultStore } from '../db/resultStore';
import { errorMessage } from '../core/errors';
import { countStatuses } from '../core/report';
import { PageResult } from '../types/crawl.types';
import { logger } from '../utils/logger';

/**
 * One line per page: status, depth, HTTP code, URL and error if any
 */
export function formatPageLine(page: PageResult): string {
  const code = page.httpStatusCode !== undefined ? String(page.httpStatusCode) : '-';
  const error = page.errorMessage ? `  (${page.errorMessage})` : '';
  return `${page.status.padEnd(10)} d=${page.depth} ${code.padStart(3)} ${page.url}${error}`;
}

async function listPages(runId: string, asJson: boolean): Promise<void> {
  try {
    await testConnection();

    const run = await getCrawlRun(runId);
    if (!run) {
      logger.error({ runId }, 'Crawl run not found');
      process.exitCode = 1;
      return;
    }

    const pages = await new SqlResultStore().queryAll(runId);

    if (asJson) {
      process.stdout.write(`${JSON.stringify(pages, null, 2)}\n`);
      return;
    }

    console.log(`\nRun ${run.run_id}  ${run.base_url}`);
    console.log(`Started ${run.started_at.toISOString()}  finished ${run.finished_at?.toISOString() ?? '-'}\n`);
    for (const page of pages) {
      console.log(formatPageLine(page));
    }
    console.log('\n', countStatuses(pages));
  } finally {
    await closePool();
  }
}

if (require.main === module) {
  const [runId, flag] = process.argv.slice(2);

  if (!runId) {
    console.error('Usage: node dist/scripts/listPages.js <runId> [--json]');
    process.exit(1);
  }

  listPages(runId, flag === '--json').catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, 'Failed to list pages');
    process.exit(1);
  });
}
