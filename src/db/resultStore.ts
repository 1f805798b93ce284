/**
 * Result store: durable append of page results
 */

import { PageResult } from '../types/crawl.types';
import { StoreWriteError } from '../core/errors';
import { insertPage, selectPages } from './queries';

export interface ResultStore {
  /**
   * Append one result. Rejects with StoreWriteError when the write fails.
   */
  record(result: PageResult, runId: string | null): Promise<void>;

  /**
   * Stored results in completion order
   */
  queryAll(runId?: string): Promise<PageResult[]>;
}

/**
 * Table access used by SqlResultStore
 */
export interface PageTable {
  insertPage(result: PageResult, runId: string | null): Promise<void>;
  selectPages(runId?: string): Promise<PageResult[]>;
}

export const mysqlPageTable: PageTable = { insertPage, selectPages };

/**
 * Store that serializes writes through a single promise chain, so rows are
 * inserted one at a time in the order record() was called
 */
export class SqlResultStore implements ResultStore {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly table: PageTable = mysqlPageTable) {}

  record(result: PageResult, runId: string | null): Promise<void> {
    const write = this.tail.then(() => this.table.insertPage(result, runId));
    // The caller receives the failure below; the chain itself keeps going
    this.tail = write.then(
      () => undefined,
      () => undefined
    );
    return write.catch((error: unknown) => {
      throw new StoreWriteError(result.url, { cause: error });
    });
  }

  /**
   * Wait for queued writes to settle
   */
  flush(): Promise<void> {
    return this.tail;
  }

  async queryAll(runId?: string): Promise<PageResult[]> {
    await this.flush();
    return this.table.selectPages(runId);
  }
}

/**
 * Process-local store, used with --no-db and in tests
 */
export class InMemoryResultStore implements ResultStore {
  private readonly rows: Array<{ runId: string | null; result: PageResult }> = [];

  async record(result: PageResult, runId: string | null): Promise<void> {
    this.rows.push({ runId, result });
  }

  async queryAll(runId?: string): Promise<PageResult[]> {
    return this.rows
      .filter((row) => runId === undefined || row.runId === runId)
      .map((row) => row.result);
  }

  get size(): number {
    return this.rows.length;
  }
}
