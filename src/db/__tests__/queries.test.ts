/**
 * Query function tests against a mocked connection pool
 */

import { insertPage, rowToPageResult, selectPages, finishCrawlRun } from '../queries';
import { pageResult } from '../../__tests__/helpers/fixtures';

const mockExecute = jest.fn();

jest.mock('../../config/database', () => ({
  getPool: () => ({ execute: mockExecute }),
}));

describe('queries', () => {
  beforeEach(() => {
    mockExecute.mockReset();
  });

  it('insertPage writes one row with nulls for absent fields', async () => {
    mockExecute.mockResolvedValue([{ affectedRows: 1 }, []]);
    const fetchedAt = new Date('2024-05-06T07:08:09.000Z');

    await insertPage(
      pageResult({
        url: 'http://example.com/a',
        depth: 1,
        fetchedAt,
        links: ['http://example.com/b'],
      }),
      'run-1'
    );

    expect(mockExecute).toHaveBeenCalledTimes(1);
    const [sql, params] = mockExecute.mock.calls[0];
    expect(sql).toContain('INSERT INTO pages');
    expect(params).toEqual([
      'run-1',
      'http://example.com/a',
      1,
      'Success',
      null,
      null,
      null,
      fetchedAt,
      null,
      '["http://example.com/b"]',
    ]);
  });

  it('selectPages maps rows back to page results in id order', async () => {
    const fetchedAt = new Date('2024-05-06T07:08:09.000Z');
    mockExecute.mockResolvedValue([
      [
        {
          id: 7,
          run_id: 'run-1',
          url: 'http://example.com/x',
          depth: 2,
          status: 'FetchError',
          failure_kind: 'HttpError',
          http_status: 503,
          error_message: 'HTTP 503',
          fetched_at: fetchedAt,
          content_hash: null,
          links_found: '[]',
        },
      ],
      [],
    ]);

    const pages = await selectPages('run-1');

    expect(mockExecute).toHaveBeenCalledWith('SELECT * FROM pages WHERE run_id = ? ORDER BY id', ['run-1']);
    expect(pages).toEqual([
      {
        url: 'http://example.com/x',
        depth: 2,
        status: 'FetchError',
        failureKind: 'HttpError',
        httpStatusCode: 503,
        errorMessage: 'HTTP 503',
        fetchedAt,
        contentHash: undefined,
        links: [],
      },
    ]);
  });

  it('selectPages rejects rows with an unknown status', async () => {
    mockExecute.mockResolvedValue([[{ id: 1, url: 'http://example.com/', depth: 0, status: 'Weird' }], []]);

    await expect(selectPages()).rejects.toThrow('Unknown page status in database: Weird');
  });

  it('finishCrawlRun stores the totals', async () => {
    mockExecute.mockResolvedValue([{ affectedRows: 1 }, []]);

    await finishCrawlRun('run-1', { pages_crawled: 12, error_count: 3 });

    expect(mockExecute.mock.calls[0][1]).toEqual([12, 3, 'run-1']);
  });
});

describe('rowToPageResult', () => {
  const base = {
    id: 1,
    run_id: null,
    url: 'http://example.com/',
    depth: 0,
    status: 'Success' as const,
    failure_kind: null,
    http_status: 200,
    error_message: null,
    fetched_at: new Date('2024-01-01T00:00:00.000Z'),
    content_hash: 'abc',
  };

  it('accepts links already decoded by the driver', () => {
    expect(rowToPageResult({ ...base, links_found: ['http://example.com/a'] }).links).toEqual([
      'http://example.com/a',
    ]);
  });

  it('decodes links stored as a JSON string and drops non-strings', () => {
    expect(rowToPageResult({ ...base, links_found: '["http://example.com/a", 3]' }).links).toEqual([
      'http://example.com/a',
    ]);
  });

  it('treats a null column as no links', () => {
    expect(rowToPageResult({ ...base, links_found: null }).links).toEqual([]);
  });
});
