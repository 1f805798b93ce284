/**
 * Crawler error taxonomy
 *
 * Per-page fetch failures are values (see FetchFailure in types/crawl.types.ts);
 * the classes here are thrown. InvalidSeedUrlError and InvalidOptionError abort
 * a run before any worker starts; the others are recorded per page.
 */

export type CrawlerErrorCode =
  | 'INVALID_SEED_URL'
  | 'INVALID_OPTION'
  | 'PARSE_ERROR'
  | 'STORE_WRITE_ERROR';

export abstract class CrawlerError extends Error {
  abstract readonly code: CrawlerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidSeedUrlError extends CrawlerError {
  readonly code = 'INVALID_SEED_URL';

  constructor(readonly url: string, reason: string) {
    super(`Invalid seed URL "${url}": ${reason}`);
  }
}

export class InvalidOptionError extends CrawlerError {
  readonly code = 'INVALID_OPTION';

  constructor(readonly option: string, reason: string) {
    super(`Invalid option ${option}: ${reason}`);
  }
}

export class ParseError extends CrawlerError {
  readonly code = 'PARSE_ERROR';

  constructor(readonly url: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${url}: ${reason}`, options);
  }
}

export class StoreWriteError extends CrawlerError {
  readonly code = 'STORE_WRITE_ERROR';

  constructor(readonly url: string, options?: { cause?: unknown }) {
    super(
      `Failed to record result for ${url}: ${
        options?.cause instanceof Error ? options.cause.message : String(options?.cause)
      }`,
      options
    );
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
