/**
 * Fetcher: one HTTP GET turned into a typed outcome
 *
 * Stateless; never retries (retry policy belongs to the worker).
 */

import { DEFAULT_MAX_BODY_BYTES, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/constants';
import { HttpClient, ResponseTooLargeError } from '../http/httpClient';
import { FetchOutcome } from '../types/crawl.types';
import { errorMessage } from './errors';

export interface FetcherOptions {
  timeoutMs?: number;
  maxBytes?: number;
}

export class Fetcher {
  readonly timeoutMs: number;
  readonly maxBytes: number;

  constructor(private readonly http: HttpClient, options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    try {
      const response = await this.http.get(url, {
        timeoutMs: this.timeoutMs,
        maxBytes: this.maxBytes,
      });

      if (response.statusCode >= 400) {
        return {
          ok: false,
          failure: {
            kind: 'HttpError',
            statusCode: response.statusCode,
            message: `HTTP ${response.statusCode}`,
          },
        };
      }

      // Servers that ignore content-length still get capped on the decoded body
      if (Buffer.byteLength(response.body, 'utf-8') > this.maxBytes) {
        return { ok: false, failure: tooLarge(url, this.maxBytes) };
      }

      return {
        ok: true,
        body: response.body,
        statusCode: response.statusCode,
        contentType: response.contentType,
      };
    } catch (error) {
      if (error instanceof ResponseTooLargeError) {
        return { ok: false, failure: tooLarge(url, error.limitBytes) };
      }
      return {
        ok: false,
        failure: { kind: 'NetworkError', message: errorMessage(error) },
      };
    }
  }
}

function tooLarge(url: string, limitBytes: number) {
  return {
    kind: 'TooLarge' as const,
    limitBytes,
    message: `Response body of ${url} exceeds ${limitBytes} bytes`,
  };
}
