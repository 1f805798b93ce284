/**
 * HTTP client capability used by the fetcher
 *
 * GET only, no retries, bounded by a per-request timeout and a body size cap.
 */

import got, { CancelError, Got, Progress } from 'got';
import { env } from '../config/env';

export interface HttpGetOptions {
  timeoutMs: number;
  maxBytes: number;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
  contentType: string | null;
}

export interface HttpClient {
  /**
   * Perform one GET. Resolves for every HTTP status; rejects on transport
   * failures and with ResponseTooLargeError when the body exceeds maxBytes.
   */
  get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
}

export class ResponseTooLargeError extends Error {
  constructor(readonly url: string, readonly limitBytes: number) {
    super(`Response body of ${url} exceeds ${limitBytes} bytes`);
    this.name = 'ResponseTooLargeError';
  }
}

/**
 * HttpClient backed by got
 */
export class GotHttpClient implements HttpClient {
  private readonly client: Got;

  constructor(userAgent: string = env.userAgent) {
    this.client = got.extend({
      followRedirect: true,
      throwHttpErrors: false,
      retry: { limit: 0 },
      headers: {
        'user-agent': userAgent,
        accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      },
    });
  }

  async get(url: string, options: HttpGetOptions): Promise<HttpResponse> {
    let tooLarge = false;

    const request = this.client.get(url, {
      responseType: 'buffer',
      timeout: { request: options.timeoutMs },
    });

    request.on('downloadProgress', (progress: Progress) => {
      const declared = progress.total ?? 0;
      if (!tooLarge && (progress.transferred > options.maxBytes || declared > options.maxBytes)) {
        tooLarge = true;
        request.cancel();
      }
    });

    try {
      const response = await request;
      const contentType = response.headers['content-type'];
      return {
        statusCode: response.statusCode,
        body: response.body.toString('utf-8'),
        contentType: typeof contentType === 'string' ? contentType : null,
      };
    } catch (error) {
      if (tooLarge && error instanceof CancelError) {
        throw new ResponseTooLargeError(url, options.maxBytes);
      }
      throw error;
    }
  }
}
