/**
 * Link extraction from fetched HTML
 * Selects anchor hrefs; normalization and filtering happen in urlNormalizer
 */

import * as cheerio from 'cheerio';
import { ParseError, errorMessage } from '../core/errors';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml', 'text/plain'];

/**
 * Whether a response should go through link extraction
 * A missing content type is treated as HTML.
 */
export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return HTML_CONTENT_TYPES.includes(mime);
}

/**
 * Extract raw link targets from an HTML document
 *
 * Links are returned in document order, as written, except that relative
 * links are resolved against a <base href> when the document declares one.
 *
 * @param html - Page body
 * @param baseUrl - URL the page was fetched from
 * @returns href values of <a> elements
 * @throws ParseError when the body is not text or cannot be parsed
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  if (html.includes('\u0000')) {
    throw new ParseError(baseUrl, 'body is not text');
  }

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ParseError(baseUrl, errorMessage(error), { cause: error });
  }

  const documentBase = resolveHref($('base[href]').first().attr('href'), baseUrl);

  const links: string[] = [];
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href) return;

    const resolved =
      documentBase && !href.trim().startsWith('#') ? resolveHref(href.trim(), documentBase) : null;
    links.push(resolved ?? href);
  });

  return links;
}

function resolveHref(href: string | undefined, against: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, against).toString();
  } catch {
    return null;
  }
}
