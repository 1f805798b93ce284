/**
 * Structured logging with Pino
 *
 * Logs are written to stderr: stdout is reserved for the crawl report.
 */

import pino from 'pino';
import { env } from '../config/env';

/**
 * Create Pino logger instance
 */
export const logger = pino(
  {
    level: env.logLevel,
    transport: env.logPretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
  },
  env.logPretty ? undefined : pino.destination(2)
);

/**
 * Log crawl progress
 */
export function logCrawlProgress(stats: {
  processed: number;
  maxPages: number;
  errors: number;
  queued: number;
}) {
  logger.info(
    {
      progress: `${stats.processed}/${stats.maxPages}`,
      errors: stats.errors,
      queued: stats.queued,
    },
    'Crawl progress'
  );
}
