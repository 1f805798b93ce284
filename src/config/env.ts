/**
 * Environment configuration
 * Values come from the process environment (optionally a .env file)
 */

import * as dotenv from 'dotenv';
import { USER_AGENT } from './constants';

dotenv.config();

export interface DatabaseEnv {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface Env {
  logLevel: string;
  logPretty: boolean;
  userAgent: string;
  db: DatabaseEnv;
}

function parsePort(value: string | undefined, fallback: number): number {
  const port = parseInt(value || '', 10);
  return Number.isInteger(port) && port > 0 ? port : fallback;
}

/**
 * Read configuration from an environment map
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    logLevel: source.LOG_LEVEL || 'info',
    logPretty: source.LOG_PRETTY === 'true',
    userAgent: source.CRAWLER_USER_AGENT || USER_AGENT,
    db: {
      host: source.MYSQL_HOST || 'localhost',
      port: parsePort(source.MYSQL_PORT, 3306),
      user: source.MYSQL_USER || 'crawler',
      password: source.MYSQL_PASSWORD || '',
      database: source.MYSQL_DATABASE || 'crawler_db',
    },
  };
}

export const env = loadEnv();
