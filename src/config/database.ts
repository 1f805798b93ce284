/**
 * MySQL database configuration and connection pool
 */

import fs from 'fs';
import path from 'path';
import mysql, { Pool } from 'mysql2/promise';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../core/errors';

let pool: Pool | null = null;

/**
 * MySQL connection pool, created on first use
 * Use pool.execute() or pool.query() for queries
 */
export function getPool(): Pool {
  if (!pool) {
    pool = mysql.createPool({
      ...env.db,
      waitForConnections: true,
      connectionLimit: 10,
      queueLimit: 0,
      enableKeepAlive: true,
      keepAliveInitialDelay: 0,
      multipleStatements: true,
    });
  }
  return pool;
}

/**
 * Test database connection
 * Call this on application startup to verify connectivity
 */
export async function testConnection(): Promise<void> {
  try {
    const connection = await getPool().getConnection();
    logger.info({ host: env.db.host, database: env.db.database }, 'Database connected');
    connection.release();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Database connection failed');
    throw error;
  }
}

/**
 * Create tables if they do not exist yet
 * Resolved from the project root so it works from both src/ and dist/
 */
export async function ensureSchema(): Promise<void> {
  const schemaPath = path.join(__dirname, '..', '..', 'src', 'db', 'schema.sql');
  const sql = await fs.promises.readFile(schemaPath, 'utf-8');
  await getPool().query(sql);
  logger.debug({ schemaPath }, 'Schema applied');
}

/**
 * Close all connections in the pool
 * Call this on application shutdown
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  logger.debug('Database connection pool closed');
}
