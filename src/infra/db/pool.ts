import pg from 'pg';
import { errorMessage, type Logger } from '../logger.js';

const { Pool } = pg;

export type DbPool = pg.Pool;

export function createPool(connectionString: string, logger: Logger): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error('Unexpected database error', { error: errorMessage(err) });
  });

  return pool;
}
