import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { logger } from '../logger.js';

const { Pool } = pg;

export function createPool(connectionString: string | undefined): PgPool {
  // Connection errors surface on first use, not here
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
