import { Pool } from 'pg';

import { createLogger } from '@utils/logger.js';

const log = createLogger('pg');

export function createPool(connectionString: string, max = 10): Pool {
  const pool = new Pool({ connectionString, max });
  pool.on('error', (err) => {
    // idle client errors; the pool replaces the client
    log.error({ err }, '[pg] idle client error');
  });
  return pool;
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  log.info('[pg] pool closed');
}
