import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@gatehouse/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ max: config.max ?? 10 }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. The original error is
 * rethrown even when the rollback itself fails.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.error(
        { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
        'Transaction rollback failed',
      );
    });
    throw err;
  } finally {
    client.release();
  }
}
