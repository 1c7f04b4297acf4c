import pg, { type Pool, type PoolClient } from 'pg';
import { getErrorMessage } from '../core/errors.js';
import { createLogger } from '../core/logger.js';

const { Pool: PoolClass } = pg;

const logger = createLogger('METADATA-DB');

/**
 * Pool for the service's own metadata store (query attempts and result manifests).
 */
export function createMetadataPool(connectionString: string, ssl: boolean): Pool {
  return new PoolClass({
    connectionString,
    ssl: ssl ? { rejectUnauthorized: false } : undefined, // managed Postgres hosts use self-signed chains
    max: 10,
    idleTimeoutMillis: 30000
  });
}

export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(): void;
}

/**
 * Runs `work` inside BEGIN/COMMIT. A failed ROLLBACK is logged and the
 * error from `work` is rethrown.
 */
export async function withTransaction<T, C extends TransactionClient = PoolClient>(
  pool: { connect(): Promise<C> },
  work: (client: C) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.warn('withTransaction', 'ROLLBACK_FAILED', getErrorMessage(rollbackError));
    });
    throw error;
  } finally {
    client.release();
  }
}
