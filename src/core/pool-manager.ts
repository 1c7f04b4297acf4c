import pg, { type Pool } from 'pg';
import mysql from 'mysql2/promise';
import type { FieldPacket, Pool as MysqlPool, RowDataPacket } from 'mysql2/promise';
import { PipelineError, getErrorMessage } from './errors.js';
import { createLogger } from './logger.js';

const { Pool: PoolClass } = pg;
const logger = createLogger('TARGET-DB');

export type TargetDialect = 'postgres' | 'mysql';

export interface QueryRows {
  columns: string[];
  rows: unknown[][];
}

/**
 * Read-only handle on the database user questions are answered against.
 */
export interface TargetDatabase {
  readonly dialect: TargetDialect;
  run(sql: string, timeoutMs: number): Promise<QueryRows>;
  close(): Promise<void>;
}

export interface TargetDatabaseOptions {
  ssl?: boolean;
  maxConnections?: number;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

// 57014 = query_canceled, raised when statement_timeout fires
export function classifyPostgresError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  if (errorCode(error) === '57014') {
    return new PipelineError('Query exceeded the execution time limit', 'EXECUTION_TIMEOUT', getErrorMessage(error));
  }
  return new PipelineError(getErrorMessage(error, 'Query execution failed'), 'EXECUTION_ERROR');
}

export function classifyMysqlError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const code = errorCode(error);
  if (code === 'PROTOCOL_SEQUENCE_TIMEOUT' || code === 'ER_QUERY_TIMEOUT') {
    return new PipelineError('Query exceeded the execution time limit', 'EXECUTION_TIMEOUT', getErrorMessage(error));
  }
  return new PipelineError(getErrorMessage(error, 'Query execution failed'), 'EXECUTION_ERROR');
}

export function detectDialect(connectionString: string): TargetDialect {
  const scheme = connectionString.trim().toLowerCase();
  if (scheme.startsWith('mysql://') || scheme.startsWith('mysql2://')) return 'mysql';
  if (scheme.startsWith('postgres://') || scheme.startsWith('postgresql://')) return 'postgres';
  throw new PipelineError('Unsupported target database URL scheme', 'CONFIGURATION', scheme.split(':')[0]);
}

class PostgresTargetDatabase implements TargetDatabase {
  readonly dialect = 'postgres' as const;
  private readonly pool: Pool;

  constructor(connectionString: string, options: TargetDatabaseOptions) {
    this.pool = new PoolClass({
      connectionString,
      ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
      max: options.maxConnections ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000
    });

    this.pool.on('error', (err) => {
      logger.error('pool', 'ERROR', err.message);
    });
  }

  async run(sql: string, timeoutMs: number): Promise<QueryRows> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN READ ONLY');
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`);
      const result = await client.query<unknown[]>({ text: sql, rowMode: 'array' });
      await client.query('ROLLBACK');
      return { columns: result.fields.map((field) => field.name), rows: result.rows };
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn('run', 'ROLLBACK_FAILED', getErrorMessage(rollbackError));
      });
      throw classifyPostgresError(error);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

class MysqlTargetDatabase implements TargetDatabase {
  readonly dialect = 'mysql' as const;
  private readonly pool: MysqlPool;

  constructor(connectionString: string, options: TargetDatabaseOptions) {
    this.pool = mysql.createPool({
      uri: connectionString,
      connectionLimit: options.maxConnections ?? 10,
      ssl: options.ssl ? { rejectUnauthorized: false } : undefined
    });
  }

  async run(sql: string, timeoutMs: number): Promise<QueryRows> {
    const connection = await this.pool.getConnection();
    try {
      await connection.query('START TRANSACTION READ ONLY');
      const [rows, fields] = await connection.query<RowDataPacket[][]>({
        sql,
        timeout: Math.max(1, Math.floor(timeoutMs)),
        rowsAsArray: true
      });
      await connection.query('ROLLBACK');
      return { columns: fieldNames(fields), rows: rows.map((row) => [...row]) };
    } catch (error) {
      await connection.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn('run', 'ROLLBACK_FAILED', getErrorMessage(rollbackError));
      });
      throw classifyMysqlError(error);
    } finally {
      connection.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function fieldNames(fields: FieldPacket[] | undefined): string[] {
  return (fields ?? []).map((field) => field.name);
}

export function createTargetDatabase(connectionString: string, options: TargetDatabaseOptions = {}): TargetDatabase {
  const dialect = detectDialect(connectionString);
  logger.info('connect', 'POOL_CREATED', `Dialect:${dialect}`);
  return dialect === 'mysql'
    ? new MysqlTargetDatabase(connectionString, options)
    : new PostgresTargetDatabase(connectionString, options);
}
