import type { Pool } from 'pg';
import { z } from 'zod';
import { withTransaction } from '../../config/database.js';
import { PipelineError } from '../../core/errors.js';
import type {
  AttemptRepository,
  ExecutionRecord,
  NewQueryAttempt,
  NewResultsManifest,
  QueryAttempt,
  QueryStatus,
  ResultsManifest
} from './types.js';

type AttemptRow = {
  id: string;
  user_id: string;
  natural_language_query: string;
  generated_sql: string | null;
  status: QueryStatus;
  created_at: Date;
  generated_at: Date | null;
  executed_at: Date | null;
  generation_ms: number | null;
  execution_ms: number | null;
  error_message: string | null;
  original_attempt_id: string | null;
};

type ManifestRow = {
  attempt_id: string;
  columns: unknown;
  rows: unknown;
  total_rows: number;
  page_size: number;
  page_count: number;
  created_at: Date;
};

const ATTEMPT_COLUMNS = `id, user_id, natural_language_query, generated_sql, status, created_at, generated_at,
  executed_at, generation_ms, execution_ms, error_message, original_attempt_id`;

const columnsSchema = z.array(z.string());
const rowsSchema = z.array(z.array(z.unknown()));

function toAttempt(row: AttemptRow): QueryAttempt {
  return {
    id: row.id,
    userId: row.user_id,
    naturalLanguageQuery: row.natural_language_query,
    generatedSql: row.generated_sql,
    status: row.status,
    createdAt: row.created_at,
    generatedAt: row.generated_at,
    executedAt: row.executed_at,
    generationMs: row.generation_ms,
    executionMs: row.execution_ms,
    errorMessage: row.error_message,
    originalAttemptId: row.original_attempt_id
  };
}

function toManifest(row: ManifestRow): ResultsManifest {
  const columns = columnsSchema.safeParse(row.columns);
  const rows = rowsSchema.safeParse(row.rows);
  if (!columns.success || !rows.success) {
    throw new PipelineError('Stored results are corrupted', 'INTERNAL', `attempt ${row.attempt_id}`);
  }
  return {
    attemptId: row.attempt_id,
    columns: columns.data,
    rows: rows.data,
    totalRows: row.total_rows,
    pageSize: row.page_size,
    pageCount: row.page_count,
    createdAt: row.created_at
  };
}

function requireRow<T>(row: T | undefined, id: string): T {
  if (!row) {
    throw new PipelineError('Query attempt not found', 'NOT_FOUND', id);
  }
  return row;
}

/**
 * Attempts and manifests in the PostgreSQL metadata store (see sql/metadata.sql).
 */
export class PgAttemptRepository implements AttemptRepository {
  constructor(private readonly pool: Pool) {}

  async create(attempt: NewQueryAttempt): Promise<QueryAttempt> {
    const generatedSql = attempt.status === 'not_executed' ? attempt.generatedSql : null;
    const generatedAt = attempt.status === 'not_executed' ? attempt.generatedAt : null;
    const errorMessage = attempt.status === 'failed_generation' ? attempt.errorMessage : null;

    const result = await this.pool.query<AttemptRow>(
      `INSERT INTO query_attempts
         (user_id, natural_language_query, generated_sql, status, created_at, generated_at, generation_ms,
          error_message, original_attempt_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${ATTEMPT_COLUMNS}`,
      [
        attempt.userId,
        attempt.naturalLanguageQuery,
        generatedSql,
        attempt.status,
        attempt.createdAt,
        generatedAt,
        attempt.generationMs,
        errorMessage,
        attempt.originalAttemptId
      ]
    );
    return toAttempt(requireRow(result.rows[0], 'new attempt'));
  }

  async findById(id: string): Promise<QueryAttempt | null> {
    const result = await this.pool.query<AttemptRow>(`SELECT ${ATTEMPT_COLUMNS} FROM query_attempts WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toAttempt(row) : null;
  }

  async recordExecutionSuccess(
    id: string,
    manifest: NewResultsManifest,
    execution: ExecutionRecord
  ): Promise<{ attempt: QueryAttempt; manifest: ResultsManifest }> {
    return withTransaction(this.pool, async (client) => {
      const updated = await client.query<AttemptRow>(
        `UPDATE query_attempts
            SET status = 'success', executed_at = $2, execution_ms = $3, error_message = NULL
          WHERE id = $1 AND status <> 'success'
          RETURNING ${ATTEMPT_COLUMNS}`,
        [id, execution.executedAt, execution.executionMs]
      );
      const attemptRow = updated.rows[0];
      if (!attemptRow) {
        throw new PipelineError('Query attempt was already executed', 'ATTEMPT_STATE', id);
      }

      const inserted = await client.query<ManifestRow>(
        `INSERT INTO query_results_manifest (attempt_id, columns, rows, total_rows, page_size, page_count)
         VALUES ($1, $2::jsonb, $3::jsonb, $4, $5, $6)
         RETURNING attempt_id, columns, rows, total_rows, page_size, page_count, created_at`,
        [
          id,
          JSON.stringify(manifest.columns),
          JSON.stringify(manifest.rows),
          manifest.totalRows,
          manifest.pageSize,
          manifest.pageCount
        ]
      );

      return {
        attempt: toAttempt(attemptRow),
        manifest: toManifest(requireRow(inserted.rows[0], id))
      };
    });
  }

  async recordExecutionFailure(
    id: string,
    status: 'failed_execution' | 'timeout',
    errorMessage: string,
    execution: ExecutionRecord
  ): Promise<QueryAttempt> {
    const result = await this.pool.query<AttemptRow>(
      `UPDATE query_attempts
          SET status = $2, error_message = $3, executed_at = $4, execution_ms = $5
        WHERE id = $1
        RETURNING ${ATTEMPT_COLUMNS}`,
      [id, status, errorMessage, execution.executedAt, execution.executionMs]
    );
    return toAttempt(requireRow(result.rows[0], id));
  }

  async findManifest(attemptId: string): Promise<ResultsManifest | null> {
    const result = await this.pool.query<ManifestRow>(
      `SELECT attempt_id, columns, rows, total_rows, page_size, page_count, created_at
         FROM query_results_manifest
        WHERE attempt_id = $1`,
      [attemptId]
    );
    const row = result.rows[0];
    return row ? toManifest(row) : null;
  }
}
