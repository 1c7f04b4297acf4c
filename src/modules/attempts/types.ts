export type QueryStatus = 'not_executed' | 'failed_generation' | 'failed_execution' | 'success' | 'timeout';

export interface QueryAttempt {
  id: string;
  userId: string;
  naturalLanguageQuery: string;
  generatedSql: string | null;
  status: QueryStatus;
  createdAt: Date;
  generatedAt: Date | null;
  executedAt: Date | null;
  generationMs: number | null;
  executionMs: number | null;
  errorMessage: string | null;
  originalAttemptId: string | null;
}

/**
 * A finished generation run, persisted in one write. `not_executed` always
 * carries SQL; `failed_generation` carries the reason instead.
 */
export type NewQueryAttempt = {
  userId: string;
  naturalLanguageQuery: string;
  createdAt: Date;
  generationMs: number;
  originalAttemptId: string | null;
} & (
  | { status: 'not_executed'; generatedSql: string; generatedAt: Date }
  | { status: 'failed_generation'; errorMessage: string }
);

export interface ResultsManifest {
  attemptId: string;
  columns: string[];
  rows: unknown[][];
  totalRows: number;
  pageSize: number;
  pageCount: number;
  createdAt: Date;
}

export type NewResultsManifest = Omit<ResultsManifest, 'attemptId' | 'createdAt'>;

export interface ExecutionRecord {
  executedAt: Date;
  executionMs: number;
}

export interface AttemptRepository {
  create(attempt: NewQueryAttempt): Promise<QueryAttempt>;
  findById(id: string): Promise<QueryAttempt | null>;
  /** Marks the attempt `success` and stores its manifest atomically. */
  recordExecutionSuccess(
    id: string,
    manifest: NewResultsManifest,
    execution: ExecutionRecord
  ): Promise<{ attempt: QueryAttempt; manifest: ResultsManifest }>;
  recordExecutionFailure(
    id: string,
    status: 'failed_execution' | 'timeout',
    errorMessage: string,
    execution: ExecutionRecord
  ): Promise<QueryAttempt>;
  findManifest(attemptId: string): Promise<ResultsManifest | null>;
}
