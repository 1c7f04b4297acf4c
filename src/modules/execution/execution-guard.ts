import { PipelineError, getErrorMessage } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type { TargetDatabase } from '../../core/pool-manager.js';
import { isKeyword, isSignificant, splitStatements, type SqlToken } from '../../core/sql-tokenizer.js';
import type { AttemptRepository, QueryAttempt, ResultsManifest } from '../attempts/types.js';
import { DEFAULT_PAGE_SIZE, computePageCount } from './pagination.js';

const logger = createLogger('EXECUTION-GUARD');

const BLOCKED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'EXEC',
  'EXECUTE'
];
const STATEMENT_KEYWORDS = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'VALUES', 'TABLE'];

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  statementType: string | null;
}

export interface ExecutionResult {
  columns: string[];
  rows: unknown[][];
  totalRows: number;
  executionMs: number;
}

export type ExecutionOutcome =
  | { kind: 'success'; attempt: QueryAttempt; manifest: ResultsManifest }
  | {
      kind: 'failure';
      attempt: QueryAttempt;
      code: 'SQL_REJECTED' | 'EXECUTION_TIMEOUT' | 'EXECUTION_ERROR';
      message: string;
    }
  | { kind: 'rejected'; code: 'ATTEMPT_STATE'; message: string };

export interface ExecutionGuardOptions {
  timeoutSeconds?: number;
  pageSize?: number;
}

/**
 * Kind of statement: the first keyword, or for `WITH` the first keyword after
 * the CTE list (tokens inside parentheses belong to the CTE bodies).
 */
function statementType(tokens: SqlToken[]): string | null {
  let index = 0;
  while (tokens[index]?.kind === 'punctuation' && tokens[index].text === '(') index++;

  const first = tokens[index];
  if (!first || first.kind !== 'word') return null;
  if (!isKeyword(first, 'WITH')) return first.text.toUpperCase();

  let depth = 0;
  for (const token of tokens.slice(index + 1)) {
    if (token.kind === 'punctuation' && token.text === '(') depth++;
    else if (token.kind === 'punctuation' && token.text === ')') depth--;
    else if (depth === 0 && isKeyword(token, ...STATEMENT_KEYWORDS)) return token.text.toUpperCase();
  }
  return 'WITH';
}

function hasTopLevelSelectInto(tokens: SqlToken[]): boolean {
  let depth = 0;
  for (const token of tokens) {
    if (token.kind === 'punctuation' && token.text === '(') depth++;
    else if (token.kind === 'punctuation' && token.text === ')') depth--;
    else if (depth === 0 && isKeyword(token, 'INTO')) return true;
  }
  return false;
}

/**
 * Last line of defence before user-approved SQL reaches the target database:
 * static validation, a read-only transaction and a hard timeout.
 */
export class ExecutionGuard {
  private readonly timeoutSeconds: number;
  private readonly pageSize: number;
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly database: TargetDatabase,
    private readonly attempts: AttemptRepository,
    options: ExecutionGuardOptions = {}
  ) {
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  validate(sql: string): ValidationResult {
    const errors: string[] = [];
    const statements = splitStatements(sql);

    if (!statements.length) {
      return { isValid: false, errors: ['Query cannot be empty'], statementType: null };
    }
    if (statements.length > 1) {
      errors.push(`Only one statement is allowed, found ${statements.length}`);
    }

    const tokens = statements[0].tokens.filter(isSignificant);
    const type = statementType(tokens);
    if (type !== 'SELECT') {
      errors.push(`Only SELECT statements are allowed, got ${type ?? 'UNKNOWN'}`);
    }

    for (const token of tokens) {
      if (isKeyword(token, 'SELECT')) break;
      if (isKeyword(token, ...BLOCKED_KEYWORDS)) {
        errors.push(`Forbidden keyword before SELECT: ${token.text.toUpperCase()}`);
        break;
      }
    }

    if (type === 'SELECT' && hasTopLevelSelectInto(tokens)) {
      errors.push('SELECT ... INTO is not allowed');
    }

    return { isValid: errors.length === 0, errors, statementType: type };
  }

  /**
   * Validate and run one statement. Rejects with `SQL_REJECTED`,
   * `EXECUTION_TIMEOUT` or `EXECUTION_ERROR`.
   */
  async execute(sql: string, timeoutSeconds = this.timeoutSeconds): Promise<ExecutionResult> {
    const validation = this.validate(sql);
    if (!validation.isValid) {
      throw new PipelineError(`Query rejected: ${validation.errors.join('; ')}`, 'SQL_REJECTED');
    }

    const startedAt = Date.now();
    const { columns, rows } = await this.database.run(sql, timeoutSeconds * 1000);
    return { columns, rows, totalRows: rows.length, executionMs: Date.now() - startedAt };
  }

  /**
   * Run an attempt's SQL once and record the outcome on the attempt.
   */
  async executeAttempt(attempt: QueryAttempt): Promise<ExecutionOutcome> {
    if (attempt.status === 'success') {
      return { kind: 'rejected', code: 'ATTEMPT_STATE', message: 'This query has already been executed successfully' };
    }
    const sql = attempt.generatedSql;
    if (!sql) {
      return { kind: 'rejected', code: 'ATTEMPT_STATE', message: 'This query has no SQL to execute' };
    }
    if (this.inFlight.has(attempt.id)) {
      return { kind: 'rejected', code: 'ATTEMPT_STATE', message: 'This query is already running' };
    }

    this.inFlight.add(attempt.id);
    const startedAt = Date.now();
    try {
      const result = await this.execute(sql);
      const recorded = await this.attempts.recordExecutionSuccess(
        attempt.id,
        {
          columns: result.columns,
          rows: result.rows,
          totalRows: result.totalRows,
          pageSize: this.pageSize,
          pageCount: computePageCount(result.totalRows, this.pageSize)
        },
        { executedAt: new Date(), executionMs: result.executionMs }
      );
      logger.info('executeAttempt', 'SUCCESS', `Attempt:${attempt.id} Rows:${result.totalRows}`, result.executionMs);
      return { kind: 'success', attempt: recorded.attempt, manifest: recorded.manifest };
    } catch (error) {
      return await this.recordFailure(attempt, error, Date.now() - startedAt);
    } finally {
      this.inFlight.delete(attempt.id);
    }
  }

  async findResults(attemptId: string): Promise<ResultsManifest | null> {
    return this.attempts.findManifest(attemptId);
  }

  private async recordFailure(attempt: QueryAttempt, error: unknown, executionMs: number): Promise<ExecutionOutcome> {
    const pipelineError =
      error instanceof PipelineError ? error : new PipelineError(getErrorMessage(error), 'EXECUTION_ERROR');

    if (pipelineError.code === 'ATTEMPT_STATE') {
      return { kind: 'rejected', code: 'ATTEMPT_STATE', message: pipelineError.message };
    }

    const code =
      pipelineError.code === 'EXECUTION_TIMEOUT' || pipelineError.code === 'SQL_REJECTED'
        ? pipelineError.code
        : 'EXECUTION_ERROR';
    const status = code === 'EXECUTION_TIMEOUT' ? 'timeout' : 'failed_execution';
    logger.warn('executeAttempt', status.toUpperCase(), `Attempt:${attempt.id} ${pipelineError.message}`, executionMs);

    try {
      const updated = await this.attempts.recordExecutionFailure(attempt.id, status, pipelineError.message, {
        executedAt: new Date(),
        executionMs
      });
      return { kind: 'failure', attempt: updated, code, message: pipelineError.message };
    } catch (recordError) {
      logger.error('executeAttempt', 'RECORD_FAILED', `Attempt:${attempt.id} ${getErrorMessage(recordError)}`);
      return {
        kind: 'failure',
        attempt: { ...attempt, status, errorMessage: pipelineError.message },
        code,
        message: pipelineError.message
      };
    }
  }
}
