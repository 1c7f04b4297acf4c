import { randomUUID } from 'node:crypto';
import type { ChatModel, ChatRequest, EmbeddingModel } from '../../src/core/llm-client.js';
import type { QueryRows, TargetDatabase } from '../../src/core/pool-manager.js';
import type {
  AttemptRepository,
  ExecutionRecord,
  NewQueryAttempt,
  NewResultsManifest,
  QueryAttempt,
  ResultsManifest
} from '../../src/modules/attempts/types.js';
import type { ExampleFile, ExampleSource } from '../../src/modules/examples/example-store.js';
import type { EmbeddingRecord } from '../../src/modules/examples/types.js';
import type { SchemaRow, SchemaSource } from '../../src/modules/schema/schema-catalog.js';

export const noSleep = async (): Promise<void> => {};

type ChatStep = string | Error | ((request: ChatRequest) => string);

/**
 * Replays scripted responses in order; the last step repeats once the script
 * runs out.
 */
export class ScriptedChatModel implements ChatModel {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly steps: ChatStep[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: ChatRequest): Promise<string> {
    this.requests.push(request);
    const step = this.steps[Math.min(this.requests.length - 1, this.steps.length - 1)];
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(request);
    return step;
  }
}

/** Routes each call by the prompt it receives. */
export class RoutingChatModel implements ChatModel {
  readonly prompts: string[] = [];

  constructor(private readonly route: (prompt: string) => string) {}

  async complete(request: ChatRequest): Promise<string> {
    const prompt = request.messages[request.messages.length - 1]?.content ?? '';
    this.prompts.push(prompt);
    return this.route(prompt);
  }
}

export class FixedEmbeddingModel implements EmbeddingModel {
  readonly inputs: string[] = [];

  constructor(private readonly vectorFor: (input: string) => number[]) {}

  async embed(input: string): Promise<number[]> {
    this.inputs.push(input);
    return this.vectorFor(input);
  }
}

export class StaticSchemaSource implements SchemaSource {
  reads = 0;

  constructor(private rows: SchemaRow[]) {}

  replace(rows: SchemaRow[]): void {
    this.rows = rows;
  }

  async read(): Promise<unknown> {
    this.reads += 1;
    return this.rows;
  }
}

export class InMemoryExampleSource implements ExampleSource {
  written: EmbeddingRecord[] | null = null;

  constructor(
    private readonly files: ExampleFile[],
    private readonly embeddings: EmbeddingRecord[] = []
  ) {}

  async readExamples(): Promise<ExampleFile[]> {
    return this.files;
  }

  async readEmbeddings(): Promise<EmbeddingRecord[]> {
    return this.written ?? this.embeddings;
  }

  async writeEmbeddings(records: EmbeddingRecord[]): Promise<void> {
    this.written = records;
  }
}

export class FakeTargetDatabase implements TargetDatabase {
  readonly dialect = 'postgres' as const;
  readonly statements: string[] = [];

  constructor(private readonly handler: (sql: string) => QueryRows | Error) {}

  async run(sql: string, _timeoutMs: number): Promise<QueryRows> {
    this.statements.push(sql);
    const result = this.handler(sql);
    if (result instanceof Error) throw result;
    return result;
  }

  async close(): Promise<void> {}
}

export class InMemoryAttemptRepository implements AttemptRepository {
  readonly attempts = new Map<string, QueryAttempt>();
  readonly manifests = new Map<string, ResultsManifest>();

  async create(attempt: NewQueryAttempt): Promise<QueryAttempt> {
    const stored: QueryAttempt = {
      id: randomUUID(),
      userId: attempt.userId,
      naturalLanguageQuery: attempt.naturalLanguageQuery,
      generatedSql: attempt.status === 'not_executed' ? attempt.generatedSql : null,
      status: attempt.status,
      createdAt: attempt.createdAt,
      generatedAt: attempt.status === 'not_executed' ? attempt.generatedAt : null,
      executedAt: null,
      generationMs: attempt.generationMs,
      executionMs: null,
      errorMessage: attempt.status === 'failed_generation' ? attempt.errorMessage : null,
      originalAttemptId: attempt.originalAttemptId
    };
    this.attempts.set(stored.id, stored);
    return stored;
  }

  async findById(id: string): Promise<QueryAttempt | null> {
    return this.attempts.get(id) ?? null;
  }

  async recordExecutionSuccess(
    id: string,
    manifest: NewResultsManifest,
    execution: ExecutionRecord
  ): Promise<{ attempt: QueryAttempt; manifest: ResultsManifest }> {
    const current = this.require(id);
    const attempt: QueryAttempt = {
      ...current,
      status: 'success',
      executedAt: execution.executedAt,
      executionMs: execution.executionMs,
      errorMessage: null
    };
    const stored: ResultsManifest = { ...manifest, attemptId: id, createdAt: execution.executedAt };
    this.attempts.set(id, attempt);
    this.manifests.set(id, stored);
    return { attempt, manifest: stored };
  }

  async recordExecutionFailure(
    id: string,
    status: 'failed_execution' | 'timeout',
    errorMessage: string,
    execution: ExecutionRecord
  ): Promise<QueryAttempt> {
    const attempt: QueryAttempt = {
      ...this.require(id),
      status,
      errorMessage,
      executedAt: execution.executedAt,
      executionMs: execution.executionMs
    };
    this.attempts.set(id, attempt);
    return attempt;
  }

  async findManifest(attemptId: string): Promise<ResultsManifest | null> {
    return this.manifests.get(attemptId) ?? null;
  }

  private require(id: string): QueryAttempt {
    const attempt = this.attempts.get(id);
    if (!attempt) throw new Error(`No attempt ${id}`);
    return attempt;
  }
}

export function usersSchemaRows(): SchemaRow[] {
  return [
    { table_name: 'users', column_name: 'id', data_type: 'integer', is_nullable: 'NO', is_primary_key: 'YES' },
    { table_name: 'users', column_name: 'username', data_type: 'varchar', is_nullable: 'NO', is_primary_key: 'NO' },
    { table_name: 'users', column_name: 'active', data_type: 'boolean', is_nullable: 'NO', is_primary_key: 'NO' },
    { table_name: 'orders', column_name: 'id', data_type: 'integer', is_nullable: 'NO', is_primary_key: 'YES' },
    {
      table_name: 'orders',
      column_name: 'user_id',
      data_type: 'integer',
      is_nullable: 'NO',
      is_primary_key: 'NO',
      target_table: 'users',
      target_column: 'id'
    }
  ];
}

export function makeAttempt(overrides: Partial<QueryAttempt> = {}): QueryAttempt {
  return {
    id: randomUUID(),
    userId: 'user-1',
    naturalLanguageQuery: 'Show me all active users',
    generatedSql: 'SELECT users.id FROM users WHERE users.active = true;',
    status: 'not_executed',
    createdAt: new Date('2024-01-01T00:00:00Z'),
    generatedAt: new Date('2024-01-01T00:00:01Z'),
    executedAt: null,
    generationMs: 1000,
    executionMs: null,
    errorMessage: null,
    originalAttemptId: null,
    ...overrides
  };
}
