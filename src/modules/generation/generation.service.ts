import { PipelineError, getErrorMessage, type PipelineErrorCode } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type { AttemptRepository, NewQueryAttempt, QueryAttempt } from '../attempts/types.js';
import type { ExampleStore } from '../examples/example-store.js';
import type { SchemaCatalog } from '../schema/schema-catalog.js';
import { MAX_CONTEXT_MESSAGES } from './prompt-builder.js';
import type { SqlSynthesizer } from './sql-synthesizer.js';
import type { TableSelector } from './table-selector.js';
import type { ExampleMatch, GenerationOutcome, GenerationRequest } from './types.js';

const logger = createLogger('GENERATION');

export interface GenerationServiceDependencies {
  catalog: SchemaCatalog;
  examples: ExampleStore;
  tableSelector: TableSelector;
  synthesizer: SqlSynthesizer;
  attempts: AttemptRepository;
  now?: () => Date;
}

export interface GenerationServiceOptions {
  similarityThreshold?: number;
  topK?: number;
}

type PipelineResult =
  | { kind: 'sql'; sql: string; selectedTables: string[]; source: 'example' | 'synthesis'; matchedExample?: ExampleMatch }
  | { kind: 'clarification'; question: string; selectedTables: string[] }
  | { kind: 'failure'; code: PipelineErrorCode; message: string };

/**
 * Question in, persisted attempt out: table selection, schema trimming,
 * example retrieval, then either a verbatim example or fresh synthesis.
 */
export class GenerationService {
  private readonly catalog: SchemaCatalog;
  private readonly examples: ExampleStore;
  private readonly tableSelector: TableSelector;
  private readonly synthesizer: SqlSynthesizer;
  private readonly attempts: AttemptRepository;
  private readonly now: () => Date;
  private readonly similarityThreshold: number;
  private readonly topK: number;

  constructor(dependencies: GenerationServiceDependencies, options: GenerationServiceOptions = {}) {
    this.catalog = dependencies.catalog;
    this.examples = dependencies.examples;
    this.tableSelector = dependencies.tableSelector;
    this.synthesizer = dependencies.synthesizer;
    this.attempts = dependencies.attempts;
    this.now = dependencies.now ?? (() => new Date());
    this.similarityThreshold = options.similarityThreshold ?? 0.85;
    this.topK = options.topK ?? 3;
  }

  /**
   * Generation problems come back as `failure` or `clarification` outcomes and
   * are recorded on the attempt; only a storage failure rejects.
   */
  async generate(request: GenerationRequest): Promise<GenerationOutcome> {
    const createdAt = this.now();
    const startedAt = Date.now();

    let result: PipelineResult;
    try {
      result = await this.runPipeline(request);
    } catch (error) {
      result =
        error instanceof PipelineError
          ? { kind: 'failure', code: error.code, message: error.message }
          : { kind: 'failure', code: 'INTERNAL', message: 'An unexpected error occurred while generating SQL' };
      logger.error('generate', 'FAILED', `USER-${request.userId} ${getErrorMessage(error)}`, Date.now() - startedAt);
    }

    const generationMs = Date.now() - startedAt;
    const base = {
      userId: request.userId,
      naturalLanguageQuery: request.question,
      createdAt,
      generationMs,
      originalAttemptId: request.originalAttemptId ?? null
    };
    const record: NewQueryAttempt =
      result.kind === 'sql'
        ? { ...base, status: 'not_executed', generatedSql: result.sql, generatedAt: this.now() }
        : {
            ...base,
            status: 'failed_generation',
            errorMessage: result.kind === 'clarification' ? result.question : result.message
          };

    const attempt = await this.attempts.create(record);
    logger.info('generate', result.kind.toUpperCase(), `USER-${request.userId} Attempt:${attempt.id}`, generationMs);

    switch (result.kind) {
      case 'sql':
        return {
          kind: 'sql',
          attempt,
          sql: result.sql,
          selectedTables: result.selectedTables,
          source: result.source,
          matchedExample: result.matchedExample
        };
      case 'clarification':
        return { kind: 'clarification', attempt, question: result.question, selectedTables: result.selectedTables };
      case 'failure':
        return { kind: 'failure', attempt, code: result.code, message: result.message };
    }
  }

  /**
   * Regenerate from an earlier attempt's question; the new attempt points back
   * at its source.
   */
  async rerun(userId: string, sourceAttemptId: string): Promise<GenerationOutcome> {
    const source = await this.getOwnedAttempt(userId, sourceAttemptId);
    return this.generate({ userId, question: source.naturalLanguageQuery, originalAttemptId: source.id });
  }

  async getOwnedAttempt(userId: string, attemptId: string): Promise<QueryAttempt> {
    const attempt = await this.attempts.findById(attemptId);
    if (!attempt) {
      throw new PipelineError('Query attempt not found', 'NOT_FOUND', attemptId);
    }
    if (attempt.userId !== userId) {
      throw new PipelineError('You do not have access to this query attempt', 'FORBIDDEN', attemptId);
    }
    return attempt;
  }

  private async runPipeline(request: GenerationRequest): Promise<PipelineResult> {
    const history = (request.conversationHistory ?? []).slice(-MAX_CONTEXT_MESSAGES);

    const allTables = await this.catalog.tableNames();
    const selectedTables = await this.tableSelector.select(request.question, allTables, history);

    const schema = await this.catalog.filter(selectedTables);
    const schemaText = this.catalog.format(schema, { includeDescriptions: true, includeForeignKeys: true });

    const similar = await this.examples.similaritySearch(request.question, this.topK);
    const best = similar.examples[0];
    if (similar.ranked && best && similar.maxSimilarity >= this.similarityThreshold) {
      logger.info(
        'generate',
        'EXAMPLE_MATCH',
        `${best.example.filename} Similarity:${similar.maxSimilarity.toFixed(3)}`
      );
      return {
        kind: 'sql',
        sql: best.example.sql,
        selectedTables,
        source: 'example',
        matchedExample: { filename: best.example.filename, title: best.example.title, similarity: best.similarity }
      };
    }

    const outcome = await this.synthesizer.synthesize({
      question: request.question,
      schemaText,
      examples: similar.examples.map((scored) => scored.example.sql),
      schema,
      history
    });

    switch (outcome.kind) {
      case 'sql':
        return { kind: 'sql', sql: outcome.sql, selectedTables, source: 'synthesis' };
      case 'clarification':
        return { kind: 'clarification', question: outcome.question, selectedTables };
      case 'failure':
        return outcome;
    }
  }
}
