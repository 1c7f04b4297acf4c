import { getErrorMessage } from '../../core/errors.js';
import { LlmError, isTransientLlmError, type ChatModel } from '../../core/llm-client.js';
import { createLogger } from '../../core/logger.js';
import { withRetry } from '../../core/retry.js';
import type { Schema } from '../schema/types.js';
import { PromptBuilder } from './prompt-builder.js';
import { extractSql, findDangerousKeyword, looksLikeQuestion } from './response-parser.js';
import { REPHRASE_EXAMPLES } from './table-selector.js';
import type { ConversationMessage, SynthesisOutcome } from './types.js';

const logger = createLogger('SQL-SYNTHESIZER');

const CLARIFICATION_MAX_TOKENS = 200;
const IDENTIFIER_COLUMN = /(^|_)(name|title|code|email|username|plate|number|label|slug|reference|external_id)($|_)/i;

export interface SynthesisInput {
  question: string;
  schemaText: string;
  examples: readonly string[];
  /** The filtered schema, used to phrase clarifying questions. */
  schema: Schema;
  history?: readonly ConversationMessage[];
}

export interface SqlSynthesizerOptions {
  maxTokens?: number;
  temperature?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** `asset_driver` → `driver`, `users` → `users`. */
export function entityTypeOf(tableName: string): string {
  const parts = tableName.split('_').filter(Boolean);
  return (parts[parts.length - 1] ?? tableName).toLowerCase();
}

export function describeEntities(schema: Schema): { entityTypes: string[]; identifierColumns: string[] } {
  const entityTypes = new Set<string>();
  const identifierColumns = new Set<string>();

  for (const table of schema.values()) {
    entityTypes.add(entityTypeOf(table.name));
    for (const column of table.columns) {
      if (IDENTIFIER_COLUMN.test(column.name)) identifierColumns.add(`${table.name}.${column.name}`);
    }
  }

  return { entityTypes: [...entityTypes], identifierColumns: [...identifierColumns] };
}

export function fallbackClarification(entityTypes: readonly string[], identifierColumns: readonly string[]): string {
  const subject = entityTypes.length ? entityTypes.slice(0, 3).join(' or ') : 'records';
  const hint = identifierColumns.length
    ? ` For example, you could give a value for ${identifierColumns.slice(0, 3).join(', ')}.`
    : '';
  return `Could you clarify which ${subject} you are asking about?${hint}`;
}

/**
 * Stage 2 of generation: turn the question plus a trimmed schema into one
 * read-only statement, or into a clarifying question when the model cannot.
 */
export class SqlSynthesizer {
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly model: ChatModel,
    private readonly promptBuilder: PromptBuilder = new PromptBuilder(),
    options: SqlSynthesizerOptions = {}
  ) {
    this.maxTokens = options.maxTokens ?? 1000;
    this.temperature = options.temperature ?? 0;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.sleep = options.sleep;
  }

  async synthesize(input: SynthesisInput): Promise<SynthesisOutcome> {
    const startedAt = Date.now();
    const prompt = this.promptBuilder.buildSqlGenerationPrompt({
      question: input.question,
      schemaText: input.schemaText,
      examples: input.examples
    });
    const messages = this.promptBuilder.buildMessages(prompt, input.history);

    let response: string;
    try {
      response = await withRetry(
        () => this.model.complete({ messages, maxTokens: this.maxTokens, temperature: this.temperature }),
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.initialDelayMs,
          sleep: this.sleep,
          shouldRetry: isTransientLlmError,
          onRetry: (error, attempt, delayMs) =>
            logger.warn('synthesize', 'RETRY', `Attempt:${attempt} Delay:${delayMs}ms ${getErrorMessage(error)}`)
        }
      );
    } catch (error) {
      if (!(error instanceof LlmError)) throw error;
      logger.error('synthesize', 'LLM_UNAVAILABLE', error.message, Date.now() - startedAt);
      return {
        kind: 'failure',
        code: 'LLM_UNAVAILABLE',
        message: 'The language model is unavailable right now. Please try again shortly.'
      };
    }

    if (!response.trim()) {
      logger.warn('synthesize', 'EMPTY_RESPONSE', '', Date.now() - startedAt);
      return { kind: 'clarification', question: await this.clarify(input) };
    }

    const sql = extractSql(response);
    if (!sql) {
      if (looksLikeQuestion(response)) {
        logger.info('synthesize', 'CLARIFICATION', '', Date.now() - startedAt);
        return { kind: 'clarification', question: response.trim() };
      }
      logger.warn('synthesize', 'NO_SQL', response.slice(0, 200), Date.now() - startedAt);
      return { kind: 'clarification', question: await this.clarify(input) };
    }

    const dangerous = findDangerousKeyword(sql);
    if (dangerous) {
      logger.warn('synthesize', 'REJECTED', `Keyword:${dangerous}`, Date.now() - startedAt);
      return {
        kind: 'failure',
        code: 'GENERATION_INVALID',
        message: `The generated query tried to use ${dangerous}, which is not allowed. Only read-only questions are supported, for example: ${REPHRASE_EXAMPLES.map((example) => `"${example}"`).join(', ')}.`
      };
    }

    logger.info('synthesize', 'SUCCESS', `Chars:${sql.length}`, Date.now() - startedAt);
    return { kind: 'sql', sql };
  }

  /**
   * One disambiguation question for the user. Falls back to a canned question
   * when the model fails or answers with nothing.
   */
  async clarify(input: Pick<SynthesisInput, 'question' | 'schema' | 'history'>): Promise<string> {
    const { entityTypes, identifierColumns } = describeEntities(input.schema);
    const fallback = fallbackClarification(entityTypes, identifierColumns);

    try {
      const prompt = this.promptBuilder.buildClarificationPrompt({
        question: input.question,
        entityTypes,
        identifierColumns
      });
      const response = await this.model.complete({
        messages: this.promptBuilder.buildMessages(prompt, input.history),
        maxTokens: CLARIFICATION_MAX_TOKENS,
        temperature: this.temperature
      });
      const question = response.trim();
      return question || fallback;
    } catch (error) {
      logger.warn('clarify', 'FALLBACK', getErrorMessage(error));
      return fallback;
    }
  }
}
