import { PipelineError, getErrorMessage } from '../../core/errors.js';
import { LlmError, isTransientLlmError, type ChatModel } from '../../core/llm-client.js';
import { createLogger } from '../../core/logger.js';
import { withRetry } from '../../core/retry.js';
import { PromptBuilder } from './prompt-builder.js';
import { parseTableNames } from './response-parser.js';
import type { ConversationMessage } from './types.js';

const logger = createLogger('TABLE-SELECTOR');

const SELECTION_MAX_TOKENS = 500;

export const REPHRASE_EXAMPLES = [
  'Show me all active users',
  'How many orders were placed last month?',
  'List drivers whose certificates expired this year'
];

/** Raised for an attempt whose response named no usable table. */
class EmptySelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptySelectionError';
  }
}

export interface TableSelectorOptions {
  maxTables?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Stage 1 of generation: narrow the full table list to the few a question needs.
 */
export class TableSelector {
  private readonly maxTables: number;
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly model: ChatModel,
    private readonly promptBuilder: PromptBuilder = new PromptBuilder(),
    options: TableSelectorOptions = {}
  ) {
    this.maxTables = options.maxTables ?? 10;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.sleep = options.sleep;
  }

  /**
   * Resolves to 1..maxTables valid table names, or rejects with
   * `LLM_UNAVAILABLE` / `TABLE_SELECTION_FAILED`.
   */
  async select(
    question: string,
    tableNames: readonly string[],
    history: readonly ConversationMessage[] = []
  ): Promise<string[]> {
    if (!tableNames.length) {
      throw new PipelineError('The schema has no tables to choose from', 'CONFIGURATION');
    }

    const startedAt = Date.now();
    const messages = this.promptBuilder.buildMessages(
      this.promptBuilder.buildTableSelectionPrompt(question, tableNames, this.maxTables),
      history
    );

    try {
      const selected = await withRetry(
        async () => {
          const response = await this.model.complete({ messages, maxTokens: SELECTION_MAX_TOKENS, temperature: 0 });
          if (!response.trim()) {
            throw new EmptySelectionError('Model returned an empty table list');
          }
          const names = parseTableNames(response, tableNames);
          if (!names.length) {
            throw new EmptySelectionError(`No valid table names in response: ${response.slice(0, 200)}`);
          }
          return names;
        },
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.initialDelayMs,
          sleep: this.sleep,
          shouldRetry: (error) => error instanceof EmptySelectionError || isTransientLlmError(error),
          onRetry: (error, attempt, delayMs) =>
            logger.warn('select', 'RETRY', `Attempt:${attempt} Delay:${delayMs}ms ${getErrorMessage(error)}`)
        }
      );

      const limited = selected.slice(0, this.maxTables);
      logger.info('select', 'SUCCESS', `Tables:${limited.join(',')}`, Date.now() - startedAt);
      return limited;
    } catch (error) {
      logger.error('select', 'ERROR', getErrorMessage(error), Date.now() - startedAt);
      if (error instanceof LlmError) {
        throw new PipelineError(
          'The language model is unavailable right now. Please try again shortly.',
          'LLM_UNAVAILABLE',
          error.message
        );
      }
      if (error instanceof EmptySelectionError) {
        throw new PipelineError(
          `Could not work out which tables your question refers to. Try rephrasing it, for example: ${REPHRASE_EXAMPLES.map((example) => `"${example}"`).join(', ')}.`,
          'TABLE_SELECTION_FAILED',
          error.message
        );
      }
      throw error;
    }
  }
}
