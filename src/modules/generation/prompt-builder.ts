import type { ChatMessage } from '../../core/llm-client.js';
import type { TargetDialect } from '../../core/pool-manager.js';
import type { ConversationMessage } from './types.js';

export const MAX_CONTEXT_MESSAGES = 10;
export const MAX_PROMPT_EXAMPLES = 3;

const FORBIDDEN_KEYWORDS = ['INSERT', 'UPDATE', 'DELETE', 'DROP', 'CREATE', 'ALTER', 'TRUNCATE', 'GRANT', 'REVOKE'];

const DIALECT_NAMES: Record<TargetDialect, string> = {
  postgres: 'PostgreSQL',
  mysql: 'MySQL'
};

export interface SqlPromptInput {
  question: string;
  schemaText: string;
  examples: readonly string[];
}

export interface ClarificationPromptInput {
  question: string;
  entityTypes: readonly string[];
  identifierColumns: readonly string[];
}

export class PromptBuilder {
  private readonly dialectName: string;

  constructor(dialect: TargetDialect = 'postgres') {
    this.dialectName = DIALECT_NAMES[dialect];
  }

  /**
   * Stage 1: pick the tables a question needs from the full table list.
   */
  buildTableSelectionPrompt(question: string, tableNames: readonly string[], maxTables: number): string {
    const tableList = tableNames.map((name) => `- ${name}`).join('\n');

    return `Given the database tables below, choose the ones needed to answer the question.

AVAILABLE TABLES:
${tableList}

QUESTION:
"${question}"

RULES:
1. Choose at most ${maxTables} tables.
2. Use the table names exactly as listed.
3. Include the tables needed for joins between the ones you pick.

Respond with a comma-separated list of table names only, for example: orders, customers`;
  }

  /**
   * Stage 2: write one read-only statement against the selected schema.
   */
  buildSqlGenerationPrompt(input: SqlPromptInput): string {
    const examples = input.examples.slice(0, MAX_PROMPT_EXAMPLES);
    const exampleSection = examples.length
      ? `\nEXAMPLE QUERIES FOR THIS DATABASE:\n${examples.map((sql, index) => `Example ${index + 1}:\n${sql}`).join('\n\n')}\n`
      : '';

    return `Write a ${this.dialectName} query that answers the question using only the schema below.

SCHEMA:
${input.schemaText}
${exampleSection}
QUESTION:
${input.question}

RULES:
1. Return a single SELECT statement (a WITH ... SELECT is allowed).
2. Never use ${FORBIDDEN_KEYWORDS.join(', ')} or any other statement that changes data or schema.
3. Refer to tables by their full names; do not use table aliases.
4. Use only tables and columns that appear in the schema.
5. If the question is ambiguous (for example an unclear person, vehicle or time range), do not guess: reply with exactly one short clarifying question instead of SQL.

Respond with the SQL only, ending with a semicolon, or with the clarifying question only.`;
  }

  /**
   * Asks for a single disambiguation question when the SQL stage produced nothing usable.
   */
  buildClarificationPrompt(input: ClarificationPromptInput): string {
    const entities = input.entityTypes.length ? input.entityTypes.join(', ') : 'records';
    const identifiers = input.identifierColumns.length ? input.identifierColumns.join(', ') : 'none found';

    return `A user asked a database question that could not be turned into SQL because it is ambiguous.

QUESTION:
"${input.question}"

ENTITY TYPES IN SCOPE: ${entities}
IDENTIFYING COLUMNS: ${identifiers}

Ask the user ONE short, friendly question that would let you identify exactly what they mean.
Mention which identifying detail would help. Reply with the question only.`;
  }

  /**
   * System prompt, then the most recent history, then the new prompt.
   */
  buildMessages(prompt: string, history: readonly ConversationMessage[] = []): ChatMessage[] {
    const recent = history.slice(-MAX_CONTEXT_MESSAGES).map((message) => ({ role: message.role, content: message.content }));
    const system =
      `You are a ${this.dialectName} expert who translates analytics questions into safe, read-only SQL. ` +
      'Follow the instructions in each request exactly.';
    return [{ role: 'system', content: system }, ...recent, { role: 'user', content: prompt }];
  }
}
