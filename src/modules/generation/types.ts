import type { PipelineErrorCode } from '../../core/errors.js';
import type { QueryAttempt } from '../attempts/types.js';

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export type SynthesisOutcome =
  | { kind: 'sql'; sql: string }
  | { kind: 'clarification'; question: string }
  | { kind: 'failure'; code: PipelineErrorCode; message: string };

export interface ExampleMatch {
  filename: string;
  title: string;
  similarity: number;
}

export type GenerationOutcome =
  | {
      kind: 'sql';
      attempt: QueryAttempt;
      sql: string;
      selectedTables: string[];
      source: 'example' | 'synthesis';
      matchedExample?: ExampleMatch;
    }
  | { kind: 'clarification'; attempt: QueryAttempt; question: string; selectedTables: string[] }
  | { kind: 'failure'; attempt: QueryAttempt; code: PipelineErrorCode; message: string };

export interface GenerationRequest {
  userId: string;
  question: string;
  conversationHistory?: ConversationMessage[];
  originalAttemptId?: string | null;
}
