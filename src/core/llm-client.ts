import { z } from 'zod';
import { getErrorMessage } from './errors.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
}

export interface ChatModel {
  /** Resolves to the completion text, which may be empty. */
  complete(request: ChatRequest): Promise<string>;
}

export interface EmbeddingModel {
  embed(input: string): Promise<number[]>;
}

export type LlmErrorKind = 'rate_limit' | 'connection' | 'api' | 'invalid_response';

export class LlmError extends Error {
  constructor(
    message: string,
    readonly kind: LlmErrorKind,
    readonly status?: number
  ) {
    super(message);
    this.name = 'LlmError';
  }
}

/**
 * Rate limits, dropped connections and server-side failures are worth another
 * try. Client errors (bad key, bad request) and unreadable payloads are not.
 */
export function isTransientLlmError(error: unknown): boolean {
  if (!(error instanceof LlmError)) return false;
  switch (error.kind) {
    case 'rate_limit':
    case 'connection':
      return true;
    case 'api':
      return error.status !== undefined && error.status >= 500;
    case 'invalid_response':
      return false;
  }
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish()
        })
      })
    )
    .min(1)
});

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number())
      })
    )
    .min(1)
});

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  embeddingModel: string;
  maxTokens: number;
  temperature: number;
  /** Some reasoning models reject the temperature field outright. */
  supportsTemperature: boolean;
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Chat-completion and embedding client for any OpenAI-compatible HTTP API.
 */
export class OpenAICompatibleClient implements ChatModel, EmbeddingModel {
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;

  constructor(private readonly config: OpenAICompatibleConfig) {
    this.fetchImpl = config.fetchImpl ?? ((url, init) => fetch(url, init));
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async complete(request: ChatRequest): Promise<string> {
    const payload: Record<string, unknown> = {
      model: this.config.model,
      messages: request.messages,
      max_tokens: request.maxTokens ?? this.config.maxTokens
    };
    if (this.config.supportsTemperature) {
      payload.temperature = request.temperature ?? this.config.temperature;
    }

    const body = await this.post('/chat/completions', payload);
    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmError('Chat completion response had no choices', 'invalid_response');
    }
    return (parsed.data.choices[0].message.content ?? '').trim();
  }

  async embed(input: string): Promise<number[]> {
    const body = await this.post('/embeddings', { model: this.config.embeddingModel, input });
    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmError('Embedding response had no vector', 'invalid_response');
    }
    return parsed.data.data[0].embedding;
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs)
      });
    } catch (error) {
      throw new LlmError(`LLM request failed: ${getErrorMessage(error)}`, 'connection');
    }

    if (response.status === 429) {
      throw new LlmError('LLM rate limit exceeded', 'rate_limit', 429);
    }
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API ${response.status}: ${text.slice(0, 500)}`, 'api', response.status);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new LlmError(`LLM response was not JSON: ${getErrorMessage(error)}`, 'invalid_response');
    }
  }
}
