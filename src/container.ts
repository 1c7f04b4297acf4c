import type { Env } from './config/env.js';
import { createMetadataPool } from './config/database.js';
import { OpenAICompatibleClient } from './core/llm-client.js';
import { createTargetDatabase, type TargetDatabase } from './core/pool-manager.js';
import type { AppServices } from './app.js';
import { PgAttemptRepository } from './modules/attempts/attempt.repository.js';
import { ExampleStore, FileSystemExampleSource } from './modules/examples/example-store.js';
import { ExecutionGuard } from './modules/execution/execution-guard.js';
import { GenerationService } from './modules/generation/generation.service.js';
import { PromptBuilder } from './modules/generation/prompt-builder.js';
import { SqlSynthesizer } from './modules/generation/sql-synthesizer.js';
import { TableSelector } from './modules/generation/table-selector.js';
import { JsonFileSchemaSource, SchemaCatalog } from './modules/schema/schema-catalog.js';

export interface Container extends AppServices {
  llm: OpenAICompatibleClient;
  targetDatabase: TargetDatabase;
  close(): Promise<void>;
}

/**
 * Wire every service from validated configuration. Nothing below this point
 * reads the environment.
 */
export function createContainer(env: Env): Container {
  const llm = new OpenAICompatibleClient({
    apiKey: env.LLM_API_KEY,
    baseUrl: env.LLM_BASE_URL,
    model: env.LLM_MODEL,
    embeddingModel: env.EMBEDDING_MODEL,
    maxTokens: env.LLM_MAX_TOKENS,
    temperature: env.LLM_TEMPERATURE,
    supportsTemperature: env.LLM_SUPPORTS_TEMPERATURE,
    requestTimeoutMs: env.LLM_REQUEST_TIMEOUT_MS
  });

  const metadataPool = createMetadataPool(env.METADATA_DB_URL, env.DB_SSL);
  const targetDatabase = createTargetDatabase(env.TARGET_DB_URL, { ssl: env.DB_SSL });
  const attempts = new PgAttemptRepository(metadataPool);

  const catalog = new SchemaCatalog(new JsonFileSchemaSource(env.SCHEMA_FILE));
  const examples = new ExampleStore(new FileSystemExampleSource(env.KB_DIRECTORY, env.KB_EMBEDDINGS_FILE), llm, {
    cacheTtlSeconds: env.EMBEDDING_CACHE_TTL,
    maxCacheSize: env.EMBEDDING_CACHE_SIZE
  });

  const promptBuilder = new PromptBuilder(targetDatabase.dialect);
  const tableSelector = new TableSelector(llm, promptBuilder, {
    maxTables: env.MAX_SELECTED_TABLES,
    initialDelayMs: env.LLM_RETRY_INITIAL_DELAY_MS
  });
  const synthesizer = new SqlSynthesizer(llm, promptBuilder, {
    maxTokens: env.LLM_MAX_TOKENS,
    temperature: env.LLM_TEMPERATURE,
    initialDelayMs: env.LLM_RETRY_INITIAL_DELAY_MS
  });

  const generation = new GenerationService(
    { catalog, examples, tableSelector, synthesizer, attempts },
    { similarityThreshold: env.RAG_SIMILARITY_THRESHOLD, topK: env.RAG_TOP_K }
  );
  const guard = new ExecutionGuard(targetDatabase, attempts, {
    timeoutSeconds: env.TARGET_DB_TIMEOUT_SECONDS,
    pageSize: env.RESULTS_PAGE_SIZE
  });

  return {
    llm,
    targetDatabase,
    catalog,
    examples,
    generation,
    guard,
    async close() {
      await Promise.all([targetDatabase.close(), metadataPool.end()]);
    }
  };
}
