import { env } from '../config/env.js';
import { getErrorMessage } from '../core/errors.js';
import { OpenAICompatibleClient } from '../core/llm-client.js';
import { createLogger, setLogLevel } from '../core/logger.js';
import { ExampleStore, FileSystemExampleSource } from '../modules/examples/example-store.js';

setLogLevel(env.LOG_LEVEL);
const logger = createLogger('EMBEDDINGS-SCRIPT');

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

const store = new ExampleStore(new FileSystemExampleSource(env.KB_DIRECTORY, env.KB_EMBEDDINGS_FILE), llm);

store
  .generateEmbeddings()
  .then((stats) => {
    logger.info(
      'generate',
      'DONE',
      `Total:${stats.totalExamples} Generated:${stats.embeddingsGenerated} Skipped:${stats.embeddingsSkipped} Failed:${stats.embeddingsFailed} Available:${stats.embeddingsAvailable}`
    );
    process.exit(stats.embeddingsFailed > 0 ? 1 : 0);
  })
  .catch((error: unknown) => {
    logger.error('generate', 'ERROR', getErrorMessage(error));
    process.exit(1);
  });
