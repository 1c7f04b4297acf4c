import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  CORS_ORIGINS: z.string().default('http://localhost:5173'),

  METADATA_DB_URL: z.string().url('METADATA_DB_URL must be a valid connection string'),
  TARGET_DB_URL: z.string().url('TARGET_DB_URL must be a valid connection string'),
  TARGET_DB_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  DB_SSL: booleanFlag.default('false'),

  LLM_API_KEY: z.string().min(1, 'LLM_API_KEY is required'),
  LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_SUPPORTS_TEMPERATURE: booleanFlag.default('true'),
  LLM_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_RETRY_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  RAG_TOP_K: z.coerce.number().int().positive().default(3),
  MAX_SELECTED_TABLES: z.coerce.number().int().positive().default(10),
  RESULTS_PAGE_SIZE: z.coerce.number().int().positive().default(500),

  SCHEMA_FILE: z.string().default('data/schema/schema.json'),
  KB_DIRECTORY: z.string().default('data/knowledge_base'),
  KB_EMBEDDINGS_FILE: z.string().default('data/knowledge_base/embeddings.json'),
  EMBEDDING_CACHE_TTL: z.coerce.number().int().positive().default(3600),
  EMBEDDING_CACHE_SIZE: z.coerce.number().int().positive().default(500),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(10)
});

export type Env = z.infer<typeof envSchema>;

// Parse and export
const _env = envSchema.safeParse(process.env);

if (!_env.success) {
  console.error('❌ Invalid Environment Variables:', _env.error.format());
  process.exit(1); // Stop the server if config is wrong
}

export const env: Env = _env.data;
