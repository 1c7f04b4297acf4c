import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import NodeCache from 'node-cache';
import { z } from 'zod';
import { PipelineError, getErrorMessage } from '../../core/errors.js';
import type { EmbeddingModel } from '../../core/llm-client.js';
import { createLogger } from '../../core/logger.js';
import { embeddingText, parseExampleFile } from './example-parser.js';
import { cosineSimilarity } from './similarity.js';
import type {
  EmbeddingGenerationStats,
  EmbeddingRecord,
  Example,
  ExampleStoreStats,
  ScoredExample,
  SimilarityResult
} from './types.js';

const logger = createLogger('EXAMPLE-STORE');

export interface ExampleFile {
  filename: string;
  content: string;
}

/**
 * Where example files and their embeddings live.
 */
export interface ExampleSource {
  readExamples(): Promise<ExampleFile[]>;
  readEmbeddings(): Promise<EmbeddingRecord[]>;
  writeEmbeddings(records: EmbeddingRecord[]): Promise<void>;
}

const embeddingFileSchema = z.array(
  z.object({
    filename: z.string().min(1),
    embedding: z.array(z.number())
  })
);

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class FileSystemExampleSource implements ExampleSource {
  constructor(
    private readonly directory: string,
    private readonly embeddingsFile: string
  ) {}

  async readExamples(): Promise<ExampleFile[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        logger.warn('readExamples', 'MISSING_DIRECTORY', this.directory);
        return [];
      }
      throw error;
    }

    const filenames = entries.filter((name) => name.toLowerCase().endsWith('.sql')).sort();
    return Promise.all(
      filenames.map(async (filename) => ({
        filename,
        content: await readFile(path.join(this.directory, filename), 'utf8')
      }))
    );
  }

  async readEmbeddings(): Promise<EmbeddingRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.embeddingsFile, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn('readEmbeddings', 'MALFORMED', getErrorMessage(error));
      return [];
    }

    const parsed = embeddingFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('readEmbeddings', 'MALFORMED', parsed.error.issues[0]?.message ?? 'invalid embeddings file');
      return [];
    }
    return parsed.data;
  }

  async writeEmbeddings(records: EmbeddingRecord[]): Promise<void> {
    await mkdir(path.dirname(this.embeddingsFile), { recursive: true });
    await writeFile(this.embeddingsFile, JSON.stringify(records, null, 2), 'utf8');
  }
}

export interface ExampleStoreOptions {
  cacheTtlSeconds?: number;
  maxCacheSize?: number;
}

interface ExampleSnapshot {
  examples: readonly Example[];
  byFilename: ReadonlyMap<string, Example>;
}

/**
 * Keep only vectors whose length matches the most common length, so cosine
 * similarity always compares like with like.
 */
function dominantDimension(records: EmbeddingRecord[]): number | null {
  const counts = new Map<number, number>();
  for (const record of records) {
    counts.set(record.embedding.length, (counts.get(record.embedding.length) ?? 0) + 1);
  }
  let best: number | null = null;
  let bestCount = 0;
  for (const [dimension, count] of counts) {
    if (count > bestCount) {
      best = dimension;
      bestCount = count;
    }
  }
  return best;
}

function buildSnapshot(examples: Example[]): ExampleSnapshot {
  return {
    examples,
    byFilename: new Map(examples.map((example) => [example.filename, example]))
  };
}

/**
 * Curated question/SQL pairs used for few-shot prompting and near-duplicate
 * short-circuiting. Similarity search is a linear scan over the loaded set.
 */
export class ExampleStore {
  private snapshot: ExampleSnapshot | null = null;
  private loading: Promise<ExampleSnapshot> | null = null;
  private readonly questionCache: NodeCache;
  private readonly maxCacheSize: number;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly source: ExampleSource,
    private readonly embedder?: EmbeddingModel,
    options: ExampleStoreOptions = {}
  ) {
    this.maxCacheSize = Math.max(1, options.maxCacheSize ?? 500);
    this.questionCache = new NodeCache({
      stdTTL: options.cacheTtlSeconds ?? 3600,
      checkperiod: 300,
      maxKeys: this.maxCacheSize,
      useClones: false
    });
  }

  async all(): Promise<Example[]> {
    const snapshot = await this.current();
    return [...snapshot.examples];
  }

  async getByFilename(filename: string): Promise<Example | undefined> {
    const snapshot = await this.current();
    return snapshot.byFilename.get(filename);
  }

  async findByKeyword(keyword: string): Promise<Example[]> {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];
    const snapshot = await this.current();
    return snapshot.examples.filter(
      (example) =>
        example.title.toLowerCase().includes(needle) ||
        (example.description?.toLowerCase().includes(needle) ?? false) ||
        example.sql.toLowerCase().includes(needle)
    );
  }

  /**
   * Top-K examples by cosine similarity to the question. While any example
   * still lacks an embedding, or the embedder fails, the first K examples are
   * returned unranked with score 0 and no embedding call is made.
   */
  async similaritySearch(question: string, topK = 3): Promise<SimilarityResult> {
    const snapshot = await this.current();
    const examples = snapshot.examples;
    const unranked = (): SimilarityResult => ({
      examples: examples.slice(0, topK).map((example) => ({ example, similarity: 0 })),
      maxSimilarity: 0,
      ranked: false
    });

    if (!examples.length || !this.embedder || examples.some((example) => !example.embedding)) {
      return unranked();
    }

    let questionVector: number[];
    try {
      questionVector = await this.embedQuestion(question, this.embedder);
    } catch (error) {
      logger.warn('similaritySearch', 'EMBEDDING_FAILED', getErrorMessage(error));
      return unranked();
    }

    const scored: ScoredExample[] = [];
    for (const example of examples) {
      if (!example.embedding || example.embedding.length !== questionVector.length) continue;
      scored.push({ example, similarity: cosineSimilarity(questionVector, example.embedding) });
    }
    if (!scored.length) {
      logger.warn('similaritySearch', 'DIMENSION_MISMATCH', `Question:${questionVector.length}`);
      return unranked();
    }

    scored.sort((a, b) => b.similarity - a.similarity);
    const top = scored.slice(0, topK);
    return { examples: top, maxSimilarity: top[0]?.similarity ?? 0, ranked: true };
  }

  /**
   * Embed every example that has no vector yet, persist the side file and swap
   * in the updated set.
   */
  async generateEmbeddings(): Promise<EmbeddingGenerationStats> {
    const embedder = this.embedder;
    if (!embedder) {
      throw new PipelineError('No embedding model configured', 'CONFIGURATION');
    }

    const startedAt = Date.now();
    const snapshot = await this.current();
    const updated: Example[] = [];
    let generated = 0;
    let skipped = 0;
    let failed = 0;

    for (const example of snapshot.examples) {
      if (example.embedding) {
        skipped++;
        updated.push(example);
        continue;
      }
      try {
        const embedding = await embedder.embed(embeddingText(example));
        updated.push({ ...example, embedding });
        generated++;
      } catch (error) {
        failed++;
        updated.push(example);
        logger.warn('generateEmbeddings', 'EXAMPLE_FAILED', `${example.filename}: ${getErrorMessage(error)}`);
      }
    }

    const records: EmbeddingRecord[] = [];
    for (const example of updated) {
      if (example.embedding) records.push({ filename: example.filename, embedding: example.embedding });
    }

    if (generated > 0) {
      await this.source.writeEmbeddings(records);
    }
    this.snapshot = buildSnapshot(updated);
    this.questionCache.flushAll();

    const stats: EmbeddingGenerationStats = {
      totalExamples: updated.length,
      embeddingsGenerated: generated,
      embeddingsSkipped: skipped,
      embeddingsFailed: failed,
      embeddingsAvailable: records.length
    };
    logger.info(
      'generateEmbeddings',
      'SUCCESS',
      `Generated:${generated} Skipped:${skipped} Failed:${failed}`,
      Date.now() - startedAt
    );
    return stats;
  }

  async refresh(): Promise<ExampleStoreStats> {
    this.snapshot = await this.load();
    this.questionCache.flushAll();
    return this.stats();
  }

  async stats(): Promise<ExampleStoreStats> {
    const snapshot = await this.current();
    const examples = snapshot.examples;
    const withEmbeddings = examples.filter((example) => example.embedding).length;
    const totalSqlLength = examples.reduce((sum, example) => sum + example.sql.length, 0);

    return {
      totalExamples: examples.length,
      examplesWithDescriptions: examples.filter((example) => example.description).length,
      embeddingsAvailable: withEmbeddings,
      embeddingsMissing: examples.length - withEmbeddings,
      averageSqlLength: examples.length ? Math.round(totalSqlLength / examples.length) : 0,
      questionCache: {
        cachedItems: this.questionCache.keys().length,
        hits: this.hits,
        misses: this.misses
      }
    };
  }

  private async embedQuestion(question: string, embedder: EmbeddingModel): Promise<number[]> {
    const key = question.trim();
    const cached = this.questionCache.get<number[]>(key);
    if (cached) {
      this.hits += 1;
      return cached;
    }
    this.misses += 1;
    const vector = await embedder.embed(key);
    this.remember(key, vector);
    return vector;
  }

  /** Evicts the oldest questions once the cache is full. */
  private remember(key: string, vector: number[]): void {
    try {
      const keys = this.questionCache.keys();
      if (keys.length >= this.maxCacheSize) {
        this.questionCache.del(keys.slice(0, keys.length - this.maxCacheSize + 1));
      }
      this.questionCache.set(key, vector);
    } catch (error) {
      logger.warn('similaritySearch', 'CACHE_SET_FAILED', getErrorMessage(error));
    }
  }

  private async current(): Promise<ExampleSnapshot> {
    if (this.snapshot) return this.snapshot;
    if (!this.loading) {
      this.loading = this.load()
        .then((snapshot) => {
          this.snapshot = snapshot;
          return snapshot;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  private async load(): Promise<ExampleSnapshot> {
    const startedAt = Date.now();
    const [files, records] = await Promise.all([this.source.readExamples(), this.source.readEmbeddings()]);

    const dimension = dominantDimension(records);
    const embeddings = new Map<string, number[]>();
    for (const record of records) {
      if (record.embedding.length !== dimension) {
        logger.warn('load', 'DIMENSION_MISMATCH', `${record.filename}: ${record.embedding.length} != ${dimension}`);
        continue;
      }
      embeddings.set(record.filename, record.embedding);
    }

    const examples: Example[] = [];
    for (const file of [...files].sort((a, b) => a.filename.localeCompare(b.filename))) {
      try {
        const parsed = parseExampleFile(file.filename, file.content);
        if (!parsed) {
          logger.warn('load', 'EMPTY_EXAMPLE', file.filename);
          continue;
        }
        examples.push({ ...parsed, embedding: embeddings.get(file.filename) });
      } catch (error) {
        logger.warn('load', 'PARSE_FAILED', `${file.filename}: ${getErrorMessage(error)}`);
      }
    }

    logger.info('load', 'SUCCESS', `Examples:${examples.length} Embeddings:${embeddings.size}`, Date.now() - startedAt);
    return buildSnapshot(examples);
  }
}
