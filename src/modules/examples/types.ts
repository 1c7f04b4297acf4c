export interface Example {
  filename: string;
  title: string;
  description?: string;
  sql: string;
  embedding?: number[];
}

export interface ScoredExample {
  example: Example;
  similarity: number;
}

export interface SimilarityResult {
  examples: ScoredExample[];
  maxSimilarity: number;
  /** False when the store fell back to unranked examples. */
  ranked: boolean;
}

export interface EmbeddingRecord {
  filename: string;
  embedding: number[];
}

export interface EmbeddingGenerationStats {
  totalExamples: number;
  embeddingsGenerated: number;
  embeddingsSkipped: number;
  embeddingsFailed: number;
  embeddingsAvailable: number;
}

export interface ExampleStoreStats {
  totalExamples: number;
  examplesWithDescriptions: number;
  embeddingsAvailable: number;
  embeddingsMissing: number;
  averageSqlLength: number;
  questionCache: {
    cachedItems: number;
    hits: number;
    misses: number;
  };
}
