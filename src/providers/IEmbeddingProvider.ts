/**
 * Embedding provider interface.
 * Turns request text into a vector for knowledge-item similarity search.
 */

export interface EmbeddingOptions {
  /** Aborts the underlying API call. */
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  /** Vector dimensionality; must match the knowledge_items.embedding column. */
  readonly dimensions: number;

  generate(text: string, options?: EmbeddingOptions): Promise<number[]>;
}
