/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import type { EmbeddingOptions, IEmbeddingProvider } from './IEmbeddingProvider.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  private model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string, options?: EmbeddingOptions): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: text,
        dimensions: this.dimensions,
      },
      { signal: options?.signal }
    );

    const first = response.data[0];
    if (!first) {
      throw new Error('OpenAI returned no embedding');
    }
    return first.embedding;
  }
}
