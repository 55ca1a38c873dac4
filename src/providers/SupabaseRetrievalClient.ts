/**
 * Supabase implementation of IRetrievalClient.
 * Embeds the request text and calls a pgvector RPC over knowledge_items.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import type { IRetrievalClient, RetrievalOptions } from './IRetrievalClient.js';
import type { MatchedItem } from '../types/models.js';
import type { ScoredKnowledgeItemRow } from '../types/database.js';
import { timeoutSignal } from '../utils/async.js';

export class SupabaseRetrievalClient implements IRetrievalClient {
  constructor(
    private readonly db: SupabaseClient,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly minSimilarity = 0.3
  ) {}

  async search(
    text: string,
    k: number,
    options: RetrievalOptions
  ): Promise<MatchedItem[]> {
    const signal = timeoutSignal(options.timeoutMs, options.signal);
    const embedding = await this.embeddingProvider.generate(text, { signal });

    const { data, error } = await this.db
      .rpc('match_knowledge_items', {
        query_embedding: JSON.stringify(embedding),
        match_count: k,
        min_similarity: this.minSimilarity,
      })
      .abortSignal(signal);

    if (error)
      throw new Error(`Failed to search knowledge items: ${error.message}`);

    return ((data ?? []) as ScoredKnowledgeItemRow[]).map(toMatchedItem);
  }
}

function toMatchedItem(row: ScoredKnowledgeItemRow): MatchedItem {
  return {
    itemId: row.id,
    relevance: Number(row.similarity),
    vendor: row.vendor,
    equipmentType: row.equipment_type,
    sourceRef: row.source_ref,
    quality: row.quality_score === null ? null : Number(row.quality_score),
    title: row.title,
    excerpt: row.excerpt,
  };
}
