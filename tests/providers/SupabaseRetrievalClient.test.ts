import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseRetrievalClient } from '../../src/providers/SupabaseRetrievalClient.js';
import type { ScoredKnowledgeItemRow } from '../../src/types/database.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';

interface RpcResult {
  data: ScoredKnowledgeItemRow[] | null;
  error: { message: string } | null;
}

describe('SupabaseRetrievalClient', () => {
  let result: RpcResult;
  const abortSignal = vi.fn<(signal: AbortSignal) => Promise<RpcResult>>();
  const rpc = vi.fn<(fn: string, args: Record<string, unknown>) => { abortSignal: typeof abortSignal }>();
  // Only rpc().abortSignal() is exercised.
  const db = { rpc } as unknown as SupabaseClient;
  let embeddings: MockEmbeddingProvider;
  let client: SupabaseRetrievalClient;

  beforeEach(() => {
    result = { data: [], error: null };
    abortSignal.mockReset();
    abortSignal.mockImplementation(async () => result);
    rpc.mockReset();
    rpc.mockReturnValue({ abortSignal });
    embeddings = new MockEmbeddingProvider();
    client = new SupabaseRetrievalClient(db, embeddings);
  });

  it('should embed the text and call the match RPC', async () => {
    await client.search('g120 overcurrent', 8, { timeoutMs: 1000 });

    expect(embeddings.callCount).toBe(1);
    expect(rpc).toHaveBeenCalledTimes(1);
    const [fn, args] = rpc.mock.calls[0];
    expect(fn).toBe('match_knowledge_items');
    expect(args.match_count).toBe(8);
    expect(args.min_similarity).toBe(0.3);

    const embedding: unknown = JSON.parse(String(args.query_embedding));
    expect(Array.isArray(embedding) && embedding.length).toBe(64);
  });

  it('should pass one bounded signal to the embedding call and the query', async () => {
    await client.search('q', 5, { timeoutMs: 1000 });

    const signal = embeddings.signals[0];
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(abortSignal).toHaveBeenCalledWith(signal);
  });

  it('should map rows to matched items', async () => {
    result.data = [
      {
        id: 'kb-1',
        title: 'G120 fault list',
        excerpt: 'F30002 overcurrent',
        vendor: 'siemens',
        equipment_type: 'drive',
        source_ref: 'kb://g120',
        quality_score: 0.9,
        similarity: 0.82,
      },
      {
        id: 'kb-2',
        title: null,
        excerpt: null,
        vendor: null,
        equipment_type: null,
        source_ref: null,
        quality_score: null,
        similarity: 0.41,
      },
    ];

    expect(await client.search('q', 5, { timeoutMs: 1000 })).toEqual([
      {
        itemId: 'kb-1',
        relevance: 0.82,
        vendor: 'siemens',
        equipmentType: 'drive',
        sourceRef: 'kb://g120',
        quality: 0.9,
        title: 'G120 fault list',
        excerpt: 'F30002 overcurrent',
      },
      {
        itemId: 'kb-2',
        relevance: 0.41,
        vendor: null,
        equipmentType: null,
        sourceRef: null,
        quality: null,
        title: null,
        excerpt: null,
      },
    ]);
  });

  it('should return no matches for null data', async () => {
    result.data = null;
    expect(await client.search('q', 5, { timeoutMs: 1000 })).toEqual([]);
  });

  it('should throw on RPC errors', async () => {
    result.error = { message: 'function match_knowledge_items does not exist' };

    await expect(client.search('q', 5, { timeoutMs: 1000 })).rejects.toThrow(
      'Failed to search knowledge items: function match_knowledge_items does not exist'
    );
  });

  it('should honour a custom similarity floor', async () => {
    client = new SupabaseRetrievalClient(db, embeddings, 0.5);

    await client.search('q', 5, { timeoutMs: 1000 });

    expect(rpc.mock.calls[0][1].min_similarity).toBe(0.5);
  });
});
