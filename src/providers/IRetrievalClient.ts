/**
 * Retrieval client interface.
 * Given request text, returns knowledge-item matches ranked by relevance.
 */

import type { MatchedItem } from '../types/models.js';

export interface RetrievalOptions {
  /** Upper bound on the call; implementations should abort at this point. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface IRetrievalClient {
  search(text: string, k: number, options: RetrievalOptions): Promise<MatchedItem[]>;
}
