import type { IRetrievalClient, RetrievalOptions } from '../../src/providers/IRetrievalClient.js';
import type { MatchedItem } from '../../src/types/models.js';

/**
 * Retrieval client returning canned matches.
 * `delayMs` simulates a slow store; `failWith` makes every search reject.
 */
export class MockRetrievalClient implements IRetrievalClient {
  matches: MatchedItem[] = [];
  delayMs = 0;
  failWith: Error | null = null;
  readonly calls: Array<{ text: string; k: number; options: RetrievalOptions }> = [];

  constructor(matches: MatchedItem[] = []) {
    this.matches = matches;
  }

  async search(text: string, k: number, options: RetrievalOptions): Promise<MatchedItem[]> {
    this.calls.push({ text, k, options });

    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) throw this.failWith;

    return this.matches.slice(0, k);
  }
}

let itemSeq = 0;

/** A matched item with neutral defaults. */
export function makeItem(overrides: Partial<MatchedItem> = {}): MatchedItem {
  itemSeq++;
  return {
    itemId: `item-${itemSeq}`,
    relevance: 0.8,
    vendor: null,
    equipmentType: null,
    sourceRef: null,
    quality: null,
    title: null,
    excerpt: null,
    ...overrides,
  };
}
