import type { Coverage, MatchedItem, RouterRequest } from '../../src/types/models.js';
import type { RouterConfig } from '../../src/config.js';
import { DEFAULT_CONFIG } from '../../src/config.js';

let requestSeq = 0;

export function makeRequest(overrides: Partial<RouterRequest> = {}): RouterRequest {
  requestSeq++;
  return {
    id: `req-${requestSeq}`,
    text: 'Siemens G120 drive showing F30002 overcurrent',
    channel: 'telegram',
    attachments: [],
    userId: 'user-1',
    receivedAt: new Date('2026-03-01T08:00:00.000Z'),
    ...overrides,
  };
}

export function makeCoverage(overrides: Partial<Coverage> = {}): Coverage {
  return {
    level: 'none',
    itemCount: 0,
    avgRelevance: 0,
    confidence: 0,
    matchedItems: [],
    degraded: false,
    ...overrides,
  };
}

/** Coverage built from items, with level and confidence given explicitly. */
export function coverageOf(
  items: MatchedItem[],
  level: Coverage['level'],
  confidence: number
): Coverage {
  return makeCoverage({
    level,
    confidence,
    itemCount: items.length,
    avgRelevance: items.length ? items.reduce((s, m) => s + m.relevance, 0) / items.length : 0,
    matchedItems: items,
  });
}

/** DEFAULT_CONFIG with short timeouts for tests. */
export function testConfig(overrides: { retrievalTimeoutMs?: number; handlerTimeoutMs?: number } = {}): RouterConfig {
  return {
    ...DEFAULT_CONFIG,
    retrieval: { ...DEFAULT_CONFIG.retrieval, timeoutMs: overrides.retrievalTimeoutMs ?? 200 },
    handlers: { timeoutMs: overrides.handlerTimeoutMs ?? 200 },
  };
}
