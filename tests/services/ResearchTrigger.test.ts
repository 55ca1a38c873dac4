import { describe, it, expect, beforeEach } from 'vitest';
import { ResearchTrigger, toResearchMessage } from '../../src/services/ResearchTrigger.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { RepairRequest } from '../../src/types/models.js';
import { MockResearchQueue } from '../mocks/MockResearchQueue.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const repair: RepairRequest = {
  requestId: 'req-7',
  userId: 'user-1',
  queryText: 'VFD tripping on startup',
  normalizedQuery: 'vfd tripping on startup',
  fingerprint: 'f'.repeat(64),
  vendorHint: 'danfoss',
  equipmentHint: 'drive',
  symptomHint: 'tripping',
  entities: [],
  searchTerms: ['site:danfoss.com Danfoss drive', 'Danfoss drive manual'],
  sources: ['manufacturer_website', 'manualslib', 'industry_forums'],
  priority: 55,
  coverageLevel: 'thin',
};

describe('ResearchTrigger', () => {
  let queue: MockResearchQueue;
  let logs: ConsoleLogProvider;
  let trigger: ResearchTrigger;

  beforeEach(() => {
    queue = new MockResearchQueue();
    logs = new ConsoleLogProvider();
    trigger = new ResearchTrigger(queue, logs, () => NOW);
  });

  it('should send one message and report success', async () => {
    expect(await trigger.enqueue(repair, 'gap-3')).toBe(true);

    expect(queue.messages).toEqual([
      {
        gap_id: 'gap-3',
        search_terms: ['site:danfoss.com Danfoss drive', 'Danfoss drive manual'],
        sources: ['manufacturer_website', 'manualslib', 'industry_forums'],
        priority: 55,
        vendor_hint: 'danfoss',
        equipment_hint: 'drive',
        query_text: 'VFD tripping on startup',
        enqueued_at: '2026-03-01T12:00:00.000Z',
      },
    ]);
    expect(logs.find('Research enqueued')[0].fields).toEqual({
      gapId: 'gap-3',
      requestId: 'req-7',
      priority: 55,
      terms: 2,
    });
  });

  it('should report failure and log instead of throwing', async () => {
    queue.failWith = new Error('queue unavailable');

    expect(await trigger.enqueue(repair, 'gap-3')).toBe(false);

    const warns = logs.at('warn');
    expect(warns).toHaveLength(1);
    expect(warns[0].message).toBe('Research enqueue failed for gap gap-3');
    expect(warns[0].fields).toEqual({
      failure: 'enqueue',
      gapId: 'gap-3',
      requestId: 'req-7',
      error: 'queue unavailable',
    });
  });
});

describe('toResearchMessage', () => {
  it('should copy search terms', () => {
    const message = toResearchMessage(repair, 'gap-1', NOW);
    message.search_terms.push('extra');

    expect(repair.searchTerms).toHaveLength(2);
  });
});
