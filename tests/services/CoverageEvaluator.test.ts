import { describe, it, expect, beforeEach } from 'vitest';
import { CoverageEvaluator, classifyCoverage, degradedCoverage } from '../../src/services/CoverageEvaluator.js';
import { ConfidenceScorer } from '../../src/services/ConfidenceScorer.js';
import { EntityExtractor } from '../../src/text/entities.js';
import { loadCatalog } from '../../src/text/catalog.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { DEFAULT_CONFIG } from '../../src/config.js';
import { MockRetrievalClient, makeItem } from '../mocks/MockRetrievalClient.js';
import { makeRequest, testConfig } from '../helpers/fixtures.js';

describe('CoverageEvaluator', () => {
  let retrieval: MockRetrievalClient;
  let logs: ConsoleLogProvider;
  let evaluator: CoverageEvaluator;

  function build(retrievalTimeoutMs = 200): CoverageEvaluator {
    const config = testConfig({ retrievalTimeoutMs });
    return new CoverageEvaluator(
      retrieval,
      new ConfidenceScorer(config.scoring),
      new EntityExtractor(loadCatalog()),
      { thresholds: config.thresholds, retrieval: config.retrieval },
      logs
    );
  }

  beforeEach(() => {
    retrieval = new MockRetrievalClient();
    logs = new ConsoleLogProvider();
    evaluator = build();
  });

  it('should classify aligned, high-quality matches as strong', async () => {
    retrieval.matches = Array.from({ length: 5 }, () =>
      makeItem({ relevance: 0.85, quality: 0.9, vendor: 'siemens' })
    );

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.level).toBe('strong');
    expect(coverage.confidence).toBeCloseTo(0.915, 10);
    expect(coverage.itemCount).toBe(5);
    expect(coverage.avgRelevance).toBeCloseTo(0.85, 10);
    expect(coverage.degraded).toBe(false);
  });

  it('should classify mid-range matches as moderate', async () => {
    // 0.4*0.7 + 0.2*1 + 0.25*0.6 + 0.15*0
    retrieval.matches = Array.from({ length: 5 }, () => makeItem({ relevance: 0.7, quality: 0.6 }));

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.level).toBe('moderate');
    expect(coverage.confidence).toBeCloseTo(0.63, 10);
  });

  it('should classify few untagged matches as thin', async () => {
    // 0.4*0.7 + 0.2*0.6 + 0.25*0.5 + 0
    retrieval.matches = Array.from({ length: 3 }, () => makeItem({ relevance: 0.7 }));

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.level).toBe('thin');
    expect(coverage.confidence).toBeCloseTo(0.525, 10);
  });

  it('should classify a single weak match as none without degrading', async () => {
    retrieval.matches = [makeItem({ relevance: 0.3 })];

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.level).toBe('none');
    expect(coverage.itemCount).toBe(1);
    expect(coverage.degraded).toBe(false);
  });

  it('should return none for zero matches', async () => {
    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage).toEqual({
      level: 'none',
      itemCount: 0,
      avgRelevance: 0,
      confidence: 0,
      matchedItems: [],
      degraded: false,
    });
  });

  it('should search the normalized text with attachments', async () => {
    await evaluator.evaluate(
      makeRequest({
        text: '  Drive  FAULT ',
        attachments: [{ kind: 'image', text: 'Display: F0001' }],
      })
    );

    expect(retrieval.calls).toHaveLength(1);
    expect(retrieval.calls[0].text).toBe('drive fault display: f0001');
    expect(retrieval.calls[0].k).toBe(DEFAULT_CONFIG.retrieval.topK);
    expect(retrieval.calls[0].options.timeoutMs).toBe(200);
  });

  it('should order matched items by relevance', async () => {
    const low = makeItem({ relevance: 0.2 });
    const high = makeItem({ relevance: 0.9 });
    const mid = makeItem({ relevance: 0.5 });
    retrieval.matches = [low, high, mid];

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.matchedItems.map((m) => m.itemId)).toEqual([
      high.itemId,
      mid.itemId,
      low.itemId,
    ]);
  });

  it('should score items tagged with a vendor alias as aligned', async () => {
    // 0.4*0.9 + 0.2*1 + 0.25*0.9 + 0.15*1
    retrieval.matches = Array.from({ length: 5 }, () =>
      makeItem({ relevance: 0.9, quality: 0.9, vendor: 'Allen-Bradley' })
    );

    const coverage = await evaluator.evaluate(
      makeRequest({ text: 'Allen-Bradley PowerFlex 525 showing F004 undervoltage' })
    );

    expect(coverage.level).toBe('strong');
    expect(coverage.confidence).toBeCloseTo(0.935, 10);
    expect(coverage.matchedItems.map((m) => m.vendor)).toEqual(Array(5).fill('rockwell'));
  });

  it('should keep unknown vendor labels lowercased', async () => {
    retrieval.matches = [makeItem({ vendor: ' Acme ' }), makeItem({ vendor: null })];

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.matchedItems.map((m) => m.vendor)).toEqual(['acme', null]);
  });

  it('should degrade to none and log when retrieval fails', async () => {
    retrieval.failWith = new Error('connection refused');
    const request = makeRequest();

    const coverage = await evaluator.evaluate(request);

    expect(coverage).toEqual(degradedCoverage());
    const warns = logs.at('warn');
    expect(warns).toHaveLength(1);
    expect(warns[0].message).toBe(`Retrieval failed for request ${request.id}`);
    expect(warns[0].fields).toEqual({
      failure: 'retrieval',
      requestId: request.id,
      error: 'connection refused',
    });
  });

  it('should degrade when retrieval exceeds its timeout', async () => {
    evaluator = build(10);
    retrieval.delayMs = 100;
    retrieval.matches = [makeItem({ relevance: 0.9 })];

    const coverage = await evaluator.evaluate(makeRequest());

    expect(coverage.level).toBe('none');
    expect(coverage.degraded).toBe(true);
    expect(logs.at('warn')[0].fields?.error).toBe('Timeout after 10ms: knowledge retrieval');
  });

  it('should degrade when the caller signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const coverage = await evaluator.evaluate(makeRequest(), controller.signal);

    expect(coverage.degraded).toBe(true);
    expect(logs.at('warn')[0].fields?.error).toBe('Aborted: knowledge retrieval');
  });
});

describe('classifyCoverage', () => {
  const thresholds = DEFAULT_CONFIG.thresholds;

  it('should treat lower bounds as inclusive', () => {
    expect(classifyCoverage(0.8, thresholds)).toBe('strong');
    expect(classifyCoverage(0.6, thresholds)).toBe('moderate');
    expect(classifyCoverage(0.4, thresholds)).toBe('thin');
  });

  it('should classify values just below each bound into the lower level', () => {
    expect(classifyCoverage(0.7999, thresholds)).toBe('moderate');
    expect(classifyCoverage(0.5999, thresholds)).toBe('thin');
    expect(classifyCoverage(0.3999, thresholds)).toBe('none');
  });

  it('should cover the ends of the range', () => {
    expect(classifyCoverage(0, thresholds)).toBe('none');
    expect(classifyCoverage(1, thresholds)).toBe('strong');
  });

  it('should follow custom thresholds', () => {
    expect(classifyCoverage(0.5, { strong: 0.9, moderate: 0.5, thin: 0.2 })).toBe('moderate');
  });
});
