import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, validateConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('should return the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should overlay thresholds, weights and timeouts from the environment', () => {
    const config = loadConfig({
      COVERAGE_STRONG_THRESHOLD: '0.85',
      COVERAGE_MODERATE_THRESHOLD: '0.65',
      COVERAGE_THIN_THRESHOLD: '0.3',
      SCORE_WEIGHT_BREADTH: '0.1',
      RETRIEVAL_TOP_K: '12',
      RETRIEVAL_TIMEOUT_MS: '2500',
      HANDLER_TIMEOUT_MS: '15000',
      GAP_ENQUEUE_COOLDOWN_SECONDS: '3600',
    });

    expect(config.thresholds).toEqual({ strong: 0.85, moderate: 0.65, thin: 0.3 });
    expect(config.scoring.weights.breadth).toBe(0.1);
    expect(config.scoring.weights.similarity).toBe(0.4);
    expect(config.retrieval).toEqual({ topK: 12, timeoutMs: 2500 });
    expect(config.handlers.timeoutMs).toBe(15000);
    expect(config.gaps.enqueueCooldownSeconds).toBe(3600);
    expect(config.gaps.basePriority).toBe(50);
  });

  it('should treat blank variables as unset', () => {
    expect(loadConfig({ RETRIEVAL_TOP_K: '  ' }).retrieval.topK).toBe(8);
  });

  it('should reject non-numeric values', () => {
    expect(() => loadConfig({ COVERAGE_STRONG_THRESHOLD: 'high' })).toThrow(
      'COVERAGE_STRONG_THRESHOLD must be a number (got "high")'
    );
  });

  it('should reject fractional integers', () => {
    expect(() => loadConfig({ RETRIEVAL_TOP_K: '2.5' })).toThrow(ConfigError);
  });

  it('should reject thresholds out of order', () => {
    expect(() =>
      loadConfig({ COVERAGE_MODERATE_THRESHOLD: '0.9' })
    ).toThrow('Coverage thresholds must satisfy 0 < thin < moderate < strong <= 1 (got 0.4, 0.9, 0.8)');
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
  });

  it('should reject a negative weight', () => {
    const config = {
      ...DEFAULT_CONFIG,
      scoring: {
        ...DEFAULT_CONFIG.scoring,
        weights: { ...DEFAULT_CONFIG.scoring.weights, quality: -0.1 },
      },
    };
    expect(() => validateConfig(config)).toThrow('Scoring weight quality must be non-negative');
  });

  it('should reject a scoring top-k above 5', () => {
    const config = { ...DEFAULT_CONFIG, scoring: { ...DEFAULT_CONFIG.scoring, topK: 6 } };
    expect(() => validateConfig(config)).toThrow('SCORE_TOP_K must be between 1 and 5');
  });

  it('should reject a zero timeout', () => {
    const config = { ...DEFAULT_CONFIG, handlers: { timeoutMs: 0 } };
    expect(() => validateConfig(config)).toThrow('Timeouts must be positive');
  });

  it('should reject a strong threshold above 1', () => {
    const config = { ...DEFAULT_CONFIG, thresholds: { strong: 1.2, moderate: 0.6, thin: 0.4 } };
    expect(() => validateConfig(config)).toThrow(ConfigError);
  });
});
