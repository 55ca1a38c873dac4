/**
 * Router configuration.
 * Thresholds, weights and timeouts are injected at construction so they can
 * be tuned per deployment and pinned in tests.
 */

import { ConfigError } from './errors.js';

export interface CoverageThresholds {
  /** confidence >= strong → strong */
  strong: number;
  /** moderate <= confidence < strong → moderate */
  moderate: number;
  /** thin <= confidence < moderate → thin; below → none */
  thin: number;
}

export interface ScoringWeights {
  similarity: number;
  count: number;
  quality: number;
  breadth: number;
}

export interface ScoringConfig {
  weights: ScoringWeights;
  /** Matches averaged for the similarity signal (at most 5). */
  topK: number;
  /** Item count at which the count signal saturates. */
  countSaturation: number;
  /** Quality signal when no item carries quality metadata. */
  neutralQuality: number;
}

export interface RetrievalConfig {
  /** Matches requested from the retrieval client. */
  topK: number;
  timeoutMs: number;
}

export interface HandlerConfig {
  timeoutMs: number;
}

export interface GapConfig {
  basePriority: number;
  faultCodeBonus: number;
  frequencyBonusPerHit: number;
  maxFrequencyBonus: number;
  /** Priority at which a gap also asks for service bulletins instead of forums. */
  highPriority: number;
  /** Minimum interval between research enqueues for one gap record. */
  enqueueCooldownSeconds: number;
}

export interface RouterConfig {
  thresholds: CoverageThresholds;
  scoring: ScoringConfig;
  retrieval: RetrievalConfig;
  handlers: HandlerConfig;
  gaps: GapConfig;
}

export const DEFAULT_CONFIG: RouterConfig = {
  thresholds: { strong: 0.8, moderate: 0.6, thin: 0.4 },
  scoring: {
    weights: { similarity: 0.4, count: 0.2, quality: 0.25, breadth: 0.15 },
    topK: 5,
    countSaturation: 5,
    neutralQuality: 0.5,
  },
  retrieval: { topK: 8, timeoutMs: 4_000 },
  handlers: { timeoutMs: 20_000 },
  gaps: {
    basePriority: 50,
    faultCodeBonus: 20,
    frequencyBonusPerHit: 5,
    maxFrequencyBonus: 30,
    highPriority: 70,
    enqueueCooldownSeconds: 900,
  },
};

type Env = Record<string, string | undefined>;

/**
 * Build a config from environment variables layered over the defaults.
 * Unset variables keep the default; malformed ones throw ConfigError.
 */
export function loadConfig(env: Env = process.env): RouterConfig {
  const d = DEFAULT_CONFIG;

  const config: RouterConfig = {
    thresholds: {
      strong: num(env, 'COVERAGE_STRONG_THRESHOLD', d.thresholds.strong),
      moderate: num(env, 'COVERAGE_MODERATE_THRESHOLD', d.thresholds.moderate),
      thin: num(env, 'COVERAGE_THIN_THRESHOLD', d.thresholds.thin),
    },
    scoring: {
      weights: {
        similarity: num(env, 'SCORE_WEIGHT_SIMILARITY', d.scoring.weights.similarity),
        count: num(env, 'SCORE_WEIGHT_COUNT', d.scoring.weights.count),
        quality: num(env, 'SCORE_WEIGHT_QUALITY', d.scoring.weights.quality),
        breadth: num(env, 'SCORE_WEIGHT_BREADTH', d.scoring.weights.breadth),
      },
      topK: int(env, 'SCORE_TOP_K', d.scoring.topK),
      countSaturation: d.scoring.countSaturation,
      neutralQuality: d.scoring.neutralQuality,
    },
    retrieval: {
      topK: int(env, 'RETRIEVAL_TOP_K', d.retrieval.topK),
      timeoutMs: int(env, 'RETRIEVAL_TIMEOUT_MS', d.retrieval.timeoutMs),
    },
    handlers: {
      timeoutMs: int(env, 'HANDLER_TIMEOUT_MS', d.handlers.timeoutMs),
    },
    gaps: {
      ...d.gaps,
      enqueueCooldownSeconds: int(
        env,
        'GAP_ENQUEUE_COOLDOWN_SECONDS',
        d.gaps.enqueueCooldownSeconds
      ),
    },
  };

  validateConfig(config);
  return config;
}

/** Throws ConfigError when the config cannot produce sane routing. */
export function validateConfig(config: RouterConfig): void {
  const { strong, moderate, thin } = config.thresholds;
  if (!(thin > 0 && thin < moderate && moderate < strong && strong <= 1)) {
    throw new ConfigError(
      `Coverage thresholds must satisfy 0 < thin < moderate < strong <= 1 (got ${thin}, ${moderate}, ${strong})`
    );
  }

  for (const [name, weight] of Object.entries(config.scoring.weights)) {
    if (!(weight >= 0)) {
      throw new ConfigError(`Scoring weight ${name} must be non-negative`);
    }
  }

  if (config.scoring.topK < 1 || config.scoring.topK > 5) {
    throw new ConfigError('SCORE_TOP_K must be between 1 and 5');
  }
  if (config.retrieval.topK < 1) {
    throw new ConfigError('RETRIEVAL_TOP_K must be at least 1');
  }
  if (config.retrieval.timeoutMs <= 0 || config.handlers.timeoutMs <= 0) {
    throw new ConfigError('Timeouts must be positive');
  }
  if (config.gaps.enqueueCooldownSeconds < 0) {
    throw new ConfigError('GAP_ENQUEUE_COOLDOWN_SECONDS must not be negative');
  }
}

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number (got "${raw}")`);
  }
  return value;
}

function int(env: Env, key: string, fallback: number): number {
  const value = num(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer (got ${value})`);
  }
  return value;
}
