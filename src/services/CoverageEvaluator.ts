/**
 * Coverage evaluation.
 * One bounded retrieval call, scored and classified against configured
 * thresholds. Retrieval failures degrade to NONE coverage and never throw.
 */

import type { CoverageThresholds, RetrievalConfig } from '../config.js';
import type { IRetrievalClient } from '../providers/IRetrievalClient.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EntityExtractor } from '../text/entities.js';
import type { Coverage, CoverageLevel, MatchedItem, RouterRequest } from '../types/models.js';
import type { ConfidenceScorer } from './ConfidenceScorer.js';
import { RetrievalFailure, describeError } from '../errors.js';
import { combinedText } from '../text/normalize.js';
import { withTimeout } from '../utils/async.js';

export interface CoverageEvaluatorConfig {
  thresholds: CoverageThresholds;
  retrieval: RetrievalConfig;
}

export class CoverageEvaluator {
  constructor(
    private readonly retrieval: IRetrievalClient,
    private readonly scorer: ConfidenceScorer,
    private readonly extractor: EntityExtractor,
    private readonly config: CoverageEvaluatorConfig,
    private readonly logProvider: ILogProvider
  ) {}

  async evaluate(request: RouterRequest, signal?: AbortSignal): Promise<Coverage> {
    const text = combinedText(request.text, request.attachments);
    const { topK, timeoutMs } = this.config.retrieval;

    let matches: MatchedItem[];
    try {
      matches = await withTimeout(
        this.retrieval.search(text, topK, { timeoutMs, signal }),
        timeoutMs,
        { context: 'knowledge retrieval', signal }
      );
    } catch (err) {
      const failure = new RetrievalFailure(
        `Retrieval failed for request ${request.id}`,
        { cause: err }
      );
      this.logProvider.warn(failure.message, {
        failure: failure.kind,
        requestId: request.id,
        error: describeError(err),
      });
      return degradedCoverage();
    }

    const ranked = matches
      .map((m) => (m.vendor ? { ...m, vendor: this.extractor.vendorKeyFor(m.vendor) } : m))
      .sort((a, b) => b.relevance - a.relevance);
    const vendorHint = this.extractor.extract(text).vendor?.key ?? null;
    const confidence = this.scorer.score(ranked, { vendorHint });

    return {
      level: classifyCoverage(confidence, this.config.thresholds),
      itemCount: ranked.length,
      avgRelevance: averageRelevance(ranked),
      confidence,
      matchedItems: ranked,
      degraded: false,
    };
  }
}

/** Lower bounds are inclusive: confidence == strong is strong. */
export function classifyCoverage(
  confidence: number,
  thresholds: CoverageThresholds
): CoverageLevel {
  if (confidence >= thresholds.strong) return 'strong';
  if (confidence >= thresholds.moderate) return 'moderate';
  if (confidence >= thresholds.thin) return 'thin';
  return 'none';
}

export function degradedCoverage(): Coverage {
  return {
    level: 'none',
    itemCount: 0,
    avgRelevance: 0,
    confidence: 0,
    matchedItems: [],
    degraded: true,
  };
}

function averageRelevance(matches: readonly MatchedItem[]): number {
  if (matches.length === 0) return 0;
  return matches.reduce((sum, m) => sum + m.relevance, 0) / matches.length;
}
