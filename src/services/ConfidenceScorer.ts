/**
 * Confidence scoring over retrieved knowledge items.
 * Four normalized signals (similarity, count, quality, breadth) are combined
 * with configured weights into a score in [0, 1].
 */

import type { ScoringConfig } from '../config.js';
import type { MatchedItem } from '../types/models.js';

export interface ConfidenceSignals {
  similarity: number;
  count: number;
  quality: number;
  breadth: number;
}

export interface ScoringContext {
  /** Vendor key detected in the request text, lowercased. */
  vendorHint?: string | null;
}

const ZERO_SIGNALS: ConfidenceSignals = { similarity: 0, count: 0, quality: 0, breadth: 0 };

export class ConfidenceScorer {
  constructor(private readonly config: ScoringConfig) {}

  score(matches: readonly MatchedItem[], context?: ScoringContext): number {
    return this.combine(this.signals(matches, context));
  }

  signals(matches: readonly MatchedItem[], context?: ScoringContext): ConfidenceSignals {
    if (matches.length === 0) return { ...ZERO_SIGNALS };

    return {
      similarity: this.similaritySignal(matches),
      count: Math.min(matches.length, this.config.countSaturation) / this.config.countSaturation,
      quality: this.qualitySignal(matches),
      breadth: breadthSignal(matches, context?.vendorHint ?? null),
    };
  }

  /** Weighted sum of clamped signals, clamped to [0, 1]. */
  combine(signals: ConfidenceSignals): number {
    const w = this.config.weights;
    const total =
      w.similarity * clamp01(signals.similarity) +
      w.count * clamp01(signals.count) +
      w.quality * clamp01(signals.quality) +
      w.breadth * clamp01(signals.breadth);
    return clamp01(total);
  }

  private similaritySignal(matches: readonly MatchedItem[]): number {
    const top = matches
      .map((m) => clamp01(m.relevance))
      .sort((a, b) => b - a)
      .slice(0, this.config.topK);
    return mean(top);
  }

  private qualitySignal(matches: readonly MatchedItem[]): number {
    const qualities = matches
      .map((m) => m.quality)
      .filter((q): q is number => q !== null && Number.isFinite(q))
      .map(clamp01);
    return qualities.length > 0 ? mean(qualities) : this.config.neutralQuality;
  }
}

/**
 * With a hint: share of vendor-tagged items that match it.
 * Without: 1 / number of distinct vendor-or-equipment tags.
 */
function breadthSignal(matches: readonly MatchedItem[], vendorHint: string | null): number {
  if (vendorHint) {
    const tagged = matches.filter((m) => m.vendor);
    if (tagged.length === 0) return 0;
    const hint = vendorHint.toLowerCase();
    const aligned = tagged.filter((m) => m.vendor?.toLowerCase() === hint);
    return aligned.length / tagged.length;
  }

  const tags = new Set(
    matches
      .map((m) => (m.vendor ?? m.equipmentType)?.toLowerCase())
      .filter((tag): tag is string => Boolean(tag))
  );
  return tags.size === 0 ? 0 : 1 / tags.size;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
