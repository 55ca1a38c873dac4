import { createHash } from 'node:crypto';
import { normalizeText } from './normalize.js';

export interface FingerprintHints {
  vendor: string | null;
  equipment: string | null;
}

/**
 * Stable identity of a gap: SHA-256 over the normalized query text and the
 * vendor/equipment tokens detected in it. Identity never expires.
 */
export function computeFingerprint(queryText: string, hints: FingerprintHints): string {
  const material = [
    normalizeText(queryText),
    hints.vendor?.toLowerCase() ?? '',
    hints.equipment?.toLowerCase() ?? '',
  ].join('|');

  return createHash('sha256').update(material).digest('hex');
}
