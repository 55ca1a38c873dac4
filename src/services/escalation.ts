import type { Coverage, EscalationPayload, RouterRequest } from '../types/models.js';

/** The only text a flagged request ever receives. */
export const ESCALATION_NOTICE =
  'This request has been flagged for review by a qualified technician. ' +
  'No automated guidance will be given. A specialist will follow up with you directly.';

const MAX_CANDIDATE_SOURCES = 5;

export function buildEscalationPayload(
  request: RouterRequest,
  coverage: Coverage,
  reason: string,
  now: Date = new Date()
): EscalationPayload {
  const sources = coverage.matchedItems
    .map((m) => m.sourceRef)
    .filter((ref): ref is string => Boolean(ref));

  return {
    requestId: request.id,
    userId: request.userId,
    channel: request.channel,
    flag: request.escalation ?? 'none',
    reason,
    coverageLevel: coverage.level,
    confidence: coverage.confidence,
    candidateSources: [...new Set(sources)].slice(0, MAX_CANDIDATE_SOURCES),
    createdAt: now.toISOString(),
  };
}
