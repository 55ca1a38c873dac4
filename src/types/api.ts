/**
 * Wire shapes for API responses. Request bodies are checked against the
 * BodySchema of each endpoint.
 */

import type { CoverageLevel, EscalationPayload, Route } from './models.js';

// ── Responses ──

/** Wire form of the response envelope. */
export interface RouteQueryResponse {
  request_id: string;
  route: Route;
  coverage_level: CoverageLevel;
  confidence: number;
  text: string;
  citations: string[];
  escalated: boolean;
  degraded: boolean;
  handler: string | null;
  escalation?: EscalationPayload;
}

export interface GapResponse {
  id: string;
  queryText: string;
  vendor: string | null;
  equipment: string | null;
  symptom: string | null;
  frequency: number;
  priority: number;
  firstSeenAt: string;
  lastSeenAt: string;
  resolved: boolean;
  resolvedAt: string | null;
  resolutionRefs: string[];
}

export interface GapListResponse {
  gaps: GapResponse[];
  limit: number;
  offset: number;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
