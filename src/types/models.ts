/**
 * Domain models: the entities the router works with.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Requests ──

export type Channel = 'telegram' | 'whatsapp' | 'slack' | 'web' | 'api';

export const CHANNELS: readonly Channel[] = [
  'telegram',
  'whatsapp',
  'slack',
  'web',
  'api',
];

/**
 * Upstream classifier verdict. Anything other than 'none' sends the
 * request to human escalation regardless of coverage.
 */
export type EscalationFlag = 'none' | 'safety' | 'urgent';

export const ESCALATION_FLAGS: readonly EscalationFlag[] = ['none', 'safety', 'urgent'];

/** Text derived from an attachment (OCR, voice transcript, ...). */
export interface AttachmentText {
  kind: 'image' | 'audio' | 'document';
  text: string;
}

export interface RouterRequest {
  readonly id: string;
  readonly text: string;
  readonly channel: Channel;
  readonly attachments: readonly AttachmentText[];
  readonly userId: string;
  readonly receivedAt: Date;
  readonly escalation?: EscalationFlag;
}

// ── Retrieval & Coverage ──

export interface MatchedItem {
  itemId: string;
  /** Similarity to the request, 0..1. */
  relevance: number;
  vendor: string | null;
  equipmentType: string | null;
  sourceRef: string | null;
  /** Per-item quality metadata, 0..1, when the store has it. */
  quality: number | null;
  title: string | null;
  excerpt: string | null;
}

export type CoverageLevel = 'none' | 'thin' | 'moderate' | 'strong';

export interface Coverage {
  level: CoverageLevel;
  itemCount: number;
  avgRelevance: number;
  confidence: number;
  matchedItems: MatchedItem[];
  /** True when retrieval failed and coverage was forced to none. */
  degraded: boolean;
}

// ── Routing ──

/**
 * A: direct answer
 * B: answer + specialist enrichment
 * C: fallback answer + knowledge repair
 * D: escalate to a human
 */
export type Route = 'A' | 'B' | 'C' | 'D';

export interface RouteDecision {
  route: Route;
  coverage: Coverage;
  reason: string;
  /** Whether the background gap pipeline runs for this request. */
  triggersRepair: boolean;
}

// ── Gaps ──

/** Where research should look, in order of preference. */
export type ResearchSource =
  | 'manufacturer_website'
  | 'manualslib'
  | 'service_bulletins'
  | 'technical_standards'
  | 'industry_forums';

export interface RepairRequest {
  requestId: string;
  userId: string;
  queryText: string;
  normalizedQuery: string;
  /** Gap identity, from the query text and the tokens detected in it. */
  fingerprint: string;
  vendorHint: string | null;
  equipmentHint: string | null;
  symptomHint: string | null;
  entities: string[];
  searchTerms: string[];
  sources: ResearchSource[];
  /** 0..100 */
  priority: number;
  coverageLevel: CoverageLevel;
}

export interface GapRecord {
  id: string;
  queryFingerprint: string;
  queryText: string;
  vendor: string | null;
  equipment: string | null;
  symptom: string | null;
  frequency: number;
  priority: number;
  firstSeenAt: Date;
  lastSeenAt: Date;
  lastEnqueuedAt: Date | null;
  resolved: boolean;
  resolvedAt: Date | null;
  resolutionRefs: string[];
}

export interface GapStats {
  totalGaps: number;
  resolvedCount: number;
  unresolvedCount: number;
  /** Percentage, 0..100. */
  resolutionRate: number;
  avgFrequency: number;
  avgResolutionHours: number | null;
}

// ── Handlers & Responses ──

export interface HandlerResult {
  text: string;
  citations: string[];
  confidence: number;
}

export interface DispatchResult extends HandlerResult {
  handlerKey: string;
  degraded: boolean;
}

export interface EscalationPayload {
  requestId: string;
  userId: string;
  channel: Channel;
  flag: EscalationFlag;
  reason: string;
  coverageLevel: CoverageLevel;
  confidence: number;
  /** Source references a human reviewer can start from. */
  candidateSources: string[];
  createdAt: string;
}

export interface ResponseEnvelope {
  requestId: string;
  route: Route;
  coverageLevel: CoverageLevel;
  confidence: number;
  text: string;
  citations: string[];
  escalated: boolean;
  degraded: boolean;
  handler: string | null;
  escalation?: EscalationPayload;
}
