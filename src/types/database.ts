/**
 * Database row types, mirroring the Supabase tables and RPC results.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

// ── Knowledge ──

/** Row returned by the match_knowledge_items RPC. */
export interface ScoredKnowledgeItemRow {
  id: string;
  title: string | null;
  excerpt: string | null;
  vendor: string | null;
  equipment_type: string | null;
  source_ref: string | null;
  quality_score: number | null;
  similarity: number;
}

// ── Gaps ──

export interface GapRow {
  id: string;
  query_fingerprint: string;
  query_text: string;
  vendor: string | null;
  equipment: string | null;
  symptom: string | null;
  frequency: number;
  priority: number;
  first_seen_at: string;
  last_seen_at: string;
  last_enqueued_at: string | null;
  resolved: boolean;
  resolved_at: string | null;
  resolution_refs: string[];
}

export interface GapStatsRow {
  total_gaps: number;
  resolved_count: number;
  unresolved_count: number;
  avg_frequency: number | null;
  avg_resolution_hours: number | null;
}

// ── Research Queue ──

/** Message handed to the ingestion pipeline. */
export interface ResearchMessage {
  gap_id: string;
  search_terms: string[];
  sources: string[];
  priority: number;
  vendor_hint: string | null;
  equipment_hint: string | null;
  query_text: string;
  enqueued_at: string;
}
