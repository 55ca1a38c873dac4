/**
 * Supabase implementation of IGapRepository.
 * Upsert and enqueue claims go through SQL functions so each is one statement.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IGapRepository, ListGapsOptions, UpsertGapInput } from './IGapRepository.js';
import type { GapRow, GapStatsRow } from '../types/database.js';

export class SupabaseGapRepository implements IGapRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsertByFingerprint(input: UpsertGapInput): Promise<GapRow> {
    const { data, error } = await this.db
      .rpc('upsert_kb_gap', {
        p_fingerprint: input.fingerprint,
        p_query_text: input.queryText,
        p_vendor: input.vendor,
        p_equipment: input.equipment,
        p_symptom: input.symptom,
        p_priority: input.priority,
      })
      .single();

    if (error) throw new Error(`Failed to upsert gap: ${error.message}`);
    return data as GapRow;
  }

  async findByFingerprint(fingerprint: string): Promise<GapRow | null> {
    const { data, error } = await this.db
      .from('kb_gaps')
      .select('*')
      .eq('query_fingerprint', fingerprint)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch gap: ${error.message}`);
    return (data as GapRow | null) ?? null;
  }

  async findById(id: string): Promise<GapRow | null> {
    const { data, error } = await this.db
      .from('kb_gaps')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch gap: ${error.message}`);
    return (data as GapRow | null) ?? null;
  }

  async markResolved(id: string, resolutionRefs: string[]): Promise<GapRow | null> {
    const { error } = await this.db
      .from('kb_gaps')
      .update({
        resolved: true,
        resolved_at: new Date().toISOString(),
        resolution_refs: resolutionRefs,
      })
      .eq('id', id)
      .eq('resolved', false);

    if (error) throw new Error(`Failed to resolve gap: ${error.message}`);
    return this.findById(id);
  }

  async claimEnqueue(id: string, cooldownSeconds: number): Promise<boolean> {
    const { data, error } = await this.db.rpc('claim_kb_gap_enqueue', {
      p_gap_id: id,
      p_cooldown_seconds: cooldownSeconds,
    });

    if (error) throw new Error(`Failed to claim gap enqueue: ${error.message}`);
    return data === true;
  }

  async listTop(options: ListGapsOptions): Promise<GapRow[]> {
    let query = this.db
      .from('kb_gaps')
      .select('*')
      .order('frequency', { ascending: false })
      .order('last_seen_at', { ascending: false })
      .range(options.offset, options.offset + options.limit - 1);

    if (options.resolved !== undefined) {
      query = query.eq('resolved', options.resolved);
    }

    const { data, error } = await query;

    if (error) throw new Error(`Failed to list gaps: ${error.message}`);
    return (data ?? []) as GapRow[];
  }

  async getStats(): Promise<GapStatsRow> {
    const { data, error } = await this.db.rpc('get_kb_gap_stats');

    if (error) throw new Error(`Failed to get gap stats: ${error.message}`);

    const row = (data as GapStatsRow[] | null)?.[0];
    return {
      total_gaps: Number(row?.total_gaps ?? 0),
      resolved_count: Number(row?.resolved_count ?? 0),
      unresolved_count: Number(row?.unresolved_count ?? 0),
      avg_frequency: row?.avg_frequency == null ? null : Number(row.avg_frequency),
      avg_resolution_hours:
        row?.avg_resolution_hours == null ? null : Number(row.avg_resolution_hours),
    };
  }
}
