/**
 * Supabase implementation of IResearchQueue.
 * Appends to the research_queue table, which the ingestion worker drains.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IResearchQueue } from './IResearchQueue.js';
import type { ResearchMessage } from '../types/database.js';

export class SupabaseResearchQueue implements IResearchQueue {
  constructor(private readonly db: SupabaseClient) {}

  async send(message: ResearchMessage): Promise<void> {
    const { error } = await this.db.from('research_queue').insert({
      gap_id: message.gap_id,
      search_terms: message.search_terms,
      sources: message.sources,
      priority: message.priority,
      vendor_hint: message.vendor_hint,
      equipment_hint: message.equipment_hint,
      query_text: message.query_text,
      enqueued_at: message.enqueued_at,
    });

    if (error)
      throw new Error(`Failed to enqueue research message: ${error.message}`);
  }
}
