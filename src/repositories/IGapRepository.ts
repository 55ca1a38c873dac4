/**
 * Gap data access interface.
 * Each mutating method maps to one atomic statement in the backing store so
 * concurrent router instances never lose an increment or duplicate a row.
 */

import type { GapRow, GapStatsRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface UpsertGapInput {
  fingerprint: string;
  queryText: string;
  vendor: string | null;
  equipment: string | null;
  symptom: string | null;
  priority: number;
}

export interface ListGapsOptions extends PaginationOptions {
  /** Filter by resolution state; omit for all. */
  resolved?: boolean;
}

export interface IGapRepository {
  /**
   * Insert with frequency 1, or increment frequency on the existing row with
   * the same fingerprint, refreshing last_seen_at and keeping the higher priority.
   */
  upsertByFingerprint(input: UpsertGapInput): Promise<GapRow>;

  findByFingerprint(fingerprint: string): Promise<GapRow | null>;

  findById(id: string): Promise<GapRow | null>;

  /**
   * Mark resolved if not already. Returns the current row (unchanged when
   * it was already resolved), or null for an unknown id.
   */
  markResolved(id: string, resolutionRefs: string[]): Promise<GapRow | null>;

  /**
   * Set last_enqueued_at = now if it is null or older than cooldownSeconds.
   * Returns true when this caller won the claim.
   */
  claimEnqueue(id: string, cooldownSeconds: number): Promise<boolean>;

  /** Ordered by frequency desc, then last_seen_at desc. */
  listTop(options: ListGapsOptions): Promise<GapRow[]>;

  getStats(): Promise<GapStatsRow>;
}
