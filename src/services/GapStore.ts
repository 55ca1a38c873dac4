/**
 * Deduplicated gap persistence.
 *
 * Request-path operations (upsert, findByFingerprint, claimEnqueue) never
 * throw: store failures are logged and replaced by a synthetic record or a
 * permissive default. Reporting operations propagate errors to the API layer.
 */

import type { GapConfig } from '../config.js';
import type { IGapRepository, ListGapsOptions } from '../repositories/IGapRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { GapRow } from '../types/database.js';
import type { GapRecord, GapStats, RepairRequest } from '../types/models.js';
import { NotFoundError, StoreFailure, ValidationError, describeError } from '../errors.js';

const SYNTHETIC_ID_PREFIX = 'synthetic-';

export class GapStore {
  private readonly synthetic = new WeakSet<GapRecord>();

  constructor(
    private readonly gapRepo: IGapRepository,
    private readonly config: GapConfig,
    private readonly logProvider: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  async upsert(repair: RepairRequest): Promise<GapRecord> {
    const { fingerprint } = repair;

    try {
      const row = await this.gapRepo.upsertByFingerprint({
        fingerprint,
        queryText: repair.queryText,
        vendor: repair.vendorHint,
        equipment: repair.equipmentHint,
        symptom: repair.symptomHint,
        priority: clampPriority(repair.priority),
      });
      return toGapRecord(row);
    } catch (err) {
      this.logFailure('Gap upsert failed; using synthetic record', err, {
        requestId: repair.requestId,
        fingerprint,
      });
      return this.syntheticRecord(repair, fingerprint);
    }
  }

  /** Existing record for a fingerprint, or null (also on store failure). */
  async findByFingerprint(fingerprint: string): Promise<GapRecord | null> {
    try {
      const row = await this.gapRepo.findByFingerprint(fingerprint);
      return row ? toGapRecord(row) : null;
    } catch (err) {
      this.logFailure('Gap lookup failed', err, { fingerprint });
      return null;
    }
  }

  /**
   * Claim the right to enqueue research for this record. False when another
   * caller enqueued it within the cooldown window.
   */
  async claimEnqueue(record: GapRecord): Promise<boolean> {
    if (this.isSynthetic(record)) return true;

    try {
      return await this.gapRepo.claimEnqueue(record.id, this.config.enqueueCooldownSeconds);
    } catch (err) {
      this.logFailure('Gap enqueue claim failed; enqueueing anyway', err, { gapId: record.id });
      return true;
    }
  }

  /** Idempotent: a second call returns the record resolved by the first. */
  async markResolved(id: string, resolutionRefs: string[]): Promise<GapRecord> {
    if (id.startsWith(SYNTHETIC_ID_PREFIX)) {
      throw new ValidationError('Synthetic gap records cannot be resolved');
    }

    const row = await this.gapRepo.markResolved(id, resolutionRefs);
    if (!row) throw new NotFoundError('Gap', id);
    return toGapRecord(row);
  }

  async listTop(options: ListGapsOptions): Promise<GapRecord[]> {
    const rows = await this.gapRepo.listTop(options);
    return rows.map(toGapRecord);
  }

  async getStats(): Promise<GapStats> {
    const row = await this.gapRepo.getStats();
    const total = row.total_gaps;

    return {
      totalGaps: total,
      resolvedCount: row.resolved_count,
      unresolvedCount: row.unresolved_count,
      resolutionRate: total > 0 ? (row.resolved_count / total) * 100 : 0,
      avgFrequency: row.avg_frequency ?? 0,
      avgResolutionHours: row.avg_resolution_hours,
    };
  }

  isSynthetic(record: GapRecord): boolean {
    return this.synthetic.has(record);
  }

  private syntheticRecord(repair: RepairRequest, fingerprint: string): GapRecord {
    const now = this.now();
    const record: GapRecord = {
      id: `${SYNTHETIC_ID_PREFIX}${fingerprint.slice(0, 12)}`,
      queryFingerprint: fingerprint,
      queryText: repair.queryText,
      vendor: repair.vendorHint,
      equipment: repair.equipmentHint,
      symptom: repair.symptomHint,
      frequency: 1,
      priority: clampPriority(repair.priority),
      firstSeenAt: now,
      lastSeenAt: now,
      lastEnqueuedAt: null,
      resolved: false,
      resolvedAt: null,
      resolutionRefs: [],
    };
    this.synthetic.add(record);
    return record;
  }

  private logFailure(message: string, err: unknown, fields: Record<string, unknown>): void {
    const failure = new StoreFailure(message, { cause: err });
    this.logProvider.warn(failure.message, {
      failure: failure.kind,
      ...fields,
      error: describeError(err),
    });
  }
}

export function toGapRecord(row: GapRow): GapRecord {
  return {
    id: row.id,
    queryFingerprint: row.query_fingerprint,
    queryText: row.query_text,
    vendor: row.vendor,
    equipment: row.equipment,
    symptom: row.symptom,
    frequency: row.frequency,
    priority: row.priority,
    firstSeenAt: new Date(row.first_seen_at),
    lastSeenAt: new Date(row.last_seen_at),
    lastEnqueuedAt: row.last_enqueued_at ? new Date(row.last_enqueued_at) : null,
    resolved: row.resolved,
    resolvedAt: row.resolved_at ? new Date(row.resolved_at) : null,
    resolutionRefs: row.resolution_refs ?? [],
  };
}

function clampPriority(priority: number): number {
  if (!Number.isFinite(priority)) return 0;
  return Math.min(100, Math.max(0, Math.round(priority)));
}
