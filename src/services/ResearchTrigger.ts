/**
 * Research trigger.
 * Hands a repair request to the research queue. Only the handoff is awaited;
 * processing happens in the external ingestion pipeline.
 */

import type { IResearchQueue } from '../providers/IResearchQueue.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ResearchMessage } from '../types/database.js';
import type { RepairRequest } from '../types/models.js';
import { EnqueueFailure, describeError } from '../errors.js';

export class ResearchTrigger {
  constructor(
    private readonly queue: IResearchQueue,
    private readonly logProvider: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** True when the message was handed off; false (logged) when the queue refused it. */
  async enqueue(repair: RepairRequest, gapId: string): Promise<boolean> {
    const message = toResearchMessage(repair, gapId, this.now());

    try {
      await this.queue.send(message);
    } catch (err) {
      const failure = new EnqueueFailure(`Research enqueue failed for gap ${gapId}`, {
        cause: err,
      });
      this.logProvider.warn(failure.message, {
        failure: failure.kind,
        gapId,
        requestId: repair.requestId,
        error: describeError(err),
      });
      return false;
    }

    this.logProvider.info('Research enqueued', {
      gapId,
      requestId: repair.requestId,
      priority: message.priority,
      terms: message.search_terms.length,
    });
    return true;
  }
}

export function toResearchMessage(repair: RepairRequest, gapId: string, now: Date): ResearchMessage {
  return {
    gap_id: gapId,
    search_terms: [...repair.searchTerms],
    sources: [...repair.sources],
    priority: repair.priority,
    vendor_hint: repair.vendorHint,
    equipment_hint: repair.equipmentHint,
    query_text: repair.queryText,
    enqueued_at: now.toISOString(),
  };
}
