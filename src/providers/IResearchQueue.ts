/**
 * Research queue interface.
 * Hand-off point to the external ingestion pipeline. `send` resolves once the
 * message is accepted by the queue, not once it has been processed.
 */

import type { ResearchMessage } from '../types/database.js';

export interface IResearchQueue {
  send(message: ResearchMessage): Promise<void>;
}
