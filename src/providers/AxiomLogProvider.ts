/**
 * Axiom log provider.
 * Buffers events and sends them in batches to Axiom's ingest API.
 * Flush failures keep the batch for the next attempt, up to maxBufferSize;
 * beyond that the oldest events are dropped. Disabled when apiToken is empty.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { LOG_LEVEL_ORDER } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Axiom API token (Bearer). Empty string disables sending. */
  apiToken: string;
  /** Axiom dataset name. */
  dataset: string;
  /** Stamped on every event as `service`. Default: 'coverage-router'. */
  service?: string;
  /** Drop events below this level. Default: 'info'. */
  minLevel?: LogLevel;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Upper bound on retained events while Axiom is unreachable. Default: 1000. */
  maxBufferSize?: number;
}

const AXIOM_INGEST_URL = 'https://api.axiom.co/v1/datasets';

interface AxiomEvent extends LogEvent {
  service: string;
}

export class AxiomLogProvider implements ILogProvider {
  private buffer: AxiomEvent[] = [];
  private readonly apiToken: string;
  private readonly dataset: string;
  private readonly service: string;
  private readonly minLevel: LogLevel;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly maxBufferSize: number;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;

  constructor(options: AxiomLogProviderOptions) {
    this.apiToken = options.apiToken;
    this.dataset = options.dataset;
    this.service = options.service ?? 'coverage-router';
    this.minLevel = options.minLevel ?? 'info';
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.maxBufferSize = options.maxBufferSize ?? 1000;
    this.enabled = Boolean(this.apiToken);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  /** Events waiting to be sent. */
  get pending(): number {
    return this.buffer.length;
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;
    if (LOG_LEVEL_ORDER[event.level] < LOG_LEVEL_ORDER[this.minLevel]) return;

    this.buffer.push({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      service: this.service,
    });

    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.splice(0, this.buffer.length - this.maxBufferSize);
    }

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.enabled || this.buffer.length === 0) return;

    const batch = [...this.buffer];

    try {
      const response = await fetch(
        `${AXIOM_INGEST_URL}/${this.dataset}/ingest`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiToken}`,
          },
          body: JSON.stringify(batch),
        }
      );

      if (response.ok) {
        // Events logged during the request stay buffered
        this.buffer = this.buffer.filter((e) => !batch.includes(e));
      }
      // Non-ok response: retain events for retry on next flush
    } catch {
      // Network error: retain events for retry on next flush
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }
}
