import type { SpecialistHandler } from './SpecialistHandler.js';
import { FALLBACK_HANDLER_KEY, GENERIC_HANDLER_KEY } from './SpecialistHandler.js';

/**
 * Handlers keyed by lowercased vendor or equipment-type key.
 * Constructed with the generic handler so lookups always resolve.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, SpecialistHandler>();

  constructor(generic: SpecialistHandler) {
    this.handlers.set(GENERIC_HANDLER_KEY, generic);
  }

  register(key: string, handler: SpecialistHandler): this {
    const normalized = normalizeKey(key);
    if (!normalized) throw new Error('Handler key must not be empty');
    this.handlers.set(normalized, handler);
    return this;
  }

  has(key: string): boolean {
    return this.handlers.has(normalizeKey(key));
  }

  /** Handler for `key`, or the generic handler. */
  resolve(key: string): { key: string; handler: SpecialistHandler } {
    const normalized = normalizeKey(key);
    const handler = this.handlers.get(normalized);
    if (handler) return { key: normalized, handler };
    return { key: GENERIC_HANDLER_KEY, handler: this.generic };
  }

  /** Route C handler: 'fallback' when registered, else generic. */
  resolveFallback(): { key: string; handler: SpecialistHandler } {
    return this.resolve(FALLBACK_HANDLER_KEY);
  }

  keys(): string[] {
    return [...this.handlers.keys()];
  }

  private get generic(): SpecialistHandler {
    const handler = this.handlers.get(GENERIC_HANDLER_KEY);
    if (!handler) throw new Error('Generic handler missing from registry');
    return handler;
  }
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}
