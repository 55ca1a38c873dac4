/**
 * Specialist handler contract.
 * A handler turns a request plus its retrieved coverage into answer text.
 * Handlers are looked up by vendor / equipment key; 'generic' always resolves.
 */

import type { Coverage, HandlerResult, RouterRequest } from '../types/models.js';

export const GENERIC_HANDLER_KEY = 'generic';
/** Optional handler for route C; falls back to 'generic' when absent. */
export const FALLBACK_HANDLER_KEY = 'fallback';

export interface HandleOptions {
  signal?: AbortSignal;
}

export interface SpecialistHandler {
  handle(
    request: RouterRequest,
    coverage: Coverage,
    options?: HandleOptions
  ): Promise<HandlerResult>;
}
