/**
 * Handler dispatch.
 * Picks a specialist handler for routes A-C from the vendor / equipment tags
 * of the matched items and runs it under a timeout. Route D never reaches a
 * handler: `escalate` builds the structured payload instead.
 */

import type { HandlerConfig } from '../config.js';
import type { HandlerRegistry } from '../handlers/HandlerRegistry.js';
import type { SpecialistHandler } from '../handlers/SpecialistHandler.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  Coverage,
  DispatchResult,
  EscalationPayload,
  Route,
  RouterRequest,
} from '../types/models.js';
import { GENERIC_HANDLER_KEY } from '../handlers/SpecialistHandler.js';
import { HandlerFailure, describeError } from '../errors.js';
import { timeoutSignal, withTimeout } from '../utils/async.js';
import { buildEscalationPayload, ESCALATION_NOTICE } from './escalation.js';
import { dominantEquipmentType, dominantVendor } from './GapDetector.js';

export type AnswerRoute = Exclude<Route, 'D'>;

export const DEGRADED_RESPONSE_TEXT =
  "I couldn't put together a full answer right now. Please try again shortly, " +
  'and include the equipment model and any fault code shown so a specialist can help.';

export interface Escalation {
  text: string;
  payload: EscalationPayload;
}

export class HandlerDispatcher {
  constructor(
    private readonly registry: HandlerRegistry,
    private readonly config: HandlerConfig,
    private readonly logProvider: ILogProvider
  ) {}

  async dispatch(
    route: AnswerRoute,
    request: RouterRequest,
    coverage: Coverage,
    signal?: AbortSignal
  ): Promise<DispatchResult> {
    const { key, handler } = this.selectHandler(route, coverage);
    return this.invoke(key, handler, request, coverage, signal);
  }

  /** Fixed notice plus payload; no handler is consulted. */
  escalate(request: RouterRequest, coverage: Coverage, reason: string): Escalation {
    return {
      text: ESCALATION_NOTICE,
      payload: buildEscalationPayload(request, coverage, reason),
    };
  }

  /**
   * A/B: dominant vendor if registered, else dominant equipment type if
   * registered, else generic. C: fallback handler.
   */
  selectHandler(route: AnswerRoute, coverage: Coverage): { key: string; handler: SpecialistHandler } {
    if (route === 'C') return this.registry.resolveFallback();

    const vendor = dominantVendor(coverage.matchedItems);
    if (vendor && this.registry.has(vendor)) return this.registry.resolve(vendor);

    const equipment = dominantEquipmentType(coverage.matchedItems);
    if (equipment && this.registry.has(equipment)) return this.registry.resolve(equipment);

    return this.registry.resolve(GENERIC_HANDLER_KEY);
  }

  private async invoke(
    key: string,
    handler: SpecialistHandler,
    request: RouterRequest,
    coverage: Coverage,
    signal?: AbortSignal
  ): Promise<DispatchResult> {
    const { timeoutMs } = this.config;

    try {
      const result = await withTimeout(
        handler.handle(request, coverage, { signal: timeoutSignal(timeoutMs, signal) }),
        timeoutMs,
        { context: `handler ${key}`, signal }
      );
      return { ...result, handlerKey: key, degraded: false };
    } catch (err) {
      const failure = new HandlerFailure(`Handler ${key} failed for request ${request.id}`, {
        cause: err,
      });
      this.logProvider.warn(failure.message, {
        failure: failure.kind,
        requestId: request.id,
        handler: key,
        error: describeError(err),
      });
      return {
        text: DEGRADED_RESPONSE_TEXT,
        citations: [],
        confidence: 0,
        handlerKey: key,
        degraded: true,
      };
    }
  }
}
