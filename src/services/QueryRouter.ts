/**
 * Query router façade.
 *
 *   evaluate → decide → (D: escalate) → dispatch → envelope
 *
 * When the decision calls for repair, detect → upsert → claim → enqueue runs
 * as a background task after the envelope is built. The task is not tied to
 * the caller's signal, so a cancelled request still repairs its gap.
 */

import type { ILogProvider, RouteLogEvent } from '../providers/ILogProvider.js';
import type { Coverage, ResponseEnvelope, RouteDecision, RouterRequest } from '../types/models.js';
import type { CoverageEvaluator } from './CoverageEvaluator.js';
import type { GapDetector } from './GapDetector.js';
import type { GapStore } from './GapStore.js';
import type { HandlerDispatcher } from './HandlerDispatcher.js';
import type { ResearchTrigger } from './ResearchTrigger.js';
import type { RouteDecisionEngine } from './RouteDecisionEngine.js';
import { RequestCancelledError, ValidationError, describeError } from '../errors.js';

export interface QueryRouterDeps {
  evaluator: CoverageEvaluator;
  engine: RouteDecisionEngine;
  dispatcher: HandlerDispatcher;
  detector: GapDetector;
  gapStore: GapStore;
  trigger: ResearchTrigger;
  logProvider: ILogProvider;
}

export interface RouteOptions {
  /** Caller cancellation. Aborting rejects with RequestCancelledError. */
  signal?: AbortSignal;
}

export class QueryRouter {
  private readonly tasks = new Set<Promise<void>>();

  constructor(private readonly deps: QueryRouterDeps) {}

  /** Background repair tasks not yet settled. */
  get pendingTasks(): number {
    return this.tasks.size;
  }

  async route(request: RouterRequest, options?: RouteOptions): Promise<ResponseEnvelope> {
    if (!request.text || request.text.trim().length === 0) {
      throw new ValidationError('Request text is required');
    }

    const signal = options?.signal;
    const start = performance.now();
    throwIfCancelled(request, signal);

    const coverage = await this.deps.evaluator.evaluate(request, signal);
    throwIfCancelled(request, signal);

    const decision = this.deps.engine.decide(coverage, request);

    if (decision.route === 'D') {
      const escalation = this.deps.dispatcher.escalate(request, coverage, decision.reason);
      const envelope: ResponseEnvelope = {
        requestId: request.id,
        route: 'D',
        coverageLevel: coverage.level,
        confidence: coverage.confidence,
        text: escalation.text,
        citations: [],
        escalated: true,
        degraded: coverage.degraded,
        handler: null,
        escalation: escalation.payload,
      };
      this.logDecision(envelope, coverage, start);
      return envelope;
    }

    const result = await this.deps.dispatcher.dispatch(decision.route, request, coverage, signal);

    if (decision.triggersRepair) {
      this.scheduleRepair(request, decision);
    }
    throwIfCancelled(request, signal);

    const envelope: ResponseEnvelope = {
      requestId: request.id,
      route: decision.route,
      coverageLevel: coverage.level,
      confidence: coverage.confidence,
      text: result.text,
      citations: result.citations,
      escalated: false,
      degraded: coverage.degraded || result.degraded,
      handler: result.handlerKey,
    };
    this.logDecision(envelope, coverage, start);
    return envelope;
  }

  /** Resolves once every scheduled repair task has settled. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  private scheduleRepair(request: RouterRequest, decision: RouteDecision): void {
    const task = Promise.resolve()
      .then(() => this.repair(request, decision.coverage))
      .catch((err: unknown) => {
        this.deps.logProvider.error('Gap pipeline failed', {
          requestId: request.id,
          error: describeError(err),
        });
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  /** Upsert happens-before enqueue; the claim suppresses duplicate enqueues. */
  private async repair(request: RouterRequest, coverage: Coverage): Promise<void> {
    const { detector, gapStore, trigger, logProvider } = this.deps;

    const repair = await detector.detect(request, coverage);
    const record = await gapStore.upsert(repair);

    const claimed = await gapStore.claimEnqueue(record);
    if (!claimed) {
      logProvider.debug('Research already queued for gap', {
        gapId: record.id,
        requestId: request.id,
        frequency: record.frequency,
      });
      return;
    }

    await trigger.enqueue(repair, record.id);
  }

  private logDecision(envelope: ResponseEnvelope, coverage: Coverage, start: number): void {
    const durationMs = Math.round(performance.now() - start);
    const event: RouteLogEvent = {
      level: envelope.degraded ? 'warn' : 'info',
      message: `route ${envelope.route} (${envelope.coverageLevel}, ${envelope.confidence.toFixed(2)})`,
      requestId: envelope.requestId,
      route: envelope.route,
      coverageLevel: envelope.coverageLevel,
      confidence: envelope.confidence,
      itemCount: coverage.itemCount,
      handler: envelope.handler,
      durationMs,
    };
    this.deps.logProvider.log(event);
  }
}

function throwIfCancelled(request: RouterRequest, signal?: AbortSignal): void {
  if (signal?.aborted) throw new RequestCancelledError(request.id);
}
