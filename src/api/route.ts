/**
 * Routing endpoint.
 * POST /api/v1/route: route a maintenance request (no auth; front-end adapters call this)
 */

import { randomUUID } from 'node:crypto';
import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { RouteQueryResponse } from '../types/api.js';
import type {
  AttachmentText,
  Channel,
  EscalationFlag,
  ResponseEnvelope,
  RouterRequest,
} from '../types/models.js';
import { CHANNELS, ESCALATION_FLAGS } from '../types/models.js';
import { ValidationError } from '../errors.js';

const MAX_TEXT_LENGTH = 4000;
const MAX_ATTACHMENTS = 5;
const ATTACHMENT_KINDS: readonly AttachmentText['kind'][] = ['image', 'audio', 'document'];

const routeSchema: BodySchema = {
  text: { type: 'string', required: true, maxLength: MAX_TEXT_LENGTH },
  channel: { type: 'string', required: false, enum: CHANNELS },
  userId: { type: 'string', required: false, maxLength: 200 },
  attachments: { type: 'array', required: false, maxItems: MAX_ATTACHMENTS },
  escalation: { type: 'string', required: false, enum: ESCALATION_FLAGS },
};

export function createRouteHandlers(container: Container) {
  const route: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    validateBody(routeSchema)
  )(async (req, _ctx) => {
    const body: unknown = await req.json();
    const request = toRouterRequest(body);

    const envelope = await container.queryRouter.route(request, { signal: req.signal });

    return new Response(JSON.stringify(toRouteQueryResponse(envelope)), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { route };
}

/** Build a RouterRequest from a body that already passed the schema. */
export function toRouterRequest(
  body: unknown,
  id: string = randomUUID(),
  receivedAt: Date = new Date()
): RouterRequest {
  if (!isRecord(body) || typeof body.text !== 'string') {
    throw new ValidationError('text is required');
  }

  return {
    id,
    text: body.text,
    channel: pick(body.channel, CHANNELS, 'api'),
    attachments: parseAttachments(body.attachments),
    userId: typeof body.userId === 'string' && body.userId ? body.userId : 'anonymous',
    receivedAt,
    escalation: pick(body.escalation, ESCALATION_FLAGS, 'none'),
  };
}

export function toRouteQueryResponse(envelope: ResponseEnvelope): RouteQueryResponse {
  return {
    request_id: envelope.requestId,
    route: envelope.route,
    coverage_level: envelope.coverageLevel,
    confidence: Math.round(envelope.confidence * 1000) / 1000,
    text: envelope.text,
    citations: envelope.citations,
    escalated: envelope.escalated,
    degraded: envelope.degraded,
    handler: envelope.handler,
    ...(envelope.escalation ? { escalation: envelope.escalation } : {}),
  };
}

function parseAttachments(value: unknown): AttachmentText[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new ValidationError('attachments must be an array');

  return value.map((item: unknown, i) => {
    if (
      !isRecord(item) ||
      typeof item.text !== 'string' ||
      typeof item.kind !== 'string'
    ) {
      throw new ValidationError(`attachments[${i}] must have string kind and text`);
    }
    const kind = ATTACHMENT_KINDS.find((k) => k === item.kind);
    if (!kind) {
      throw new ValidationError(
        `attachments[${i}].kind must be one of: ${ATTACHMENT_KINDS.join(', ')}`
      );
    }
    return { kind, text: item.text.slice(0, MAX_TEXT_LENGTH) };
  });
}

function pick<T extends Channel | EscalationFlag>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((a) => a === value) ?? fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
