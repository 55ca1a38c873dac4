/**
 * Gap reporting endpoints (admin key required).
 * GET  /api/v1/gaps               most frequent gaps
 * GET  /api/v1/gaps/stats         gap statistics
 * POST /api/v1/gaps/:id/resolve   mark a gap resolved by new knowledge items
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { GapListResponse, GapResponse } from '../types/api.js';
import type { GapRecord } from '../types/models.js';
import { ValidationError } from '../errors.js';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

const resolveSchema: BodySchema = {
  resolutionRefs: { type: 'array', required: true, maxItems: 50 },
};

export function createGapHandlers(container: Container) {
  const list: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, _ctx) => {
    const params = new URL(req.url).searchParams;
    const limit = intParam(params, 'limit', DEFAULT_LIMIT, 1, MAX_LIMIT);
    const offset = intParam(params, 'offset', 0, 0, Number.MAX_SAFE_INTEGER);
    const resolved = resolvedParam(params.get('resolved'));

    const gaps = await container.gapStore.listTop({ limit, offset, resolved });
    const body: GapListResponse = { gaps: gaps.map(toGapResponse), limit, offset };

    return new Response(JSON.stringify(body), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const stats: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (_req, _ctx) => {
    const result = await container.gapStore.getStats();

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const resolve: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.bodyLimit,
    validateBody(resolveSchema)
  )(async (req, _ctx) => {
    const parts = new URL(req.url).pathname.split('/').filter(Boolean);
    const id = decodeURIComponent(parts[parts.length - 2] ?? '');

    const body: unknown = await req.json();
    const refs = parseRefs(body);

    const record = await container.gapStore.markResolved(id, refs);

    return new Response(JSON.stringify(toGapResponse(record)), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { list, stats, resolve };
}

export function toGapResponse(record: GapRecord): GapResponse {
  return {
    id: record.id,
    queryText: record.queryText,
    vendor: record.vendor,
    equipment: record.equipment,
    symptom: record.symptom,
    frequency: record.frequency,
    priority: record.priority,
    firstSeenAt: record.firstSeenAt.toISOString(),
    lastSeenAt: record.lastSeenAt.toISOString(),
    resolved: record.resolved,
    resolvedAt: record.resolvedAt ? record.resolvedAt.toISOString() : null,
    resolutionRefs: record.resolutionRefs,
  };
}

function intParam(
  params: URLSearchParams,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = params.get(name);
  if (raw === null || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}`);
  }
  return value;
}

/** Unresolved by default; 'all' lifts the filter. */
function resolvedParam(raw: string | null): boolean | undefined {
  switch (raw) {
    case null:
    case '':
    case 'false':
      return false;
    case 'true':
      return true;
    case 'all':
      return undefined;
    default:
      throw new ValidationError('resolved must be one of: true, false, all');
  }
}

function parseRefs(body: unknown): string[] {
  const refs =
    typeof body === 'object' && body !== null && 'resolutionRefs' in body
      ? body.resolutionRefs
      : undefined;

  if (!Array.isArray(refs) || !refs.every((r): r is string => typeof r === 'string' && r.length > 0)) {
    throw new ValidationError('resolutionRefs must be an array of non-empty strings');
  }
  return refs;
}
