import type { Coverage, RouteDecision, RouterRequest } from '../types/models.js';

/**
 * Maps (coverage level, escalation flag) to one of four routes.
 * Pure: no I/O, no clock, no state.
 *
 *   level     | no flag      | flag
 *   strong    | A            | D
 *   moderate  | B            | D
 *   thin      | B + repair   | D
 *   none      | C + repair   | D
 */
export class RouteDecisionEngine {
  decide(coverage: Coverage, request: RouterRequest): RouteDecision {
    const flag = request.escalation ?? 'none';

    if (flag !== 'none') {
      return {
        route: 'D',
        coverage,
        reason: `Escalation flag "${flag}" overrides ${coverage.level} coverage`,
        triggersRepair: false,
      };
    }

    const level = coverage.level;
    switch (level) {
      case 'strong':
        return {
          route: 'A',
          coverage,
          reason: 'Strong coverage: direct answer',
          triggersRepair: false,
        };
      case 'moderate':
        return {
          route: 'B',
          coverage,
          reason: 'Moderate coverage: answer with specialist enrichment',
          triggersRepair: false,
        };
      case 'thin':
        return {
          route: 'B',
          coverage,
          reason: 'Thin coverage: answer and repair knowledge gap',
          triggersRepair: true,
        };
      case 'none':
        return {
          route: 'C',
          coverage,
          reason: coverage.degraded
            ? 'Retrieval unavailable: fallback answer and repair knowledge gap'
            : 'No coverage: fallback answer and repair knowledge gap',
          triggersRepair: true,
        };
      default: {
        const unreachable: never = level;
        throw new Error(`Unhandled coverage level: ${String(unreachable)}`);
      }
    }
  }
}
