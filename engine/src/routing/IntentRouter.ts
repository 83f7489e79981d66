/**
 * Intent Router
 *
 * Maps a request to ranked unit candidates and decides between a direct
 * route (one confident winner) and a multi-route (every qualifying unit).
 *
 * @module routing
 */

import { NoCandidateError } from '../errors/index.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { UnitRegistry } from '../registry/UnitRegistry.js';
import type { Candidate } from '../types/core-types.js';
import { HybridScorer, type IntentScorer, type UnitScore } from './IntentScorer.js';

export interface RouterOptions {
  /** Candidates below this are dropped (default 0.6) */
  confidenceFloor?: number;
  /** Top score needed for a direct route (default 0.85) */
  directThreshold?: number;
  /** Lead over the runner-up needed for a direct route (default 0.15) */
  directMargin?: number;
}

export type RouteDecision = 'direct' | 'multi' | 'none';

export interface RoutingExplanation {
  request: string;
  /** Every registered unit, best first */
  scores: UnitScore[];
  candidates: Candidate[];
  decision: RouteDecision;
  confidenceFloor: number;
}

const EPSILON = 1e-9;

export class IntentRouter {
  private readonly confidenceFloor: number;
  private readonly directThreshold: number;
  private readonly directMargin: number;
  private readonly logger: EngineLogger;

  constructor(
    private readonly registry: UnitRegistry,
    private readonly scorer: IntentScorer = new HybridScorer(),
    options: RouterOptions = {},
    logger?: EngineLogger
  ) {
    this.confidenceFloor = options.confidenceFloor ?? 0.6;
    this.directThreshold = options.directThreshold ?? 0.85;
    this.directMargin = options.directMargin ?? 0.15;
    this.logger = (logger ?? LoggerManager.getLogger()).child('IntentRouter');
  }

  /**
   * Ranked candidates for a request
   *
   * @throws {NoCandidateError} when no unit reaches the confidence floor
   */
  async route(text: string): Promise<Candidate[]> {
    const explanation = await this.explain(text);

    if (explanation.decision === 'none') {
      throw new NoCandidateError(text, this.confidenceFloor, explanation.scores[0]?.combined);
    }

    this.logger.record({
      unit: 'router',
      status: 'info',
      message: `${explanation.decision} route to ${explanation.candidates.map((c) => c.unitName).join(', ')}`,
      context: { candidates: explanation.candidates },
    });
    return explanation.candidates;
  }

  /**
   * Raw scores for every unit plus the routing decision; never throws on
   * an unroutable request
   */
  async explain(text: string): Promise<RoutingExplanation> {
    const specs = this.registry.specs();
    const scores = await this.scorer.score(text, specs);

    // Array.prototype.sort is stable, so ties keep registration order
    const ranked = [...scores].sort((a, b) => b.combined - a.combined);
    const qualifying = ranked.filter((score) => score.combined + EPSILON >= this.confidenceFloor);

    let decision: RouteDecision;
    let candidates: Candidate[];
    const top = qualifying[0];

    if (!top) {
      decision = 'none';
      candidates = [];
    } else {
      const runnerUp = ranked[1]?.combined ?? 0;
      const direct =
        top.combined + EPSILON >= this.directThreshold &&
        top.combined - runnerUp + EPSILON >= this.directMargin;

      decision = direct ? 'direct' : 'multi';
      candidates = (direct ? [top] : qualifying).map((score) => ({
        unitName: score.unitName,
        score: score.combined,
      }));
    }

    return {
      request: text,
      scores: ranked,
      candidates,
      decision,
      confidenceFloor: this.confidenceFloor,
    };
  }
}
