import type { IntentScorer, UnitScore } from '../routing/IntentScorer.js';
import type { UnitSpec } from '../types/core-types.js';

/**
 * Scorer returning fixed combined scores per unit name; unknown units score 0
 */
export class FixedScorer implements IntentScorer {
  constructor(private readonly scores: Record<string, number>) {}

  async score(_text: string, specs: readonly UnitSpec[]): Promise<UnitScore[]> {
    return specs.map((spec) => {
      const combined = this.scores[spec.name] ?? 0;
      return { unitName: spec.name, keyword: combined, semantic: combined, combined };
    });
  }
}
