/**
 * Intent scoring
 *
 * A scorer rates every registered unit against a request. The router only
 * sorts, thresholds and decides direct vs multi routing on top of it.
 *
 * @module routing
 */

import { foldText } from '../registry/UnitRegistry.js';
import type { UnitSpec } from '../types/core-types.js';
import { cosineSimilarity, HashingEmbedder, type EmbeddingProvider } from './EmbeddingProvider.js';

export interface UnitScore {
  unitName: string;
  /** Fraction of the unit's keywords present in the request */
  keyword: number;
  /** Cosine similarity to the unit's prototype text, clamped to [0, 1] */
  semantic: number;
  combined: number;
}

export interface IntentScorer {
  /**
   * One score per spec, in the order given
   */
  score(text: string, specs: readonly UnitSpec[]): Promise<UnitScore[]>;
}

export interface HybridScorerOptions {
  keywordWeight?: number;
  semanticWeight?: number;
}

/**
 * Fraction of the unit's keywords that occur in the text, ignoring case and accents
 */
export function keywordScore(text: string, spec: UnitSpec): number {
  if (spec.keywords.length === 0) {
    return 0;
  }
  const haystack = foldText(text);
  let hits = 0;
  for (const keyword of spec.keywords) {
    if (haystack.includes(foldText(keyword))) {
      hits++;
    }
  }
  return hits / spec.keywords.length;
}

/**
 * Text a unit is compared against: its description plus its keywords
 */
export function prototypeText(spec: UnitSpec): string {
  return [spec.description, ...spec.keywords].filter(Boolean).join(' ');
}

/**
 * keyword * 0.4 + semantic * 0.6 by default
 */
export class HybridScorer implements IntentScorer {
  private readonly keywordWeight: number;
  private readonly semanticWeight: number;
  private readonly prototypes = new Map<string, { text: string; vector: Promise<number[]> }>();

  constructor(
    private readonly embedder: EmbeddingProvider = new HashingEmbedder(),
    options: HybridScorerOptions = {}
  ) {
    this.keywordWeight = options.keywordWeight ?? 0.4;
    this.semanticWeight = options.semanticWeight ?? 0.6;
  }

  async score(text: string, specs: readonly UnitSpec[]): Promise<UnitScore[]> {
    const query = await this.embedder.embed(text);

    return Promise.all(
      specs.map(async (spec) => {
        const keyword = keywordScore(text, spec);
        const semantic = clamp01(cosineSimilarity(query, await this.prototypeFor(spec)));
        return {
          unitName: spec.name,
          keyword,
          semantic,
          combined: clamp01(this.keywordWeight * keyword + this.semanticWeight * semantic),
        };
      })
    );
  }

  private prototypeFor(spec: UnitSpec): Promise<number[]> {
    const text = prototypeText(spec);
    const cached = this.prototypes.get(spec.name);
    // Re-embed when a unit name is reused with a different spec
    if (cached && cached.text === text) {
      return cached.vector;
    }
    const vector = this.embedder.embed(text);
    this.prototypes.set(spec.name, { text, vector });
    void vector.catch(() => this.prototypes.delete(spec.name));
    return vector;
  }
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
