import { describe, expect, it } from 'vitest';
import { NoCandidateError } from '../../errors/index.js';
import { createSilentLogger } from '../../logging/EngineLogger.js';
import { UnitRegistry } from '../../registry/UnitRegistry.js';
import { FixedScorer } from '../../testing/FixedScorer.js';
import { ScriptedUnit } from '../../testing/ScriptedUnit.js';
import { cosineSimilarity, HashingEmbedder, type EmbeddingProvider } from '../EmbeddingProvider.js';
import { HybridScorer, keywordScore, type IntentScorer } from '../IntentScorer.js';
import { IntentRouter } from '../IntentRouter.js';

/**
 * Embedder returning canned vectors for known texts, zeros otherwise
 */
class TableEmbedder implements EmbeddingProvider {
  readonly name = 'table';
  constructor(private readonly table: Record<string, number[]>) {}

  async embed(text: string): Promise<number[]> {
    return this.table[text] ?? [0, 0, 0];
  }
}

function registryWith(...names: string[]): UnitRegistry {
  const registry = new UnitRegistry();
  for (const name of names) {
    registry.register({ name }, new ScriptedUnit());
  }
  return registry;
}

function routerFor(registry: UnitRegistry, scorer: IntentScorer): IntentRouter {
  return new IntentRouter(registry, scorer, {}, createSilentLogger());
}

describe('IntentRouter', () => {
  it('should route directly to a confident winner', async () => {
    const router = routerFor(registryWith('security', 'network'), new FixedScorer({ security: 0.9, network: 0.7 }));

    await expect(router.route('check the firewall')).resolves.toEqual([{ unitName: 'security', score: 0.9 }]);
  });

  it('should multi-route when the winner lacks a clear margin', async () => {
    const router = routerFor(
      registryWith('security', 'network', 'cleaner'),
      new FixedScorer({ security: 0.7, network: 0.68, cleaner: 0.2 })
    );

    await expect(router.route('security and network')).resolves.toEqual([
      { unitName: 'security', score: 0.7 },
      { unitName: 'network', score: 0.68 },
    ]);
  });

  it('should multi-route on equal top scores and keep registration order', async () => {
    const router = routerFor(registryWith('beta', 'alpha'), new FixedScorer({ alpha: 0.95, beta: 0.95 }));

    const explanation = await router.explain('either');

    expect(explanation.decision).toBe('multi');
    expect(explanation.candidates.map((candidate) => candidate.unitName)).toEqual(['beta', 'alpha']);
  });

  it('should treat a margin of exactly 0.15 as direct', async () => {
    const router = routerFor(registryWith('a', 'b'), new FixedScorer({ a: 0.85, b: 0.7 }));

    await expect(router.route('x')).resolves.toEqual([{ unitName: 'a', score: 0.85 }]);
  });

  it('should drop candidates below the confidence floor', async () => {
    const router = routerFor(registryWith('a', 'b', 'c'), new FixedScorer({ a: 0.8, b: 0.6, c: 0.59 }));

    const candidates = await router.route('x');

    expect(candidates.map((candidate) => candidate.unitName)).toEqual(['a', 'b']);
  });

  it('should fail with NoCandidate when nothing reaches the floor', async () => {
    const router = routerFor(registryWith('a'), new FixedScorer({ a: 0.3 }));

    await expect(router.route('unrelated')).rejects.toBeInstanceOf(NoCandidateError);
    await expect(router.route('unrelated')).rejects.toThrowError(
      'No unit scored above 0.6 for "unrelated" (best: 0.30)'
    );
  });

  it('should fail with NoCandidate when no unit is registered', async () => {
    const router = routerFor(new UnitRegistry(), new FixedScorer({}));

    await expect(router.route('anything')).rejects.toThrowError('No unit could handle "anything"');
  });

  it('should explain every unit score without throwing', async () => {
    const router = routerFor(registryWith('a', 'b'), new FixedScorer({ a: 0.1, b: 0.2 }));

    const explanation = await router.explain('x');

    expect(explanation.decision).toBe('none');
    expect(explanation.candidates).toEqual([]);
    expect(explanation.scores.map((score) => score.unitName)).toEqual(['b', 'a']);
  });
});

describe('HybridScorer', () => {
  it('should combine 0.4 keyword and 0.6 semantic', async () => {
    const registry = new UnitRegistry();
    const security = registry.register(
      { name: 'security', description: 'audit', keywords: ['sécurité'] },
      new ScriptedUnit()
    );
    const embedder = new TableEmbedder({
      'Vérifie la sécurité': [1, 0, 0],
      'audit sécurité': [1, 0, 0],
    });

    const [score] = await new HybridScorer(embedder).score('Vérifie la sécurité', [security]);

    expect(score).toEqual({ unitName: 'security', keyword: 1, semantic: 1, combined: 1 });
  });

  it('should route a security-only request directly to the security unit', async () => {
    const registry = new UnitRegistry();
    registry.register({ name: 'security', description: 'audit', keywords: ['sécurité'] }, new ScriptedUnit());
    registry.register({ name: 'network', description: 'links', keywords: ['réseau'] }, new ScriptedUnit());
    const embedder = new TableEmbedder({
      'Vérifie la sécurité': [1, 0, 0],
      'audit sécurité': [1, 0, 0],
      'links réseau': [0, 1, 0],
    });
    const router = new IntentRouter(registry, new HybridScorer(embedder), {}, createSilentLogger());

    await expect(router.route('Vérifie la sécurité')).resolves.toEqual([{ unitName: 'security', score: 1 }]);
  });

  it('should clamp negative similarity to zero', async () => {
    const registry = new UnitRegistry();
    const spec = registry.register({ name: 'x', description: 'proto' }, new ScriptedUnit());
    const embedder = new TableEmbedder({ query: [1, 0, 0], proto: [-1, 0, 0] });

    const [score] = await new HybridScorer(embedder).score('query', [spec]);

    expect(score?.semantic).toBe(0);
    expect(score?.combined).toBe(0);
  });

  it('should score the fraction of keywords present', () => {
    const registry = new UnitRegistry();
    const spec = registry.register({ name: 'health', keywords: ['cpu', 'ram', 'disk', 'temp'] }, new ScriptedUnit());

    expect(keywordScore('CPU and RAM usage', spec)).toBe(0.5);
    expect(keywordScore('nothing', spec)).toBe(0);
  });

  it('should ignore accents on both sides when scoring keywords', () => {
    const registry = new UnitRegistry();
    const spec = registry.register({ name: 'security', keywords: ['sécurité', 'pare-feu'] }, new ScriptedUnit());

    expect(keywordScore('verifie la SECURITE', spec)).toBe(0.5);
  });
});

describe('HashingEmbedder', () => {
  it('should give identical texts identical vectors and unrelated texts low similarity', async () => {
    const embedder = new HashingEmbedder(1024);
    const a = await embedder.embed('disk space cleanup');
    const b = await embedder.embed('Disk space cleanup');
    const c = await embedder.embed('voice synthesis');

    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 10);
    expect(cosineSimilarity(a, c)).toBeLessThan(0.5);
  });
});
