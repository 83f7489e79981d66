import { describe, expect, it } from 'vitest';
import { StepStatus, type StepReport } from '../../types/core-types.js';
import { buildSynthesis, completionOf, recommendationsFor } from '../Synthesis.js';

function report(stepId: string, status: StepStatus, rawOutput = 'done', durationMs = 1000): StepReport {
  return {
    kind: 'step',
    stepIndex: 1,
    stepId,
    unit: `${stepId}_unit`,
    status,
    summary: `${stepId} summary`,
    rawOutput,
    timestamp: '2026-01-15T08:00:00.000Z',
    durationMs,
  };
}

describe('Synthesis', () => {
  it('should derive completion from step statuses', () => {
    expect(completionOf([report('a', StepStatus.SUCCESS)])).toBe('complete');
    expect(completionOf([report('a', StepStatus.SUCCESS), report('b', StepStatus.SKIPPED)])).toBe('partial');
    expect(completionOf([report('a', StepStatus.FAILURE)])).toBe('failed');
  });

  it('should recommend actions from output markers and failures', () => {
    const recommendations = recommendationsFor([
      report('scan', StepStatus.SUCCESS, 'Status: 2 warnings, 1 CRITICAL finding'),
      report('ports', StepStatus.FAILURE),
    ]);

    expect(recommendations).toEqual([
      'scan (scan_unit): review the warnings it reported',
      'scan (scan_unit): critical action required',
      'ports (ports_unit): investigate the execution failure',
    ]);
  });

  it('should say when no action is needed', () => {
    expect(recommendationsFor([report('a', StepStatus.SUCCESS)])).toEqual(['No urgent action required']);
  });

  it('should cap recommendations at fifteen', () => {
    const reports = Array.from({ length: 20 }, (_, i) => report(`s${i}`, StepStatus.FAILURE));
    expect(recommendationsFor(reports)).toHaveLength(15);
  });

  it('should concatenate every step summary', () => {
    const synthesis = buildSynthesis(
      [report('a', StepStatus.SUCCESS, 'ok', 1500), report('b', StepStatus.FAILURE, 'ok', 500)],
      3,
      '2026-01-15T08:01:00.000Z'
    );

    expect(synthesis.stepIndex).toBe(3);
    expect(synthesis.completion).toBe('partial');
    expect(synthesis.summary).toBe(
      ['1/2 steps succeeded (partial).', '- a (a_unit): success: a summary', '- b (b_unit): failure: b summary'].join('\n')
    );
    expect(synthesis.rawOutput.split('\n')).toContain('| Total duration | 2.00s |');
  });
});
