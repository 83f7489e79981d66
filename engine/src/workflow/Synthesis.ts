/**
 * Final synthesis of a workflow run: every step summary plus recommendations
 * derived from step statuses and output. Never fails; a run where every step
 * failed says so.
 *
 * @module workflow
 */

import { StepStatus, type StepReport, type SynthesisCompletion, type SynthesisReport } from '../types/core-types.js';

const MAX_RECOMMENDATIONS = 15;

/**
 * Output markers and the recommendation each one triggers
 */
const OUTPUT_SIGNALS: ReadonlyArray<{ pattern: RegExp; advice: (unit: string) => string }> = [
  { pattern: /warning|⚠️/i, advice: (unit) => `${unit}: review the warnings it reported` },
  { pattern: /error|failed|❌/i, advice: (unit) => `${unit}: fix the errors it reported` },
  { pattern: /critical/i, advice: (unit) => `${unit}: critical action required` },
];

export function completionOf(reports: readonly StepReport[]): SynthesisCompletion {
  const succeeded = reports.filter((report) => report.status === StepStatus.SUCCESS).length;
  if (succeeded === reports.length) {
    return 'complete';
  }
  return succeeded === 0 ? 'failed' : 'partial';
}

export function recommendationsFor(reports: readonly StepReport[]): string[] {
  const recommendations: string[] = [];

  for (const report of reports) {
    const label = `${report.stepId} (${report.unit})`;
    if (report.status === StepStatus.SUCCESS) {
      for (const signal of OUTPUT_SIGNALS) {
        if (signal.pattern.test(report.rawOutput)) {
          recommendations.push(signal.advice(label));
        }
      }
    } else if (report.status === StepStatus.FAILURE) {
      recommendations.push(`${label}: investigate the execution failure`);
    } else {
      recommendations.push(`${label}: re-run once its dependencies succeed`);
    }
  }

  if (recommendations.length === 0) {
    return ['No urgent action required'];
  }
  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

export function buildSynthesis(
  reports: readonly StepReport[],
  stepIndex: number,
  timestamp: string
): SynthesisReport {
  const completion = completionOf(reports);
  const succeeded = reports.filter((report) => report.status === StepStatus.SUCCESS).length;
  const recommendations = recommendationsFor(reports);

  const headline =
    completion === 'failed'
      ? `All ${reports.length} steps failed; nothing was completed.`
      : `${succeeded}/${reports.length} steps succeeded (${completion}).`;
  const lines = reports.map((report) => `- ${report.stepId} (${report.unit}): ${report.status}: ${report.summary}`);
  const summary = [headline, ...lines].join('\n');

  const totalMs = reports.reduce((sum, report) => sum + report.durationMs, 0);
  const rawOutput = [
    '| Metric | Value |',
    '|--------|-------|',
    `| Steps | ${reports.length} |`,
    `| Succeeded | ${succeeded} |`,
    `| Failed | ${reports.filter((report) => report.status === StepStatus.FAILURE).length} |`,
    `| Skipped | ${reports.filter((report) => report.status === StepStatus.SKIPPED).length} |`,
    `| Total duration | ${(totalMs / 1000).toFixed(2)}s |`,
  ].join('\n');

  return {
    kind: 'synthesis',
    stepIndex,
    unit: 'synthesis',
    summary,
    rawOutput,
    recommendations,
    completion,
    timestamp,
  };
}
