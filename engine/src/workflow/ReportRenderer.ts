/**
 * Markdown rendering of workflow reports
 *
 * @module workflow
 */

import { StepStatus, type StepReport, type SynthesisReport, type WorkflowRun } from '../types/core-types.js';

const MAX_OUTPUT_CHARS = 3000;

const STATUS_ICON: Record<StepStatus, string> = {
  [StepStatus.SUCCESS]: '✅',
  [StepStatus.FAILURE]: '❌',
  [StepStatus.SKIPPED]: '⏭️',
};

/**
 * `step_03_ports.md` for the third step
 */
export function stepFileName(report: Pick<StepReport, 'stepIndex' | 'stepId'>): string {
  return `step_${String(report.stepIndex).padStart(2, '0')}_${report.stepId}.md`;
}

export function renderStepReport(report: StepReport, run: Pick<WorkflowRun, 'id' | 'title'>): string {
  const output =
    report.rawOutput.length > MAX_OUTPUT_CHARS
      ? `${report.rawOutput.slice(0, MAX_OUTPUT_CHARS)}...(truncated)`
      : report.rawOutput;

  const lines = [
    `## ${STATUS_ICON[report.status]} Step ${report.stepIndex}: \`${report.stepId}\``,
    '',
    `**Workflow**: ${run.title} (\`${run.id}\`)`,
    `**Unit**: \`${report.unit}\``,
  ];
  if (report.role) {
    lines.push(`**Role**: ${report.role}`);
  }
  lines.push(
    `**Status**: ${report.status}`,
    `**Duration**: ${(report.durationMs / 1000).toFixed(2)}s`,
    `**Timestamp**: ${report.timestamp}`
  );
  if (report.executionId) {
    lines.push(`**Execution**: \`${report.executionId}\``);
  }
  lines.push('', '### Summary', '', report.summary || '(empty)', '', '### Output', '', '```', output, '```', '');
  return lines.join('\n');
}

export function renderSynthesis(report: SynthesisReport, run: Pick<WorkflowRun, 'id' | 'title'>): string {
  return [
    `# Workflow report: ${run.title}`,
    '',
    `**ID**: \`${run.id}\``,
    `**Completion**: ${report.completion}`,
    `**Timestamp**: ${report.timestamp}`,
    '',
    '## Metrics',
    '',
    report.rawOutput,
    '',
    '## Summary',
    '',
    report.summary,
    '',
    '## Recommended actions',
    '',
    ...report.recommendations.map((recommendation) => `- ${recommendation}`),
    '',
  ].join('\n');
}

/**
 * Contents of results.json
 */
export function renderResults(run: WorkflowRun): string {
  return `${JSON.stringify(
    {
      runId: run.id,
      template: run.templateName,
      title: run.title,
      status: run.status,
      startedAt: run.startedAt,
      completedAt: run.completedAt,
      steps: run.stepReports.map((report) => ({
        stepIndex: report.stepIndex,
        stepId: report.stepId,
        unit: report.unit,
        status: report.status,
        summary: report.summary,
        durationMs: report.durationMs,
        executionId: report.executionId,
      })),
      recommendations: run.finalSynthesis?.recommendations ?? [],
    },
    null,
    2
  )}\n`;
}
