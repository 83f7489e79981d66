import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreError } from '../../errors/index.js';
import { StepStatus, type StepReport, type WorkflowRun } from '../../types/core-types.js';
import { FileReportStore, InMemoryReportStore, type ReportStore } from '../ReportStore.js';
import { buildSynthesis } from '../Synthesis.js';

const step: StepReport = {
  kind: 'step',
  stepIndex: 1,
  stepId: 'audit',
  unit: 'security_auditor',
  status: StepStatus.SUCCESS,
  summary: 'no findings',
  rawOutput: 'no findings',
  timestamp: '2026-03-02T10:00:00.000Z',
  durationMs: 250,
};

function makeRun(id: string): WorkflowRun {
  return {
    id,
    templateName: 'security_audit',
    title: 'Security audit',
    steps: [],
    stepReports: [step],
    runningContext: {
      workflow: { runId: id, template: 'security_audit', stepId: 'audit', currentStep: 1, totalSteps: 1 },
      previousResults: [],
    },
    finalSynthesis: null,
    status: 'complete',
    startedAt: '2026-03-02T10:00:00.000Z',
  };
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'conductor-reports-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const factories: Array<[string, () => ReportStore]> = [
  ['InMemoryReportStore', () => new InMemoryReportStore()],
  ['FileReportStore', () => new FileReportStore(dir)],
];

describe.each(factories)('%s', (_name, create) => {
  it('should reject a second report for the same step index', async () => {
    const store = create();
    const run = makeRun('r1');
    await store.writeReport(run, step);

    await expect(store.writeReport(run, { ...step, stepId: 'other' })).rejects.toThrow(StoreError);
  });

  it('should list runs with their files', async () => {
    const store = create();
    const run = makeRun('r1');
    await store.writeReport(run, step);
    await store.writeReport(run, buildSynthesis([step], 2, '2026-03-02T10:00:01.000Z'));
    await store.writeResults(run);

    await expect(store.listRuns()).resolves.toEqual([
      { runId: 'r1', date: '2026-03-02', files: ['results.json', 'step_01_audit.md', 'synthesis.md'] },
    ]);
    const synthesis = await store.readFile('r1', 'synthesis.md');
    expect(synthesis?.split('\n')[0]).toBe('# Workflow report: Security audit');
    await expect(store.readFile('r2', 'synthesis.md')).resolves.toBeUndefined();
  });
});

describe('FileReportStore', () => {
  it('should lay reports out by date and run id', async () => {
    const store = new FileReportStore(dir);
    await store.writeReport(makeRun('r9'), step);

    const content = await readFile(join(dir, '2026-03-02', 'r9', 'step_01_audit.md'), 'utf-8');
    expect(content.split('\n')[0]).toBe('## ✅ Step 1: `audit`');
  });

  it('should refuse to overwrite a report written by another process', async () => {
    await new FileReportStore(dir).writeReport(makeRun('r1'), step);

    await expect(new FileReportStore(dir).writeReport(makeRun('r1'), step)).rejects.toThrow(
      'Report for step 1 of run "r1" was already written'
    );
  });
});
