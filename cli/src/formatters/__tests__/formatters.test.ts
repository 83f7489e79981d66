import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import {
  ConfigError,
  ExecutionState,
  FailureKind,
  StepMode,
  StepStatus,
  type Execution,
  type RoutingExplanation,
  type WorkflowRun,
} from '@conductor/engine';
import { CliEventType, type InvocationRetryingEvent } from '../../types/CliEvent.js';
import { createFormatter } from '../createFormatter.js';
import { HumanFormatter } from '../HumanFormatter.js';
import { JsonFormatter } from '../JsonFormatter.js';
import { NullFormatter } from '../NullFormatter.js';

type ConsoleSpy = MockInstance<typeof console.log>;

let log: ConsoleSpy;
let error: ConsoleSpy;

function lines(spy: ConsoleSpy): string[] {
  return spy.mock.calls.map((args) => args.map(String).join(' '));
}

function jsonLines(spy: ConsoleSpy): unknown[] {
  return lines(spy).map((line) => JSON.parse(line));
}

beforeEach(() => {
  log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

const execution: Execution = {
  id: 'e1',
  request: { text: 'scan', mode: 'parallel' },
  state: ExecutionState.COMPLETED,
  candidates: [
    { unitName: 'security', score: 0.9 },
    { unitName: 'network', score: 0.7 },
  ],
  invocations: [],
  checkpoint: { state: ExecutionState.COMPLETED, lastCompletedStepIndex: 1, partialResults: [] },
  aggregate: {
    allFailed: false,
    successCount: 1,
    failureCount: 1,
    entries: [
      { index: 0, unitName: 'security', status: 'success', resolvedBy: 'security', summary: 'no issues', data: {} },
      {
        index: 1,
        unitName: 'network',
        status: 'failure',
        note: { kind: FailureKind.FATAL, message: 'unreachable', fallbacksTried: ['backup'] },
      },
    ],
    text: '[security] no issues\n[network] Fatal: unreachable',
  },
  transitions: [],
  createdAt: 1000,
  updatedAt: 3500,
};

const explanation: RoutingExplanation = {
  request: 'check disk',
  scores: [
    { unitName: 'disk', keyword: 1, semantic: 0.5, combined: 0.7 },
    { unitName: 'net', keyword: 0, semantic: 0.2, combined: 0.12 },
  ],
  candidates: [{ unitName: 'disk', score: 0.7 }],
  decision: 'direct',
  confidenceFloor: 0.6,
};

const run: WorkflowRun = {
  id: 'run1',
  templateName: 'maintenance',
  title: 'Maintenance',
  steps: [
    { id: 'a', unit: 'health', args: {}, mode: StepMode.SEQUENTIAL, dependsOn: [] },
    { id: 'b', unit: 'clean', args: {}, mode: StepMode.SEQUENTIAL, dependsOn: ['a'] },
  ],
  stepReports: [
    {
      kind: 'step',
      stepIndex: 1,
      stepId: 'a',
      unit: 'health',
      status: StepStatus.FAILURE,
      summary: 'ping failed\nexit 2',
      rawOutput: 'ping failed',
      timestamp: '2026-01-15T08:00:00.000Z',
      durationMs: 1500,
    },
    {
      kind: 'step',
      stepIndex: 2,
      stepId: 'b',
      unit: 'clean',
      status: StepStatus.SKIPPED,
      summary: 'Skipped: dependency "a" did not succeed',
      rawOutput: '',
      timestamp: '2026-01-15T08:00:01.500Z',
      durationMs: 0,
    },
  ],
  runningContext: {
    workflow: { runId: 'run1', template: 'maintenance', stepId: 'b', currentStep: 2, totalSteps: 2 },
    previousResults: [],
  },
  finalSynthesis: {
    kind: 'synthesis',
    stepIndex: 3,
    unit: 'synthesis',
    summary: 'All 2 steps failed; nothing was completed.',
    rawOutput: '',
    recommendations: ['a (health): investigate the execution failure'],
    completion: 'failed',
    timestamp: '2026-01-15T08:00:02.000Z',
  },
  status: 'failed',
  startedAt: '2026-01-15T08:00:00.000Z',
};

describe('createFormatter', () => {
  it('should build the formatter for each type', () => {
    expect(createFormatter('human', { noColor: true })).toBeInstanceOf(HumanFormatter);
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('null')).toBeInstanceOf(NullFormatter);
  });
});

describe('HumanFormatter', () => {
  it('should list each candidate outcome and a summary block', () => {
    new HumanFormatter({ noColor: true }).showExecution(execution);

    const output = lines(log);
    expect(output).toContain('⚠ Completed with failures');
    expect(output).toContain('  ✔ security no issues');
    expect(output).toContain('  ✖ network Fatal: unreachable');
    expect(output).toContain('      fallbacks tried: backup');
    expect(output).toContain('  Candidates:  security, network');
    expect(output).toContain('  Duration:    2.50s');
  });

  it('should mark routed candidates in the score table', () => {
    new HumanFormatter({ noColor: true }).showRouting(explanation);

    expect(lines(log).slice(1)).toEqual([
      'Routing "check disk"',
      'decision: direct, floor 0.60',
      '─'.repeat(60),
      '   unit  keyword  semantic  combined',
      '✔  disk  1.000    0.500     0.700',
      '   net   0.000    0.200     0.120',
    ]);
  });

  it('should show steps, recommendations and the step count of a workflow run', () => {
    new HumanFormatter({ noColor: true }).showWorkflowRun(run);

    const output = lines(log);
    expect(output).toContain('✖ Maintenance failed');
    expect(output).toContain('  ✖ 1. a (health, 1.50s)');
    expect(output).toContain('      ping failed');
    expect(output).toContain('  ⊘ 2. b (clean, 0ms)');
    expect(output).toContain('  • a (health): investigate the execution failure');
    expect(output).toContain('  Steps:    0/2 succeeded');
  });

  it('should align table columns and note an empty table', () => {
    const formatter = new HumanFormatter({ noColor: true });
    formatter.showTable('Units', [
      ['name', 'team'],
      ['health', 'core'],
    ]);
    formatter.showTable('Circuits', [['unit', 'state']]);

    expect(lines(log)).toEqual(['Units', '  name    team', '  health  core', 'Circuits', '  (none)']);
  });

  it('should print progress events unless silent', () => {
    const event: InvocationRetryingEvent = {
      type: CliEventType.INVOCATION_RETRYING,
      timestamp: new Date(0),
      unit: 'net',
      attempt: 1,
      maxAttempts: 3,
      delayMs: 200,
      detail: 'timeout',
    };

    new HumanFormatter({ noColor: true, silent: true }).onEvent(event);
    expect(log).not.toHaveBeenCalled();

    new HumanFormatter({ noColor: true }).onEvent(event);
    expect(lines(log)).toEqual(['  ↻ net: retrying (1/3) after 200ms timeout']);
  });

  it('should show the code, path and hint of an engine error', () => {
    new HumanFormatter({ noColor: true }).showError(
      ConfigError.invalid('router.confidenceFloor must be at most 1', 'router.confidenceFloor', 'Use a value in [0, 1]')
    );

    expect(lines(error)).toEqual([
      '',
      '✖ ConfigError [CND-C-001]: router.confidenceFloor must be at most 1',
      '  at router.confidenceFloor',
      '',
      '💡 Hint: Use a value in [0, 1]',
    ]);
  });
});

describe('JsonFormatter', () => {
  it('should print one object per event with an ISO timestamp', () => {
    new JsonFormatter().onEvent({
      type: CliEventType.WORKFLOW_STARTED,
      timestamp: new Date(Date.UTC(2026, 0, 15, 8)),
      runId: 'run1',
      template: 'maintenance',
    });

    expect(jsonLines(log)).toEqual([
      { type: 'workflow.started', runId: 'run1', template: 'maintenance', timestamp: '2026-01-15T08:00:00.000Z' },
    ]);
  });

  it('should key table rows by the header', () => {
    new JsonFormatter().showTable('Units', [
      ['name', 'team'],
      ['health', 'core'],
    ]);

    expect(jsonLines(log)).toEqual([{ type: 'table', title: 'Units', rows: [{ name: 'health', team: 'core' }] }]);
  });

  it('should write engine errors to stderr with their exit code', () => {
    new JsonFormatter().showError(ConfigError.invalid('bad level', 'logLevel'));

    expect(log).not.toHaveBeenCalled();
    expect(jsonLines(error)[0]).toMatchObject({
      type: 'error',
      error: { name: 'ConfigError', code: 'CND-C-001', exitCode: 103, message: 'bad level', path: 'logLevel' },
    });
  });
});
