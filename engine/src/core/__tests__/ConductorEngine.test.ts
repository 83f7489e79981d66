import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import { createSilentLogger } from '../../logging/EngineLogger.js';
import { InMemoryStateStore } from '../../stores/InMemoryStateStore.js';
import { ManualClock } from '../../testing/ManualClock.js';
import { ScriptedUnit } from '../../testing/ScriptedUnit.js';
import { CircuitStatus, ExecutionState, FailureKind, type CircuitSnapshot } from '../../types/core-types.js';
import { ConductorEngine } from '../ConductorEngine.js';
import type { ConductorEngineConfig } from '../EngineConfig.js';

const ECHO_SCRIPT = `process.stdout.write(JSON.stringify({ summary: 'hello from child', data: { argv: process.argv.slice(1) } }))`;

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'conductor-engine-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function memoryEngine(config: ConductorEngineConfig = {}, circuitStore = new InMemoryStateStore<CircuitSnapshot>()) {
  return new ConductorEngine(
    { store: 'memory', includeDefaultTemplates: false, ...config },
    { logger: createSilentLogger(), clock: new ManualClock(10_000), circuitStore }
  );
}

describe('ConductorEngine', () => {
  it('should register process units from configuration', async () => {
    const engine = memoryEngine({
      units: [{ name: 'echo', command: process.execPath, args: ['-e', ECHO_SCRIPT, '--'], keywords: ['echo'] }],
    });

    const execution = await engine.run({ text: 'say something', units: ['echo'], args: { target: 'home' } });

    expect(engine.registry.lookup('echo').keywords).toEqual(['echo']);
    expect(execution.state).toBe(ExecutionState.COMPLETED);
    expect(execution.aggregate?.text).toBe('[echo] hello from child');
    expect(execution.aggregate?.entries[0]?.data).toEqual({ argv: ['--target', 'home'] });
    await engine.shutdown();
  });

  it('should load persisted circuit states on init', async () => {
    const circuits = new InMemoryStateStore<CircuitSnapshot>();
    await circuits.put('flaky', { unit: 'flaky', state: CircuitStatus.OPEN, failureCount: 5, openedAt: 9_000 });
    const engine = memoryEngine({}, circuits);

    await engine.init();

    expect(engine.breaker.snapshot('flaky')).toEqual({
      unit: 'flaky',
      state: CircuitStatus.OPEN,
      failureCount: 5,
      openedAt: 9_000,
    });
  });

  it('should load only the shipped templates whose units exist', async () => {
    const engine = memoryEngine({ includeDefaultTemplates: true });
    engine.registerUnit({ name: 'sys_health' }, new ScriptedUnit(ScriptedUnit.ok('cpu 12%')));
    engine.registerUnit({ name: 'process_manager' }, new ScriptedUnit(ScriptedUnit.ok('212 processes')));
    engine.registerUnit({ name: 'system_cleaner' }, new ScriptedUnit(ScriptedUnit.ok('nothing to clean')));

    await engine.init();
    const run = await engine.runWorkflow('system_health');

    expect(engine.catalog.names()).toEqual(['system_health']);
    expect(run.status).toBe('complete');
    expect(run.stepReports).toHaveLength(3);
  });

  it('should load templates and schedules named in the configuration', async () => {
    const templatesFile = join(dir, 'templates.yaml');
    await writeFile(
      templatesFile,
      'templates:\n  - name: ping\n    title: Ping\n    steps:\n      - id: ping\n        unit: pinger\n'
    );
    const engine = memoryEngine({ templatesFile, schedules: [{ template: 'ping', cron: '*/10 * * * *' }] });
    engine.registerUnit({ name: 'pinger' }, new ScriptedUnit(ScriptedUnit.ok('pong')));

    await engine.init();

    expect(engine.catalog.names()).toEqual(['ping']);
    expect(engine.scheduler.list()).toMatchObject([{ template: 'ping', cron: '*/10 * * * *' }]);
    expect(engine.scheduler.isStarted()).toBe(false);
  });

  it('should fail init on an invalid configured schedule', async () => {
    const engine = memoryEngine({ schedules: [{ template: 'ping', cron: 'whenever' }] });
    await expect(engine.init()).rejects.toThrow(ConfigError);
  });

  it('should build an engine from a configuration file', async () => {
    const file = join(dir, 'conductor.yaml');
    await writeFile(file, 'store: memory\nincludeDefaultTemplates: false\nrouter:\n  confidenceFloor: 0.5\n');

    const engine = await ConductorEngine.fromConfigFile(file, { logger: createSilentLogger() });

    expect(engine.config.store).toBe('memory');
    expect(engine.config.router.confidenceFloor).toBe(0.5);
  });

  it('should report recent failures and prune old executions', async () => {
    const clock = new ManualClock(10_000);
    const engine = new ConductorEngine(
      { store: 'memory', includeDefaultTemplates: false },
      { logger: createSilentLogger(), clock }
    );
    engine.registerUnit({ name: 'flaky', maxRetries: 0 }, ScriptedUnit.failing('unreachable'));
    const execution = await engine.run({ text: 'ping', units: ['flaky'] });

    await expect(engine.recentErrors({ unit: 'flaky' })).resolves.toEqual([
      { at: 10_000, unit: 'flaky', kind: FailureKind.RETRYABLE, message: 'unreachable' },
    ]);

    clock.advance(60_000);
    await expect(engine.prune(30_000)).resolves.toEqual([execution.id]);
    await expect(engine.supervisor.list()).resolves.toEqual([]);
  });

  it('should keep executions in SQLite across engine instances', async () => {
    const config: ConductorEngineConfig = { store: 'sqlite', stateDir: dir, includeDefaultTemplates: false };
    const first = new ConductorEngine(config, { logger: createSilentLogger() });
    first.registerUnit({ name: 'scan' }, new ScriptedUnit(ScriptedUnit.ok('clean')));
    const execution = await first.run({ text: 'scan', units: ['scan'] });
    await first.shutdown();

    const second = new ConductorEngine(config, { logger: createSilentLogger() });
    const stored = await second.supervisor.get(execution.id);
    await second.shutdown();

    expect(stored.state).toBe(ExecutionState.COMPLETED);
    expect(stored.aggregate?.text).toBe('[scan] clean');
  });
});
