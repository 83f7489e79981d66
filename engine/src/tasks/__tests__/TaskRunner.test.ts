import { describe, expect, it, vi } from 'vitest';
import { ExecutionError, RegistryError } from '../../errors/index.js';
import type { ConductorEvent } from '../../events/EngineEvents.js';
import { EventBus } from '../../events/EventBus.js';
import { createSilentLogger } from '../../logging/EngineLogger.js';
import { UnitRegistry } from '../../registry/UnitRegistry.js';
import { CircuitBreaker } from '../../resilience/CircuitBreaker.js';
import { ErrorHandler } from '../../resilience/ErrorHandler.js';
import { ManualClock } from '../../testing/ManualClock.js';
import { ScriptedUnit } from '../../testing/ScriptedUnit.js';
import { DEFAULT_TASK_RETENTION_MS, TaskRunner } from '../TaskRunner.js';

function setup() {
  const clock = new ManualClock(500);
  const logger = createSilentLogger();
  const events = new EventBus();
  const registry = new UnitRegistry();
  registry.register({ name: 'scan' }, new ScriptedUnit(ScriptedUnit.ok('scan done')));
  const stuck = new ScriptedUnit({ type: 'hang' });
  registry.register({ name: 'stuck' }, stuck);
  registry.register({ name: 'broken', maxRetries: 0 }, new ScriptedUnit(ScriptedUnit.fail('disk gone', 'Fatal')));

  const breaker = new CircuitBreaker({ clock, logger });
  const handler = new ErrorHandler(registry, breaker, { clock, logger });
  let next = 0;
  const runner = new TaskRunner(handler, registry, {
    clock,
    logger,
    events,
    idGenerator: () => `t${++next}`,
  });
  return { clock, events, runner, breaker, stuck };
}

describe('TaskRunner', () => {
  it('should return a running handle immediately', () => {
    const { runner } = setup();

    const handle = runner.launch('scan', { path: '/tmp' });

    expect(handle).toEqual({
      id: 't1',
      unit: 'scan',
      args: { path: '/tmp' },
      status: 'running',
      launchedAt: 500,
      executionId: undefined,
    });
  });

  it('should record the outcome once the task settles', async () => {
    const { runner } = setup();
    const handle = runner.launch('scan');

    const outcome = await runner.wait(handle.id);

    expect(outcome.status).toBe('success');
    expect(runner.status(handle.id)).toMatchObject({ status: 'succeeded', completedAt: 500 });
  });

  it('should mark fatal outcomes as failed', async () => {
    const { runner } = setup();
    const handle = runner.launch('broken');

    await runner.wait(handle.id);

    expect(runner.status(handle.id).status).toBe('failed');
  });

  it('should cancel a task on kill', async () => {
    const { runner } = setup();
    const handle = runner.launch('stuck');

    expect(runner.kill(handle.id)).toBe(true);
    const outcome = await runner.wait(handle.id);

    expect(outcome.status).toBe('cancelled');
    expect(runner.status(handle.id).status).toBe('cancelled');
    expect(runner.kill(handle.id)).toBe(false);
  });

  it('should cancel a started invocation that rejects on abort without counting a circuit failure', async () => {
    const { runner, breaker, stuck } = setup();
    const handle = runner.launch('stuck');
    await vi.waitFor(() => expect(stuck.callCount).toBe(1));

    runner.kill(handle.id);
    const outcome = await runner.wait(handle.id);

    expect(outcome.status).toBe('cancelled');
    expect(stuck.callCount).toBe(1);
    expect(breaker.snapshot('stuck').failureCount).toBe(0);
  });

  it('should cancel a task when the caller signal aborts', async () => {
    const { runner } = setup();
    const controller = new AbortController();
    const handle = runner.launch('stuck', {}, { signal: controller.signal });

    controller.abort();

    expect((await runner.wait(handle.id)).status).toBe('cancelled');
  });

  it('should launch parallel tasks with one handle each', async () => {
    const { runner } = setup();

    const handles = runner.parallel({ unit: 'scan' }, { unit: 'broken' });
    const outcomes = await Promise.all(handles.map((handle) => runner.wait(handle.id)));

    expect(handles.map((handle) => handle.id)).toEqual(['t1', 't2']);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(['success', 'failure']);
    expect(runner.list().map((handle) => handle.status)).toEqual(['succeeded', 'failed']);
  });

  it('should list only tasks with the requested status', async () => {
    const { runner } = setup();
    const handles = runner.parallel({ unit: 'scan' }, { unit: 'broken' }, { unit: 'stuck' });
    await Promise.all(handles.slice(0, 2).map((handle) => runner.wait(handle.id)));

    expect(runner.list('failed').map((handle) => handle.id)).toEqual(['t2']);
    expect(runner.list('running').map((handle) => handle.id)).toEqual(['t3']);
    expect(runner.list('cancelled')).toEqual([]);
    expect(runner.runningCount).toBe(1);
    await runner.shutdown();
  });

  it('should reject unknown units before launching anything', () => {
    const { runner } = setup();

    expect(() => runner.parallel({ unit: 'scan' }, { unit: 'ghost' })).toThrow(RegistryError);
    expect(runner.list()).toEqual([]);
  });

  it('should throw TaskNotFound for unknown ids', () => {
    const { runner } = setup();
    expect(() => runner.status('nope')).toThrow(ExecutionError);
  });

  it('should only reap finished tasks', async () => {
    const { runner } = setup();
    const stuck = runner.launch('stuck');
    const done = runner.launch('scan');
    await runner.wait(done.id);

    expect(runner.reap(stuck.id)).toBe(false);
    expect(runner.reap(done.id)).toBe(true);
    expect(() => runner.status(done.id)).toThrow(ExecutionError);

    runner.kill(stuck.id);
    await runner.wait(stuck.id);
  });

  it('should expire finished tasks after the retention window', async () => {
    const { runner, clock } = setup();
    const handle = runner.launch('scan');
    await runner.wait(handle.id);

    clock.advance(DEFAULT_TASK_RETENTION_MS - 1);
    expect(runner.reapExpired()).toBe(0);

    clock.advance(1);
    runner.launch('scan');

    expect(runner.list().map((task) => task.id)).toEqual(['t2']);
  });

  it('should publish task.completed', async () => {
    const { runner, events } = setup();
    const seen: ConductorEvent[] = [];
    events.on('task.completed', (event) => {
      seen.push(event);
    });

    const handle = runner.launch('scan');
    await runner.wait(handle.id);

    expect(seen).toHaveLength(1);
    expect(seen[0]?.unit).toBe('scan');
    expect(seen[0]?.payload).toMatchObject({ taskId: 't1', outcome: { status: 'success' } });
  });

  it('should kill running tasks on shutdown', async () => {
    const { runner } = setup();
    runner.launch('stuck');
    runner.launch('stuck');

    await runner.shutdown();

    expect(runner.runningCount).toBe(0);
    expect(runner.list().map((task) => task.status)).toEqual(['cancelled', 'cancelled']);
  });
});
