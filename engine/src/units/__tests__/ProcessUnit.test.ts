import { describe, expect, it } from 'vitest';
import type { InvocationContext } from '../../types/core-types.js';
import { interpretResult, ProcessUnit, toArgv } from '../ProcessUnit.js';
import { ProcessExecutor, type ProcessExecutionResult } from '../ProcessExecutor.js';

function result(overrides: Partial<ProcessExecutionResult>): ProcessExecutionResult {
  return { stdout: '', stderr: '', exitCode: 0, durationMs: 5, ...overrides };
}

function context(signal = new AbortController().signal): InvocationContext {
  return {
    unit: 'disk_check',
    attempt: 1,
    signal,
    auxiliary: { request: 'check disk', priorResults: [] },
  };
}

describe('toArgv', () => {
  it('should expand args into --key value pairs in insertion order', () => {
    expect(toArgv({ target: 'home', depth: '2' })).toEqual(['--target', 'home', '--depth', '2']);
  });
});

describe('interpretResult', () => {
  it('should use a JSON payload printed on stdout', () => {
    const outcome = interpretResult(
      result({ stdout: '{"summary":"disk at 40%","data":{"used":40}}\n' }),
      []
    );
    expect(outcome).toEqual({ ok: true, payload: { summary: 'disk at 40%', data: { used: 40 } } });
  });

  it('should summarise plain stdout with its first ten non-empty lines', () => {
    const lines = Array.from({ length: 12 }, (_, i) => `line ${i + 1}`);
    const outcome = interpretResult(result({ stdout: `\n${lines.join('\n\n')}\n` }), []);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.payload.summary).toBe(lines.slice(0, 10).join('\n'));
  });

  it('should report a fatal verdict from stdout', () => {
    const outcome = interpretResult(
      result({ stdout: '{"ok":false,"kind":"Fatal","message":"token revoked"}', exitCode: 1 }),
      []
    );
    expect(outcome).toEqual({ ok: false, failure: { kind: 'Fatal', message: 'token revoked' } });
  });

  it('should treat configured exit codes as fatal', () => {
    const outcome = interpretResult(result({ exitCode: 3, stderr: 'warming up\nbad input\n' }), [3]);
    expect(outcome).toEqual({ ok: false, failure: { kind: 'Fatal', message: 'exited with code 3: bad input' } });
  });

  it('should treat other non-zero exits as retryable', () => {
    const outcome = interpretResult(result({ exitCode: 2 }), [3]);
    expect(outcome).toEqual({ ok: false, failure: { kind: 'Retryable', message: 'exited with code 2' } });
  });

  it('should describe termination by signal', () => {
    const outcome = interpretResult(result({ exitCode: -1, signal: 'SIGTERM' }), []);
    expect(outcome).toEqual({ ok: false, failure: { kind: 'Retryable', message: 'terminated by SIGTERM' } });
  });
});

describe('ProcessUnit', () => {
  it('should pass args and context to the child process', async () => {
    const script = [
      'const ctx = JSON.parse(process.env.CONDUCTOR_CONTEXT);',
      'const args = process.argv.slice(1);',
      'console.log(JSON.stringify({ summary: ctx.request, data: { args, unit: ctx.unit } }));',
    ].join('\n');
    const unit = new ProcessUnit({ command: process.execPath, args: ['-e', script, '--'] });

    const outcome = await unit.invoke({ target: 'home' }, context());

    expect(outcome).toEqual({
      ok: true,
      payload: { summary: 'check disk', data: { args: ['--target', 'home'], unit: 'disk_check' } },
    });
  });

  it('should map a failing exit code', async () => {
    const unit = new ProcessUnit({
      command: process.execPath,
      args: ['-e', 'console.error("quota exceeded"); process.exit(4)'],
      fatalExitCodes: [4],
    });

    const outcome = await unit.invoke({}, context());

    expect(outcome).toEqual({ ok: false, failure: { kind: 'Fatal', message: 'exited with code 4: quota exceeded' } });
  });

  it('should terminate the child when the signal aborts', async () => {
    const controller = new AbortController();
    const unit = new ProcessUnit({
      command: process.execPath,
      args: ['-e', 'setInterval(() => {}, 1000)'],
      killGraceMs: 100,
    });

    const pending = unit.invoke({}, context(controller.signal));
    setTimeout(() => controller.abort(), 50);
    const outcome = await pending;

    expect(outcome).toEqual({ ok: false, failure: { kind: 'Retryable', message: 'terminated by SIGTERM' } });
  });

  it('should reject when the command cannot be started', async () => {
    const unit = new ProcessUnit({ command: '/nonexistent/conductor-missing' });
    await expect(unit.invoke({}, context())).rejects.toThrow('Failed to start "/nonexistent/conductor-missing"');
  });
});

describe('ProcessExecutor', () => {
  it('should keep multibyte characters that span output chunks', async () => {
    const expected = 'a' + 'é'.repeat(200_000);

    const result = await ProcessExecutor.execute({
      command: process.execPath,
      args: ['-e', "process.stdout.write('a' + 'é'.repeat(200000))"],
    });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toHaveLength(expected.length);
    expect(result.stdout).toBe(expected);
  });
});
