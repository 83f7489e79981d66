/**
 * Process Unit
 *
 * Adapter for external task agents: each invocation runs the configured
 * command as a child process.
 *
 * Contract with the child:
 * - unit args are appended as `--key value` pairs
 * - the auxiliary context is passed as JSON in CONDUCTOR_CONTEXT
 * - exit 0 is success; stdout JSON `{summary, data}` becomes the payload,
 *   otherwise the first lines of stdout form the summary
 * - stdout JSON `{ok: false, kind: "Fatal"}` or a configured fatal exit code
 *   is a fatal failure; any other failure is retryable
 */

import { z } from 'zod';
import type { InvocationContext, Unit, UnitArgs, UnitResult } from '../types/core-types.js';
import { ProcessExecutor, type ProcessExecutionResult } from './ProcessExecutor.js';

export const CONTEXT_ENV_VAR = 'CONDUCTOR_CONTEXT';
const SUMMARY_LINES = 10;

export interface ProcessUnitConfig {
  command: string;
  /** Fixed arguments placed before the unit args */
  args?: readonly string[];
  cwd?: string;
  env?: Record<string, string>;
  fatalExitCodes?: readonly number[];
  killGraceMs?: number;
}

const PayloadOutputSchema = z.object({
  summary: z.string(),
  data: z.record(z.unknown()).default({}),
});

const VerdictOutputSchema = z.object({
  ok: z.literal(false),
  kind: z.enum(['Retryable', 'Fatal']).default('Retryable'),
  message: z.string().optional(),
});

export class ProcessUnit implements Unit {
  constructor(private readonly config: ProcessUnitConfig) {}

  async invoke(args: UnitArgs, context: InvocationContext): Promise<UnitResult> {
    const result = await ProcessExecutor.execute({
      command: this.config.command,
      args: [...(this.config.args ?? []), ...toArgv(args)],
      cwd: this.config.cwd,
      env: {
        ...this.config.env,
        [CONTEXT_ENV_VAR]: JSON.stringify({
          unit: context.unit,
          attempt: context.attempt,
          ...context.auxiliary,
        }),
      },
      signal: context.signal,
      killGraceMs: this.config.killGraceMs,
    });

    return interpretResult(result, this.config.fatalExitCodes ?? []);
  }
}

/**
 * `{target: 'home', depth: '2'}` → `['--target', 'home', '--depth', '2']`
 */
export function toArgv(args: UnitArgs): string[] {
  return Object.entries(args).flatMap(([key, value]) => [`--${key}`, value]);
}

export function interpretResult(
  result: ProcessExecutionResult,
  fatalExitCodes: readonly number[]
): UnitResult {
  const json = parseJson(result.stdout);

  const verdict = VerdictOutputSchema.safeParse(json);
  if (verdict.success) {
    return {
      ok: false,
      failure: {
        kind: verdict.data.kind,
        message: verdict.data.message ?? lastLine(result.stderr) ?? `reported ${verdict.data.kind} failure`,
      },
    };
  }

  if (result.exitCode === 0) {
    const payload = PayloadOutputSchema.safeParse(json);
    if (payload.success) {
      return { ok: true, payload: payload.data };
    }
    return {
      ok: true,
      payload: {
        summary: firstLines(result.stdout, SUMMARY_LINES),
        data: { stdout: result.stdout, stderr: result.stderr },
      },
    };
  }

  const reason = result.signal
    ? `terminated by ${result.signal}`
    : `exited with code ${result.exitCode}`;
  const stderr = lastLine(result.stderr);
  return {
    ok: false,
    failure: {
      kind: fatalExitCodes.includes(result.exitCode) ? 'Fatal' : 'Retryable',
      message: stderr ? `${reason}: ${stderr}` : reason,
    },
  };
}

function parseJson(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (!trimmed.startsWith('{')) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

function nonEmptyLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0);
}

function firstLines(text: string, count: number): string {
  return nonEmptyLines(text).slice(0, count).join('\n');
}

function lastLine(text: string): string | undefined {
  return nonEmptyLines(text).at(-1);
}
