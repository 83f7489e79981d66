/**
 * Run, resume and explain commands
 *
 * Usage:
 *   conductor explain "check disk usage"
 *   conductor run "check disk usage"
 *   conductor run "audit the box" --units security_auditor,network_checker --sequential
 *   conductor run "scan ports" --arg target=localhost --background
 *   conductor resume 3f2a9c1e
 */

import type { Command } from 'commander';
import { ExecutionState, ExitCodes, type Execution, type ExecutionRequestInput } from '@conductor/engine';
import { collect, parseKeyValuePairs, splitList, type CliRunOptions } from '../types/CliOptions.js';
import type { CommandRunner } from './context.js';

/**
 * FAILED or every candidate failed → EXECUTION_FAILED; some failed → PARTIAL_FAILURE
 */
export function executionExitCode(execution: Execution): number {
  const aggregate = execution.aggregate;
  if (execution.state === ExecutionState.FAILED || !aggregate || aggregate.allFailed) {
    return ExitCodes.EXECUTION_FAILED;
  }
  return aggregate.failureCount > 0 ? ExitCodes.PARTIAL_FAILURE : ExitCodes.SUCCESS;
}

export function registerRunCommands(program: Command, runner: CommandRunner): void {
  program
    .command('explain <text...>')
    .description('Show how a request would be routed without running anything')
    .action((words: string[], _options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        formatter.showRouting(await engine.explain(words.join(' ')));
        return undefined;
      })
    );

  program
    .command('run <text...>')
    .description('Route a request and run the chosen units')
    .option('-u, --units <names>', 'Comma-separated units to run; skips routing')
    .option('--sequential', 'Run candidates one after another, passing results forward')
    .option('--background', 'Launch invocations as background tasks and wait for them')
    .option('-a, --arg <key=value>', 'Argument passed to every unit (repeatable)', collect, [])
    .action((words: string[], options: CliRunOptions, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const request: ExecutionRequestInput = {
          text: words.join(' '),
          mode: options.sequential ? 'sequential' : 'parallel',
          units: splitList(options.units),
          args: parseKeyValuePairs(options.arg),
        };

        if (options.background) {
          const handle = await engine.start(request);
          formatter.showInfo(`Execution ${handle.executionId} running in the background`);
          const execution = await handle.done;
          formatter.showExecution(execution);
          return executionExitCode(execution);
        }

        const execution = await engine.run(request);
        formatter.showExecution(execution);
        return executionExitCode(execution);
      })
    );

  program
    .command('resume <executionId>')
    .description('Continue an interrupted execution from its last checkpoint')
    .action((executionId: string, _options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const execution = await engine.resume(executionId);
        formatter.showExecution(execution);
        return executionExitCode(execution);
      })
    );
}
