/**
 * Executions command
 *
 * Usage:
 *   conductor executions                 List checkpointed executions, oldest first
 *   conductor executions <id>            Show one execution
 *   conductor executions prune --days 7  Delete finished executions older than 7 days
 */

import type { Command } from 'commander';
import { parseDuration, type CliPruneOptions } from '../types/CliOptions.js';
import type { CommandRunner } from './context.js';
import { executionExitCode } from './run.js';

const REQUEST_PREVIEW_CHARS = 40;

function preview(text: string): string {
  return text.length > REQUEST_PREVIEW_CHARS ? `${text.slice(0, REQUEST_PREVIEW_CHARS - 1)}…` : text;
}

export function registerExecutionsCommand(program: Command, runner: CommandRunner): void {
  const executions = program
    .command('executions [executionId]')
    .description('List stored executions or show one of them')
    .action((executionId: string | undefined, _options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        if (executionId) {
          const execution = await engine.supervisor.get(executionId);
          formatter.showExecution(execution);
          return executionExitCode(execution);
        }

        const stored = await engine.supervisor.list();
        formatter.showTable('Executions', [
          ['id', 'state', 'request', 'units', 'updated'],
          ...stored.map((execution) => [
            execution.id,
            execution.state,
            preview(execution.request.text),
            execution.candidates.map((candidate) => candidate.unitName).join(',') || '-',
            new Date(execution.updatedAt).toISOString(),
          ]),
        ]);
        return undefined;
      })
    );

  executions
    .command('prune')
    .description('Delete completed and failed executions not updated for a number of days')
    .option('-d, --days <n>', 'Retention in days', '7')
    .action((options: CliPruneOptions, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const deleted = await engine.prune(parseDuration(options.days, 'days'));
        formatter.showInfo(
          deleted.length === 0
            ? `No executions older than ${options.days} day(s)`
            : `Pruned ${deleted.length} execution(s): ${deleted.join(', ')}`
        );
        return undefined;
      })
    );
}
