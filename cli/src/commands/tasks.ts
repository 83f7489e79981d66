/**
 * Tasks command: launch units as background tasks, then wait for them
 *
 * Usage:
 *   conductor tasks disk_analyzer network_checker --arg target=/var
 *   conductor tasks disk_analyzer network_checker --status failed
 */

import { Option, type Command } from 'commander';
import { ExitCodes, TASK_STATUSES, type Outcome } from '@conductor/engine';
import { collect, parseKeyValuePairs, type CliTasksOptions } from '../types/CliOptions.js';
import { describeOutcome } from '../utils/events.js';
import type { CommandRunner } from './context.js';

export function registerTasksCommand(program: Command, runner: CommandRunner): void {
  program
    .command('tasks <units...>')
    .description('Run units as background tasks in parallel and wait for all of them')
    .option('-a, --arg <key=value>', 'Argument passed to every unit (repeatable)', collect, [])
    .addOption(
      new Option('-s, --status <status>', 'Only show tasks that ended with this status').choices(TASK_STATUSES)
    )
    .action((units: string[], options: CliTasksOptions, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const args = parseKeyValuePairs(options.arg);
        for (const unit of units) {
          engine.registry.lookup(unit);
        }

        const handles = engine.tasks.parallel(...units.map((unit) => ({ unit, args })));
        formatter.showInfo(`Launched ${handles.map((handle) => `${handle.id} (${handle.unit})`).join(', ')}`);

        const outcomes: Outcome[] = await Promise.all(handles.map((handle) => engine.tasks.wait(handle.id)));

        formatter.showTable('Tasks', [
          ['id', 'unit', 'status', 'detail'],
          ...engine.tasks.list(options.status).map((task) => [
            task.id,
            task.unit,
            task.outcome?.status ?? task.status,
            task.outcome ? describeOutcome(task.outcome) : '-',
          ]),
        ]);

        const succeeded = outcomes.filter((outcome) => outcome.status === 'success').length;
        if (succeeded === outcomes.length) return ExitCodes.SUCCESS;
        return succeeded === 0 ? ExitCodes.EXECUTION_FAILED : ExitCodes.PARTIAL_FAILURE;
      })
    );
}
