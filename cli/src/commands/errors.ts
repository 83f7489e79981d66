/**
 * Errors command
 *
 * Usage:
 *   conductor errors                     Failures of the last 24 hours
 *   conductor errors --hours 2 --unit disk_analyzer
 */

import type { Command } from 'commander';
import { parseDuration, type CliErrorsOptions } from '../types/CliOptions.js';
import type { CommandRunner } from './context.js';

export function registerErrorsCommand(program: Command, runner: CommandRunner): void {
  program
    .command('errors')
    .description('Show recent failed attempts and circuit rejections, newest first')
    .option('-H, --hours <n>', 'How far back to look', '24')
    .option('-u, --unit <name>', 'Only errors of this unit')
    .action((options: CliErrorsOptions, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const errors = await engine.recentErrors({
          withinMs: parseDuration(options.hours, 'hours'),
          unit: options.unit,
        });
        formatter.showTable('Recent errors', [
          ['time', 'unit', 'kind', 'message'],
          ...errors.map((error) => [new Date(error.at).toISOString(), error.unit, error.kind, error.message]),
        ]);
        return undefined;
      })
    );
}
