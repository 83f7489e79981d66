/**
 * Reports command
 *
 * Usage:
 *   conductor reports list
 *   conductor reports show <runId> [file]
 */

import type { Command } from 'commander';
import { StoreError, SYNTHESIS_FILE } from '@conductor/engine';
import type { CommandRunner } from './context.js';

export function registerReportsCommand(program: Command, runner: CommandRunner): void {
  const reports = program.command('reports').description('Browse stored workflow reports');

  reports
    .command('list')
    .description('List stored runs, newest first')
    .action((_options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const runs = await engine.reports.listRuns();
        formatter.showTable('Runs', [
          ['run', 'date', 'files'],
          ...runs.map((run) => [run.runId, run.date, run.files.join(', ')]),
        ]);
        return undefined;
      })
    );

  reports
    .command('show <runId> [file]')
    .description(`Print one report of a run (default ${SYNTHESIS_FILE})`)
    .action((runId: string, file: string | undefined, _options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const name = file ?? SYNTHESIS_FILE;
        const content = await engine.reports.readFile(runId, name);
        if (content === undefined) {
          throw StoreError.reportNotFound(runId, name);
        }
        formatter.showText(content);
        return undefined;
      })
    );
}
