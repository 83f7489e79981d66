/**
 * Workflow command
 *
 * Usage:
 *   conductor workflow list
 *   conductor workflow run daily_maintenance
 */

import type { Command } from 'commander';
import { ExitCodes, type SynthesisCompletion } from '@conductor/engine';
import type { CommandRunner } from './context.js';

const COMPLETION_EXIT: Record<SynthesisCompletion, number> = {
  complete: ExitCodes.SUCCESS,
  partial: ExitCodes.PARTIAL_FAILURE,
  failed: ExitCodes.EXECUTION_FAILED,
};

export function registerWorkflowCommand(program: Command, runner: CommandRunner): void {
  const workflow = program.command('workflow').description('List and run workflow templates');

  workflow
    .command('list')
    .description('Show loaded templates')
    .action((_options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        formatter.showTable('Templates', [
          ['name', 'title', 'steps'],
          ...engine.catalog
            .list()
            .map((template) => [template.name, template.title, template.steps.map((step) => step.id).join(' → ')]),
        ]);
        return undefined;
      })
    );

  workflow
    .command('run <template>')
    .description('Run a template step by step and write its reports')
    .action((template: string, _options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        const run = await engine.runWorkflow(template);
        formatter.showWorkflowRun(run);
        return COMPLETION_EXIT[run.status];
      })
    );
}
