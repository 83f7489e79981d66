/**
 * Units command: list registered units with their resilience settings
 */

import type { Command } from 'commander';
import type { CommandRunner } from './context.js';

export function registerUnitsCommand(program: Command, runner: CommandRunner): void {
  program
    .command('units')
    .description('List registered units')
    .action((_options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        formatter.showTable('Units', [
          ['name', 'team', 'timeout', 'retries', 'fallback', 'keywords'],
          ...engine.registry.specs().map((spec) => [
            spec.name,
            spec.team ?? '-',
            `${spec.timeoutMs}ms`,
            String(spec.maxRetries),
            spec.fallback.join(',') || '-',
            [...spec.keywords].join(',') || '-',
          ]),
        ]);
        return undefined;
      })
    );
}
