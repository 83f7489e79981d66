/**
 * Circuit command
 *
 * Usage:
 *   conductor circuit list
 *   conductor circuit reset <unit>
 */

import type { Command } from 'commander';
import type { CommandRunner } from './context.js';

export function registerCircuitCommand(program: Command, runner: CommandRunner): void {
  const circuit = program.command('circuit').description('Inspect and reset per-unit circuit breakers');

  circuit
    .command('list')
    .description('Show every circuit the breaker has seen')
    .action((_options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        formatter.showTable('Circuits', [
          ['unit', 'state', 'failures', 'opened'],
          ...engine.breaker.snapshots().map((snapshot) => [
            snapshot.unit,
            snapshot.state,
            String(snapshot.failureCount),
            snapshot.openedAt === null ? '-' : new Date(snapshot.openedAt).toISOString(),
          ]),
        ]);
        return undefined;
      })
    );

  circuit
    .command('reset <unit>')
    .description('Close the circuit of a unit and clear its failure count')
    .action((unit: string, _options: Record<string, never>, command: Command) =>
      runner.execute(command, async ({ engine, formatter }) => {
        engine.registry.lookup(unit);
        await engine.breaker.reset(unit);
        formatter.showInfo(`Circuit for ${unit} reset`);
        return undefined;
      })
    );
}
