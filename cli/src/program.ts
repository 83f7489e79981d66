/**
 * Program definition
 *
 * Builds the commander program with every command registered. runCli() is
 * what the binary calls; tests call it with an injected engine factory.
 */

import { Command, CommanderError, Option } from 'commander';
import { FORMATTER_TYPES } from './formatters/createFormatter.js';
import { registerCircuitCommand } from './commands/circuit.js';
import { CommandRunner, type CliDeps } from './commands/context.js';
import { registerErrorsCommand } from './commands/errors.js';
import { registerExecutionsCommand } from './commands/executions.js';
import { registerReportsCommand } from './commands/reports.js';
import { registerRunCommands } from './commands/run.js';
import { registerScheduleCommand } from './commands/schedule.js';
import { registerTasksCommand } from './commands/tasks.js';
import { registerUnitsCommand } from './commands/units.js';
import { registerWorkflowCommand } from './commands/workflow.js';

export const VERSION = '0.1.0';

export function buildProgram(runner: CommandRunner): Command {
  const program = new Command();

  program
    .name('conductor')
    .description('Route requests to units, run workflows and keep them resilient')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help')
    .option('-c, --config <path>', 'Configuration file (default: conductor.yaml in the working directory)')
    .addOption(new Option('-f, --format <type>', 'Output format').choices(FORMATTER_TYPES).default('human'))
    .option('--verbose', 'Show payload data, transitions and stack traces')
    .option('-q, --quiet', 'Only print results and errors')
    .option('--no-color', 'Disable colored output')
    .exitOverride();

  registerRunCommands(program, runner);
  registerExecutionsCommand(program, runner);
  registerWorkflowCommand(program, runner);
  registerReportsCommand(program, runner);
  registerScheduleCommand(program, runner);
  registerTasksCommand(program, runner);
  registerCircuitCommand(program, runner);
  registerErrorsCommand(program, runner);
  registerUnitsCommand(program, runner);

  return program;
}

/**
 * Parse argv (node-style: executable and script first) and run one command
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const runner = new CommandRunner(deps);
  const program = buildProgram(runner);

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return runner.exitCode;
}
