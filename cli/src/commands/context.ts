/**
 * Command runner
 *
 * Every command goes through execute(): resolve global options, build the
 * formatter and engine, bridge engine events, run the action and shut the
 * engine down. Errors are shown by the formatter and mapped to exit codes;
 * nothing here calls process.exit.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { ConductorEngine, ConductorError, ExitCodes, toError } from '@conductor/engine';
import { createFormatter, FORMATTER_TYPES } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { GlobalOptions } from '../types/CliOptions.js';
import { bridgeEvents } from '../utils/events.js';

export interface CliDeps {
  /** Builds the engine; defaults to loading conductor.yaml */
  createEngine?: (configPath?: string) => Promise<ConductorEngine>;
  /** Resolves when a foreground command (schedule) should stop; defaults to SIGINT/SIGTERM */
  waitForShutdown?: () => Promise<void>;
}

export interface CommandContext {
  engine: ConductorEngine;
  formatter: Formatter;
  options: GlobalOptions;
  waitForShutdown: () => Promise<void>;
}

/**
 * Returns the exit code; undefined means success
 */
export type CommandAction = (context: CommandContext) => Promise<number | undefined>;

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  format: z.enum(['human', 'json', 'null']).default('human'),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  color: z.boolean().default(true),
});

export function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  });
}

export class CommandRunner {
  private code: number = ExitCodes.SUCCESS;
  private readonly createEngine: (configPath?: string) => Promise<ConductorEngine>;
  private readonly waitForShutdown: () => Promise<void>;

  constructor(deps: CliDeps = {}) {
    this.createEngine = deps.createEngine ?? ((configPath) => ConductorEngine.fromConfigFile(configPath));
    this.waitForShutdown = deps.waitForShutdown ?? waitForSignal;
  }

  get exitCode(): number {
    return this.code;
  }

  async execute(command: Command, action: CommandAction): Promise<void> {
    const parsed = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
    const options: GlobalOptions = parsed.success ? parsed.data : { format: 'human', color: true };
    const formatter = createFormatter(options.format, {
      verbose: options.verbose,
      noColor: !options.color,
      silent: options.quiet,
    });
    if (!parsed.success) {
      formatter.showError(new Error(`Invalid --format; expected one of ${FORMATTER_TYPES.join(', ')}`));
      this.code = ExitCodes.VALIDATION_FAILED;
      return;
    }

    let engine: ConductorEngine | undefined;
    try {
      engine = await this.createEngine(options.config);
      await engine.init();
      const unsubscribe = bridgeEvents(engine.events, formatter);
      try {
        this.code = (await action({ engine, formatter, options, waitForShutdown: this.waitForShutdown })) ?? ExitCodes.SUCCESS;
      } finally {
        unsubscribe();
      }
    } catch (error) {
      const err = toError(error);
      formatter.showError(err);
      this.code = err instanceof ConductorError ? err.exitCode : ExitCodes.GENERAL_ERROR;
    } finally {
      await engine?.shutdown();
    }
  }
}
