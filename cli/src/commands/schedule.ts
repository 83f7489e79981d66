/**
 * Schedule command: keep the process alive and run templates on cron
 *
 * Schedules from the configuration file are always included; a template
 * and cron expression on the command line add one more.
 *
 * Usage:
 *   conductor schedule
 *   conductor schedule system_health "*\/15 * * * *" --timezone Europe/Paris
 */

import type { Command } from 'commander';
import { ConfigError, ExitCodes, type WorkflowSchedule } from '@conductor/engine';
import type { CliScheduleOptions } from '../types/CliOptions.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CommandRunner } from './context.js';

function showSchedules(formatter: Formatter, schedules: readonly WorkflowSchedule[]): void {
  formatter.showTable('Schedules', [
    ['id', 'template', 'cron', 'runs', 'skipped', 'last error'],
    ...schedules.map((schedule) => [
      schedule.id,
      schedule.template,
      schedule.cron,
      String(schedule.runs),
      String(schedule.skipped),
      schedule.lastError ?? '-',
    ]),
  ]);
}

export function registerScheduleCommand(program: Command, runner: CommandRunner): void {
  program
    .command('schedule [template] [cron]')
    .description('Run templates on their cron schedules until interrupted')
    .option('--timezone <tz>', 'IANA timezone for the command-line schedule')
    .action(
      (
        template: string | undefined,
        cron: string | undefined,
        options: CliScheduleOptions,
        command: Command
      ) =>
        runner.execute(command, async ({ engine, formatter, waitForShutdown }) => {
          if (template !== undefined) {
            if (cron === undefined) {
              throw ConfigError.invalid(`A cron expression is required to schedule "${template}"`, 'cron');
            }
            await engine.schedule(template, cron, options.timezone);
          }

          const schedules = engine.scheduler.list();
          if (schedules.length === 0) {
            formatter.showWarning('Nothing to schedule: add schedules to conductor.yaml or pass <template> <cron>');
            return ExitCodes.SUCCESS;
          }

          engine.scheduler.start();
          showSchedules(formatter, schedules);
          formatter.showInfo('Scheduler running; press Ctrl+C to stop');
          await waitForShutdown();
          await engine.scheduler.stop();
          showSchedules(formatter, engine.scheduler.list());
          return ExitCodes.SUCCESS;
        })
    );
}
