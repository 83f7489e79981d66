#!/usr/bin/env node
/**
 * Conductor CLI
 *
 * Usage:
 *   conductor explain <text...>         Show routing scores
 *   conductor run <text...>             Route and run a request
 *   conductor resume <id>               Continue an interrupted execution
 *   conductor executions [id]           List or show executions
 *   conductor executions prune          Delete old finished executions
 *   conductor workflow list|run         Workflow templates
 *   conductor reports list|show         Stored workflow reports
 *   conductor schedule [template cron]  Run templates on cron
 *   conductor tasks <units...>          Parallel background tasks
 *   conductor circuit list|reset        Circuit breakers
 *   conductor errors                    Recent failures
 *   conductor units                     Registered units
 */

import { runCli } from './program.js';

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    console.error('Fatal error:', err.message);
    if (process.env.DEBUG) {
      console.error(err.stack);
    }
    process.exitCode = 4;
  });
