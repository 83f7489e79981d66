/**
 * Log sinks
 *
 * @module logging
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import { LogLevel, type LogFormat, type LogRecord, type LogSink } from '../types/log-types.js';

const LEVEL_STYLE: Record<LogRecord['level'], (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
};

/**
 * Writes to stderr so stdout stays free for command output
 */
export class ConsoleSink implements LogSink {
  constructor(
    private readonly format: LogFormat = 'text',
    private readonly colors = true
  ) {}

  write(record: LogRecord): void {
    console.error(this.format === 'json' ? JSON.stringify(record) : this.render(record));
  }

  private render(record: LogRecord): string {
    const time = record.timestamp.slice(11, 19);
    const level = record.level.toUpperCase().padEnd(5);
    const origin = `[${record.team}/${record.unit}]`;
    const detail = record.detail ? `: ${record.detail}` : '';

    if (!this.colors) {
      return `${time} ${level} ${origin} ${record.message}${detail}`;
    }
    return [
      chalk.dim(time),
      LEVEL_STYLE[record.level](level),
      chalk.bold(origin),
      `${record.message}${chalk.dim(detail)}`,
    ].join(' ');
  }
}

/**
 * JSON lines under <dir>/<YYYY-MM-DD>/<team>.jsonl
 */
export class FileSink implements LogSink {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string) {}

  write(record: LogRecord): Promise<void> {
    const day = record.timestamp.slice(0, 10);
    const folder = join(this.dir, day);
    const file = join(folder, `${record.team}.jsonl`);
    const line = `${JSON.stringify(record)}\n`;

    // Appends are chained so lines keep emission order
    const next = this.tail.then(async () => {
      await mkdir(folder, { recursive: true });
      await appendFile(file, line, 'utf-8');
    });
    this.tail = next.catch(() => undefined);
    return next;
  }
}

/**
 * Keeps records in memory; used by tests and the CLI --verbose summary
 */
export class MemorySink implements LogSink {
  readonly records: LogRecord[] = [];

  write(record: LogRecord): void {
    this.records.push(record);
  }

  forUnit(unit: string): LogRecord[] {
    return this.records.filter((record) => record.unit === unit);
  }

  clear(): void {
    this.records.length = 0;
  }
}
