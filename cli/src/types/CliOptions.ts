/**
 * CLI option shapes as commander hands them to actions
 */

import { ConfigError, type TaskStatus } from '@conductor/engine';
import type { FormatterType } from '../formatters/createFormatter.js';

/**
 * Options every command accepts
 */
export interface GlobalOptions {
  /** Path to conductor.yaml; discovered in the working directory when absent */
  config?: string;
  format: FormatterType;
  verbose?: boolean;
  /** Suppress progress and info lines */
  quiet?: boolean;
  /** false when --no-color is given */
  color: boolean;
}

export interface CliRouteOptions {
  explain?: boolean;
}

export interface CliRunOptions {
  /** Comma-separated unit names; skips routing */
  units?: string;
  sequential?: boolean;
  background?: boolean;
  /** key=value pairs passed to every unit */
  arg: string[];
}

export interface CliTasksOptions {
  arg: string[];
  /** Only show tasks that ended with this status */
  status?: TaskStatus;
}

export interface CliPruneOptions {
  days: string;
}

export interface CliErrorsOptions {
  hours: string;
  unit?: string;
}

export interface CliScheduleOptions {
  timezone?: string;
}

/**
 * Parse key=value pairs into object
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      throw ConfigError.invalid(`Invalid key=value format: ${pair}`, '--arg');
    }

    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1).trim();

    if (!key) {
      throw ConfigError.invalid(`Empty key in: ${pair}`, '--arg');
    }

    result[key] = value;
  }

  return result;
}

/**
 * Parse a non-negative number of days or hours into milliseconds
 */
export function parseDuration(value: string, unit: 'days' | 'hours'): number {
  const amount = Number(value);
  if (value.trim() === '' || !Number.isFinite(amount) || amount < 0) {
    throw ConfigError.invalid(`Invalid number of ${unit}: ${value}`, `--${unit}`);
  }
  return amount * (unit === 'days' ? 24 : 1) * 60 * 60 * 1000;
}

/**
 * commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}
