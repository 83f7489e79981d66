/**
 * Configuration errors
 *
 * @module errors
 */

import type { z } from 'zod';
import { ConductorError } from './ConductorError.js';
import { ConductorErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class ConfigError extends ConductorError {
  static invalid(message: string, path?: string, hint?: string): ConfigError {
    return new ConfigError({
      code: ConductorErrorCode.CONFIG_INVALID,
      message,
      path,
      hint,
      severity: ErrorSeverity.ERROR,
    });
  }

  static fromZod(error: z.ZodError, location: string): ConfigError {
    const issue = describeFirstIssue(error);
    return ConfigError.invalid(
      `Invalid configuration in ${location}: ${issue.message}`,
      issue.path,
      'Check the field against conductor.example.yaml'
    );
  }

  static unreadable(location: string, reason: string): ConfigError {
    return ConfigError.invalid(`Cannot read configuration ${location}: ${reason}`);
  }
}

/**
 * First zod issue as a dotted path plus message
 */
export function describeFirstIssue(error: z.ZodError): { path: string; message: string } {
  const [issue] = error.issues;
  if (!issue) {
    return { path: '', message: error.message };
  }
  const path = issue.path
    .map((segment, index) => (typeof segment === 'number' ? `[${segment}]` : index === 0 ? segment : `.${segment}`))
    .join('');
  return { path, message: path ? `${path}: ${issue.message}` : issue.message };
}
