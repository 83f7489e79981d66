import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ConfigError, describeFirstIssue, ExitCodes, toError } from '../index.js';

describe('ConductorError', () => {
  it('should carry code, exit code and category name', () => {
    const error = ConfigError.invalid('Invalid configuration in conductor.yaml: bad', 'router', 'Check the field');

    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('CND-C-001');
    expect(error.exitCode).toBe(ExitCodes.INVALID_CONFIG);
    expect(error.toString()).toBe(
      'ConfigError [CND-C-001] at router: Invalid configuration in conductor.yaml: bad\nHint: Check the field'
    );
    expect(error.toJSON()).toMatchObject({ code: 'CND-C-001', exitCode: 103, path: 'router' });
  });

  it('should describe the first zod issue with a dotted path', () => {
    const result = z.object({ units: z.array(z.object({ name: z.string() })) }).safeParse({ units: [{}] });
    if (result.success) throw new Error('expected failure');

    expect(describeFirstIssue(result.error)).toEqual({ path: 'units[0].name', message: 'units[0].name: Required' });
  });

  it('should wrap thrown non-errors', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });
});
