import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import { ConfigLoader } from '../ConfigLoader.js';
import { applyConfigDefaults } from '../EngineConfig.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'conductor-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('ConfigLoader', () => {
  it('should parse a YAML configuration', () => {
    const config = ConfigLoader.parse(
      [
        'logLevel: debug',
        'store: sqlite',
        'circuit:',
        '  failureThreshold: 3',
        'units:',
        '  - name: sys_health',
        '    command: ./bin/health',
        '    keywords: [cpu, memory]',
        '    fatalExitCodes: [2]',
      ].join('\n'),
      'conductor.yaml'
    );

    expect(config).toEqual({
      logLevel: 'debug',
      store: 'sqlite',
      circuit: { failureThreshold: 3 },
      units: [{ name: 'sys_health', command: './bin/health', keywords: ['cpu', 'memory'], fatalExitCodes: [2] }],
    });
  });

  it('should treat an empty document as an empty configuration', () => {
    expect(ConfigLoader.parse('', 'conductor.yaml')).toEqual({});
  });

  it('should reject unknown keys with the offending path', () => {
    try {
      ConfigLoader.parse('router:\n  confidenceFlor: 0.5\n', 'conductor.yaml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.path).toBe('router');
        expect(error.message).toContain('Invalid configuration in conductor.yaml');
      }
    }
  });

  it('should reject a unit without a command', () => {
    expect(() => ConfigLoader.parse('units:\n  - name: backup\n', 'conductor.yaml')).toThrow(
      'Invalid configuration in conductor.yaml: units[0].command: Required'
    );
  });

  it('should resolve relative paths against the file directory', async () => {
    const file = join(dir, 'conductor.yaml');
    await writeFile(file, 'stateDir: state\nreportsDir: /var/reports\nunits:\n  - name: u\n    command: run\n    cwd: tools\n');

    const config = await ConfigLoader.fromFile(file);

    expect(config.stateDir).toBe(join(dir, 'state'));
    expect(config.reportsDir).toBe('/var/reports');
    expect(config.units?.[0]?.cwd).toBe(join(dir, 'tools'));
  });

  it('should find conductor.yaml in the working directory', async () => {
    await writeFile(join(dir, 'conductor.yaml'), 'team: ops\n');

    await expect(ConfigLoader.load(undefined, { cwd: dir, env: {} })).resolves.toMatchObject({ team: 'ops' });
  });

  it('should return an empty configuration when no file exists', async () => {
    await expect(ConfigLoader.load(undefined, { cwd: dir, env: {} })).resolves.toEqual({});
  });

  it('should report an unreadable explicit file', async () => {
    await expect(ConfigLoader.load('missing.yaml', { cwd: dir, env: {} })).rejects.toThrow(ConfigError);
  });

  it('should apply environment overrides last', () => {
    const config = ConfigLoader.applyEnv(
      { logLevel: 'info', stateDir: 'a' },
      { CONDUCTOR_LOG_LEVEL: 'WARN', CONDUCTOR_STATE_DIR: '/tmp/state', CONDUCTOR_REPORTS_DIR: '/tmp/reports' }
    );

    expect(config).toEqual({ logLevel: 'warn', stateDir: '/tmp/state', reportsDir: '/tmp/reports' });
  });

  it('should reject an unknown log level from the environment', () => {
    expect(() => ConfigLoader.applyEnv({}, { CONDUCTOR_LOG_LEVEL: 'loud' })).toThrow(
      'CONDUCTOR_LOG_LEVEL="loud" is not a log level'
    );
  });
});

describe('applyConfigDefaults', () => {
  it('should fill in every default', () => {
    const config = applyConfigDefaults();

    expect(config).toMatchObject({
      logLevel: 'info',
      store: 'file',
      stateDir: '.conductor/state',
      reportsDir: '.conductor/reports',
      router: { confidenceFloor: 0.6, directThreshold: 0.85, directMargin: 0.15 },
      circuit: { failureThreshold: 5, cooldownMs: 60_000 },
      retry: { maxRetries: 2, baseBackoffMs: 1000, backoffMultiplier: 2, maxBackoffMs: 30000 },
      includeDefaultTemplates: true,
      units: [],
    });
  });

  it('should keep explicit retry settings over the defaults', () => {
    expect(applyConfigDefaults({ retry: { baseBackoffMs: 10 } }).retry).toMatchObject({
      baseBackoffMs: 10,
      backoffMultiplier: 2,
    });
  });
});
