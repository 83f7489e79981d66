/**
 * Config Loader
 *
 * Reads conductor.yaml / conductor.json, validates it with zod and applies
 * environment overrides. Relative paths in a file are resolved against the
 * file's directory.
 *
 * @module core
 */

import { access, readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, toError } from '../errors/index.js';
import type { ConductorEngineConfig } from './EngineConfig.js';

export const CONFIG_FILE_NAMES = ['conductor.yaml', 'conductor.yml', 'conductor.json'] as const;

export const ENV_LOG_LEVEL = 'CONDUCTOR_LOG_LEVEL';
export const ENV_STATE_DIR = 'CONDUCTOR_STATE_DIR';
export const ENV_REPORTS_DIR = 'CONDUCTOR_REPORTS_DIR';

const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const UnitDefinitionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    team: z.string().optional(),
    keywords: z.array(z.string()).optional(),
    fallback: z.array(z.string()).optional(),
    timeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().nonnegative().optional(),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    cwd: z.string().optional(),
    env: z.record(z.string()).optional(),
    fatalExitCodes: z.array(z.number().int()).optional(),
    killGraceMs: z.number().int().nonnegative().optional(),
  })
  .strict();

const unitInterval = z.number().min(0).max(1);

export const ConfigFileSchema = z
  .object({
    logLevel: LogLevelNameSchema.optional(),
    logFormat: z.enum(['text', 'json']).optional(),
    logDir: z.string().optional(),
    team: z.string().optional(),
    store: z.enum(['file', 'sqlite', 'memory']).optional(),
    stateDir: z.string().optional(),
    reportsDir: z.string().optional(),
    router: z
      .object({
        confidenceFloor: unitInterval.optional(),
        directThreshold: unitInterval.optional(),
        directMargin: unitInterval.optional(),
        keywordWeight: unitInterval.optional(),
        semanticWeight: unitInterval.optional(),
      })
      .strict()
      .optional(),
    circuit: z
      .object({
        failureThreshold: z.number().int().positive().optional(),
        cooldownMs: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        maxRetries: z.number().int().nonnegative().optional(),
        baseBackoffMs: z.number().nonnegative().optional(),
        backoffMultiplier: z.number().min(1).optional(),
        maxBackoffMs: z.number().nonnegative().optional(),
        useFallback: z.boolean().optional(),
        maxFallbackHops: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    taskRetentionMs: z.number().int().nonnegative().optional(),
    units: z.array(UnitDefinitionSchema).optional(),
    templatesFile: z.string().optional(),
    includeDefaultTemplates: z.boolean().optional(),
    schedules: z
      .array(z.object({ template: z.string(), cron: z.string(), timezone: z.string().optional() }).strict())
      .optional(),
    timezone: z.string().optional(),
  })
  .strict();

export class ConfigLoader {
  /**
   * Parse and validate a YAML or JSON document
   *
   * @throws {ConfigError}
   */
  static parse(content: string, location: string): ConductorEngineConfig {
    let document: unknown;
    try {
      document = YAML.parse(content);
    } catch (error) {
      throw ConfigError.invalid(`Cannot parse configuration ${location}: ${toError(error).message}`);
    }

    // An empty file is an empty configuration
    const result = ConfigFileSchema.safeParse(document ?? {});
    if (!result.success) {
      throw ConfigError.fromZod(result.error, location);
    }
    return result.data;
  }

  /**
   * Load a configuration file, resolving its relative paths
   *
   * @throws {ConfigError} when unreadable or invalid
   */
  static async fromFile(filePath: string): Promise<ConductorEngineConfig> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw ConfigError.unreadable(filePath, toError(error).message);
    }
    return resolvePaths(ConfigLoader.parse(content, filePath), dirname(resolve(filePath)));
  }

  /**
   * The explicit file, else the first conductor.{yaml,yml,json} in `cwd`,
   * else an empty configuration; environment overrides applied last
   */
  static async load(
    filePath?: string,
    options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
  ): Promise<ConductorEngineConfig> {
    const cwd = options.cwd ?? process.cwd();
    let config: ConductorEngineConfig = {};

    if (filePath) {
      config = await ConfigLoader.fromFile(resolve(cwd, filePath));
    } else {
      for (const name of CONFIG_FILE_NAMES) {
        const candidate = resolve(cwd, name);
        if (await exists(candidate)) {
          config = await ConfigLoader.fromFile(candidate);
          break;
        }
      }
    }
    return ConfigLoader.applyEnv(config, options.env ?? process.env);
  }

  /**
   * @throws {ConfigError} when CONDUCTOR_LOG_LEVEL is not a level name
   */
  static applyEnv(config: ConductorEngineConfig, env: NodeJS.ProcessEnv): ConductorEngineConfig {
    const next = { ...config };

    const level = env[ENV_LOG_LEVEL];
    if (level) {
      const parsed = LogLevelNameSchema.safeParse(level.toLowerCase());
      if (!parsed.success) {
        throw ConfigError.invalid(
          `${ENV_LOG_LEVEL}="${level}" is not a log level`,
          ENV_LOG_LEVEL,
          'Use one of debug, info, warn, error, silent'
        );
      }
      next.logLevel = parsed.data;
    }
    if (env[ENV_STATE_DIR]) {
      next.stateDir = env[ENV_STATE_DIR];
    }
    if (env[ENV_REPORTS_DIR]) {
      next.reportsDir = env[ENV_REPORTS_DIR];
    }
    return next;
  }
}

function resolvePaths(config: ConductorEngineConfig, baseDir: string): ConductorEngineConfig {
  const at = (path: string | undefined) => (path === undefined || isAbsolute(path) ? path : resolve(baseDir, path));
  return {
    ...config,
    logDir: at(config.logDir),
    stateDir: at(config.stateDir),
    reportsDir: at(config.reportsDir),
    templatesFile: at(config.templatesFile),
    units: config.units?.map((unit) => ({ ...unit, cwd: at(unit.cwd) })),
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
