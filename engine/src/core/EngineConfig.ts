/**
 * Engine Configuration
 *
 * User-facing configuration for ConductorEngine. Every option is optional;
 * applyConfigDefaults fills in the rest.
 *
 * @module core
 */

import { DEFAULT_RETRY_POLICY, type RetryPolicyConfig } from '../automation/RetryPolicy.js';
import { DEFAULT_TASK_RETENTION_MS } from '../tasks/TaskRunner.js';
import type { LogFormat } from '../types/log-types.js';
import type { ProcessUnitConfig } from '../units/ProcessUnit.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Where checkpoints and circuit states live
 * - 'file': one JSON file per record under stateDir
 * - 'sqlite': conductor.db under stateDir
 * - 'memory': nothing survives the process
 */
export type StoreKind = 'file' | 'sqlite' | 'memory';

/**
 * A unit backed by a child process
 */
export interface ProcessUnitDefinition extends ProcessUnitConfig {
  name: string;
  description?: string;
  team?: string;
  keywords?: string[];
  fallback?: string[];
  timeoutMs?: number;
  maxRetries?: number;
}

export interface ScheduleDefinition {
  template: string;
  cron: string;
  timezone?: string;
}

/**
 * @example
 * ```ts
 * const config: ConductorEngineConfig = {
 *   logLevel: 'info',
 *   store: 'sqlite',
 *   units: [{ name: 'sys_health', command: './bin/health', keywords: ['health', 'cpu'] }],
 * };
 *
 * const engine = new ConductorEngine(config);
 * ```
 */
export interface ConductorEngineConfig {
  // === Logging ===

  /** @default 'info' */
  logLevel?: LogLevelName;
  /** @default 'text' */
  logFormat?: LogFormat;
  /** Directory for JSON-lines log files; no file logging when unset */
  logDir?: string;
  /** Team for records whose unit names none @default 'core' */
  team?: string;

  // === Storage ===

  /** @default 'file' */
  store?: StoreKind;
  /** @default '.conductor/state' */
  stateDir?: string;
  /** @default '.conductor/reports' */
  reportsDir?: string;

  // === Routing ===

  router?: {
    /** @default 0.6 */
    confidenceFloor?: number;
    /** @default 0.85 */
    directThreshold?: number;
    /** @default 0.15 */
    directMargin?: number;
    /** @default 0.4 */
    keywordWeight?: number;
    /** @default 0.6 */
    semanticWeight?: number;
  };

  // === Resilience ===

  circuit?: {
    /** @default 5 */
    failureThreshold?: number;
    /** @default 60000 */
    cooldownMs?: number;
  };
  retry?: Partial<RetryPolicyConfig>;

  /** How long finished tasks stay listable @default 24h */
  taskRetentionMs?: number;

  // === Units & workflows ===

  units?: ProcessUnitDefinition[];
  /** Extra template file (YAML or JSON) */
  templatesFile?: string;
  /** Load the shipped templates whose units are registered @default true */
  includeDefaultTemplates?: boolean;
  schedules?: ScheduleDefinition[];
  /** Timezone for schedules that name none */
  timezone?: string;
}

export interface ResolvedEngineConfig {
  logLevel: LogLevelName;
  logFormat: LogFormat;
  logDir?: string;
  team: string;
  store: StoreKind;
  stateDir: string;
  reportsDir: string;
  router: Required<NonNullable<ConductorEngineConfig['router']>>;
  circuit: Required<NonNullable<ConductorEngineConfig['circuit']>>;
  retry: RetryPolicyConfig;
  taskRetentionMs: number;
  units: ProcessUnitDefinition[];
  templatesFile?: string;
  includeDefaultTemplates: boolean;
  schedules: ScheduleDefinition[];
  timezone?: string;
}

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: ConductorEngineConfig = {}): ResolvedEngineConfig {
  return {
    logLevel: config.logLevel ?? 'info',
    logFormat: config.logFormat ?? 'text',
    logDir: config.logDir,
    team: config.team ?? 'core',
    store: config.store ?? 'file',
    stateDir: config.stateDir ?? '.conductor/state',
    reportsDir: config.reportsDir ?? '.conductor/reports',
    router: {
      confidenceFloor: config.router?.confidenceFloor ?? 0.6,
      directThreshold: config.router?.directThreshold ?? 0.85,
      directMargin: config.router?.directMargin ?? 0.15,
      keywordWeight: config.router?.keywordWeight ?? 0.4,
      semanticWeight: config.router?.semanticWeight ?? 0.6,
    },
    circuit: {
      failureThreshold: config.circuit?.failureThreshold ?? 5,
      cooldownMs: config.circuit?.cooldownMs ?? 60_000,
    },
    retry: { ...DEFAULT_RETRY_POLICY, ...config.retry },
    taskRetentionMs: config.taskRetentionMs ?? DEFAULT_TASK_RETENTION_MS,
    units: config.units ?? [],
    templatesFile: config.templatesFile,
    includeDefaultTemplates: config.includeDefaultTemplates ?? true,
    schedules: config.schedules ?? [],
    timezone: config.timezone,
  };
}
