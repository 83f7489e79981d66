import type { LogStatus } from './core-types.js';

/**
 * Log levels, lowest to highest
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.SILENT]: 100,
};

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LogLevelSeverity[level] >= LogLevelSeverity[threshold];
}

/**
 * One structured log record.
 *
 * Every state transition, invocation attempt, circuit change and workflow
 * step completion produces one of these.
 */
export interface LogRecord {
  /** ISO-8601 */
  timestamp: string;
  level: Exclude<LogLevel, LogLevel.SILENT>;
  /** Owning team (unit team, or the engine default) */
  team: string;
  /** Unit name, or the emitting component for engine-level messages */
  unit: string;
  status: LogStatus;
  message: string;
  detail?: string;
  /** Emitting component, e.g. 'ErrorHandler' */
  source: string;
  context?: Record<string, unknown>;
}

/**
 * Destination for log records. Writes are fire-and-forget: a sink that
 * throws or rejects never fails the operation being logged.
 */
export interface LogSink {
  write(record: LogRecord): void | Promise<void>;
}

export type LogFormat = 'text' | 'json';

export interface EngineLoggerConfig {
  level: LogLevel;
  /** Default team for records that do not name one */
  team?: string;
  /** Source identifier */
  source?: string;
  sinks?: LogSink[];
}

/**
 * Input to EngineLogger.record()
 */
export interface LogEntry {
  unit: string;
  status: LogStatus;
  message: string;
  detail?: string;
  team?: string;
  context?: Record<string, unknown>;
}
