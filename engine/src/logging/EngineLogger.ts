/**
 * Engine Logger
 *
 * Structured logging for the engine. Every call produces one LogRecord that
 * is handed to each configured sink. Sinks may be sync or async; failures are
 * reported on stderr and otherwise dropped so logging never fails the caller.
 *
 * @module logging
 */

import type { LogStatus } from '../types/core-types.js';
import {
  LogLevel,
  shouldLog,
  type EngineLoggerConfig,
  type LogEntry,
  type LogRecord,
  type LogSink,
} from '../types/log-types.js';

const STATUS_LEVEL: Record<LogStatus, Exclude<LogLevel, LogLevel.SILENT>> = {
  start: LogLevel.INFO,
  success: LogLevel.INFO,
  complete: LogLevel.INFO,
  info: LogLevel.INFO,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
};

interface LoggerState {
  level: LogLevel;
  team: string;
  sinks: LogSink[];
  pending: Set<Promise<void>>;
}

export class EngineLogger {
  private state: LoggerState;
  private readonly source: string;

  constructor(config: EngineLoggerConfig) {
    this.state = {
      level: config.level,
      team: config.team ?? 'core',
      sinks: [...(config.sinks ?? [])],
      pending: new Set(),
    };
    this.source = config.source ?? 'Conductor';
  }

  /**
   * Logger for a sub-component sharing level, team and sinks
   */
  child(source: string): EngineLogger {
    const child = new EngineLogger({ level: this.state.level, source });
    child.state = this.state;
    return child;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, 'info', this.source, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, 'info', this.source, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, 'warning', this.source, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'error', this.source, message, error?.message, context);
  }

  /**
   * Record a unit-level event (attempt, transition, step completion)
   */
  record(entry: LogEntry): void {
    this.emit(
      STATUS_LEVEL[entry.status],
      entry.status,
      entry.unit,
      entry.message,
      entry.detail,
      entry.context,
      entry.team
    );
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.state.level);
  }

  addSink(sink: LogSink): void {
    this.state.sinks.push(sink);
  }

  /**
   * Wait for async sink writes still in flight
   */
  async flush(): Promise<void> {
    await Promise.all([...this.state.pending]);
  }

  private emit(
    level: Exclude<LogLevel, LogLevel.SILENT>,
    status: LogStatus,
    unit: string,
    message: string,
    detail?: string,
    context?: Record<string, unknown>,
    team?: string
  ): void {
    if (!shouldLog(level, this.state.level)) {
      return;
    }

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      team: team ?? this.state.team,
      unit,
      status,
      message,
      source: this.source,
    };
    if (detail !== undefined) record.detail = detail;
    if (context !== undefined) record.context = context;

    for (const sink of this.state.sinks) {
      try {
        const result = sink.write(record);
        if (result) {
          const tracked: Promise<void> = result
            .catch((error: unknown) => reportSinkFailure(error))
            .finally(() => this.state.pending.delete(tracked));
          this.state.pending.add(tracked);
        }
      } catch (error) {
        reportSinkFailure(error);
      }
    }
  }
}

function reportSinkFailure(error: unknown): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[EngineLogger] sink write failed: ${reason}\n`);
}

/**
 * Logger that drops everything, for tests and library callers that opt out
 */
export function createSilentLogger(): EngineLogger {
  return new EngineLogger({ level: LogLevel.SILENT });
}
