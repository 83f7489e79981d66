import { LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import { EngineLogger } from './EngineLogger.js';
import { ConsoleSink } from './sinks.js';

/**
 * Singleton Logger Manager
 *
 * Process-wide access to the engine logger without threading it through
 * every constructor. Components still accept an injected logger and fall
 * back to this one.
 *
 * Usage:
 * ```typescript
 * // In the entry point (ConductorEngine, CLI)
 * LoggerManager.initialize({ level: LogLevel.INFO, team: 'core', sinks: [new ConsoleSink()] });
 *
 * // Anywhere else
 * const logger = LoggerManager.getLogger().child('WorkflowCoordinator');
 * ```
 */
export class LoggerManager {
    private static instance: EngineLogger | null = null;
    private static configured = false;

    /**
     * Initialize the logger instance (call once in the entry point)
     */
    static initialize(config: EngineLoggerConfig): EngineLogger {
        if (this.instance && this.configured) {
            this.instance.warn('LoggerManager already initialized, returning existing instance');
            return this.instance;
        }

        // Replaces the lazily created default, if any
        this.instance = new EngineLogger({ source: 'Conductor', team: 'core', ...config });
        this.configured = true;
        this.instance.debug('LoggerManager initialized', {
            level: config.level,
            team: config.team,
            sinks: config.sinks?.length ?? 0,
        });
        return this.instance;
    }

    /**
     * Get the logger instance.
     *
     * Before initialize() this lazily creates a warn-level console logger so
     * library callers that never configure logging still see problems.
     */
    static getLogger(): EngineLogger {
        if (!this.instance) {
            this.instance = new EngineLogger({
                level: LogLevel.WARN,
                source: 'Conductor',
                sinks: [new ConsoleSink('text', true)],
            });
        }
        return this.instance;
    }

    static isReady(): boolean {
        return this.configured;
    }

    /**
     * Reset the logger instance (useful for testing)
     */
    static reset(): void {
        this.instance = null;
        this.configured = false;
    }
}
