/**
 * Base Conductor Error Class
 *
 * Foundation for all engine errors. Carries a structured diagnostic so the
 * CLI, logs and JSON output can all describe a failure the same way.
 *
 * ARCHITECTURE:
 * - Error codes (CND-X-NNN): structured identification
 * - Exit codes: process exit status for shell scripts
 * - Severity levels: CRITICAL, ERROR, WARNING, INFO
 * - Context + hints: help users debug and fix issues
 *
 * @module errors
 */

import {
  ConductorErrorCode,
  ErrorSeverity,
  ExitCodes,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  isRetryable,
  isUserError,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface ConductorErrorDiagnostic {
  /** Structured error code (e.g., CND-R-001) */
  code: ConductorErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code, derived from the code when omitted */
  exitCode?: ExitCodes;

  /** Location of the problem (e.g., "templates[1].steps[2].unit") */
  path?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all conductor errors
 *
 * @example
 * ```typescript
 * throw new ConductorError({
 *   code: ConductorErrorCode.CONFIG_INVALID,
 *   message: 'units[0].name is required',
 *   path: 'units[0].name',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class ConductorError extends Error {
  public readonly diagnostic: ConductorErrorDiagnostic & { exitCode: ExitCodes };

  public readonly timestamp: Date;

  constructor(diagnostic: ConductorErrorDiagnostic) {
    super(diagnostic.message);
    this.name = getErrorCategory(diagnostic.code);
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): ConductorErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCodes {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get context(): Record<string, unknown> | undefined {
    return this.diagnostic.context;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if the user can fix this by changing configuration or input
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  get isRetryable(): boolean {
    return isRetryable(this.code);
  }

  /**
   * Format error for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\nHint: ${this.hint}`;
    }

    return msg;
  }

  /**
   * Detailed multi-line rendering used by verbose CLI output
   */
  toDetailedString(): string {
    const lines = [
      '─'.repeat(70),
      `${this.name}`,
      '─'.repeat(70),
      `Error Code:    ${this.code}`,
      `Exit Code:     ${this.exitCode}`,
      `Severity:      ${this.severity.toUpperCase()}`,
      `Timestamp:     ${this.timestamp.toISOString()}`,
      `User Fixable:  ${this.isUserError ? 'Yes' : 'No'}`,
      `Retryable:     ${this.isRetryable ? 'Yes' : 'No'}`,
    ];

    if (this.path) {
      lines.push(`Location:      ${this.path}`);
    }

    lines.push('', 'Message:', `   ${this.message}`);
    lines.push('', 'Description:', `   ${this.description}`);

    if (this.hint) {
      lines.push('', 'Hint:', `   ${this.hint}`);
    }

    const context = this.diagnostic.context;
    if (context && Object.keys(context).length > 0) {
      lines.push('', 'Context:');
      for (const [key, value] of Object.entries(context)) {
        lines.push(`   ${key}: ${JSON.stringify(value)}`);
      }
    }

    lines.push('─'.repeat(70));
    return lines.join('\n');
  }

  /**
   * Structured form for JSON logs and the CLI json formatter
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      description: this.description,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Normalise anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
