/**
 * Storage errors
 *
 * @module errors
 */

import { ConductorError } from './ConductorError.js';
import { ConductorErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class StoreError extends ConductorError {
  static corrupt(location: string, key: string, reason: string): StoreError {
    return new StoreError({
      code: ConductorErrorCode.STORE_CORRUPT,
      message: `Record "${key}" in ${location} could not be read: ${reason}`,
      hint: 'Delete the record to discard it, or restore it from a backup',
      severity: ErrorSeverity.ERROR,
      context: { location, key },
    });
  }

  static reportConflict(runId: string, stepIndex: number): StoreError {
    return new StoreError({
      code: ConductorErrorCode.STORE_REPORT_CONFLICT,
      message: `Report for step ${stepIndex} of run "${runId}" was already written`,
      severity: ErrorSeverity.ERROR,
      context: { runId, stepIndex },
    });
  }

  static reportNotFound(runId: string, file: string): StoreError {
    return new StoreError({
      code: ConductorErrorCode.STORE_NOT_FOUND,
      message: `Run "${runId}" has no report "${file}"`,
      hint: 'List stored runs and their files with: conductor reports list',
      severity: ErrorSeverity.ERROR,
      context: { runId, file },
    });
  }
}
