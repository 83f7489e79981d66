/**
 * Routing errors
 *
 * @module errors
 */

import { ConductorError } from './ConductorError.js';
import { ConductorErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * Routing found no unit above the confidence floor.
 * Always surfaced to the caller; an execution that hits it ends FAILED.
 */
export class NoCandidateError extends ConductorError {
  constructor(
    public readonly request: string,
    public readonly floor: number,
    bestScore?: number
  ) {
    super({
      code: ConductorErrorCode.ROUTING_NO_CANDIDATE,
      message: bestScore === undefined
        ? `No unit could handle "${request}"`
        : `No unit scored above ${floor} for "${request}" (best: ${bestScore.toFixed(2)})`,
      hint: 'Rephrase the request, add keywords to a unit, or name the units explicitly',
      severity: ErrorSeverity.ERROR,
      context: { request, floor, bestScore },
    });
  }
}
