import type { InvocationContext, Unit, UnitArgs, UnitPayload, UnitResult } from '../types/core-types.js';

export type UnitFunction = (
  args: UnitArgs,
  context: InvocationContext
) => Promise<UnitPayload | UnitResult | string>;

/**
 * In-process unit backed by an async function. A string result becomes the
 * summary; throw UnitFatalError for a failure that must not be retried.
 */
export class FunctionUnit implements Unit {
  constructor(private readonly fn: UnitFunction) {}

  async invoke(args: UnitArgs, context: InvocationContext): Promise<UnitResult> {
    const result = await this.fn(args, context);
    if (typeof result === 'string') {
      return { ok: true, payload: { summary: result, data: {} } };
    }
    if ('ok' in result) {
      return result;
    }
    return { ok: true, payload: result };
  }
}
