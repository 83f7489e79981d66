/**
 * Folds settled candidate results into the aggregate an execution completes
 * with. Successes contribute their payload, failures a structured note.
 *
 * @module supervisor
 */

import {
  FailureKind,
  type AggregateEntry,
  type AggregateResult,
  type CandidateResult,
  type Outcome,
  type PriorResult,
} from '../types/core-types.js';

export function aggregateResults(results: readonly CandidateResult[]): AggregateResult {
  const entries = [...results].sort((a, b) => a.index - b.index).map(toEntry);
  const successCount = entries.filter((entry) => entry.status === 'success').length;

  return {
    allFailed: successCount === 0,
    successCount,
    failureCount: entries.length - successCount,
    entries,
    text: entries.map(renderEntry).join('\n'),
  };
}

function toEntry(result: CandidateResult): AggregateEntry {
  const { outcome } = result;
  const base = { index: result.index, unitName: result.unitName };

  switch (outcome.status) {
    case 'success':
      return {
        ...base,
        status: 'success',
        resolvedBy: outcome.resolvedBy,
        summary: outcome.payload.summary,
        data: outcome.payload.data,
      };
    case 'failure':
      return {
        ...base,
        status: 'failure',
        note: {
          kind: outcome.failure.kind,
          message: outcome.failure.message,
          fallbacksTried: outcome.fallbacksTried,
        },
      };
    case 'cancelled':
      return {
        ...base,
        status: 'cancelled',
        note: {
          kind: FailureKind.CANCELLED,
          message: outcome.message,
          fallbacksTried: outcome.fallbacksTried,
        },
      };
  }
}

function renderEntry(entry: AggregateEntry): string {
  if (entry.status === 'success') {
    const via = entry.resolvedBy && entry.resolvedBy !== entry.unitName ? ` (via ${entry.resolvedBy})` : '';
    return `[${entry.unitName}]${via} ${entry.summary ?? ''}`;
  }

  const note = entry.note;
  if (!note) {
    return `[${entry.unitName}] ${entry.status}`;
  }
  const fallbacks = note.fallbacksTried.length > 0 ? ` (fallbacks tried: ${note.fallbacksTried.join(', ')})` : '';
  return `[${entry.unitName}] ${note.kind}: ${note.message}${fallbacks}`;
}

/**
 * Condensed form of an outcome handed to later units as auxiliary context
 */
export function toPriorResult(outcome: Outcome): PriorResult {
  switch (outcome.status) {
    case 'success':
      return { unit: outcome.resolvedBy, status: 'success', summary: outcome.payload.summary };
    case 'failure':
      return { unit: outcome.unit, status: 'failure', summary: outcome.failure.message };
    case 'cancelled':
      return { unit: outcome.unit, status: 'cancelled', summary: outcome.message };
  }
}
