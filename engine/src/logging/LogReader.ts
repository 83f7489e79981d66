/**
 * Log Reader
 *
 * Reads back what FileSink wrote. Failed attempts and circuit rejections are
 * the records that carry a failure kind in their context.
 *
 * @module logging
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ErrorRecord, RecentErrorsQuery } from '../resilience/ErrorHandler.js';
import { FailureKind } from '../types/schemas.js';

const DAY_DIR = /^\d{4}-\d{2}-\d{2}$/;

const ErrorLineSchema = z.object({
  timestamp: z.string().datetime(),
  unit: z.string(),
  message: z.string(),
  detail: z.string().optional(),
  context: z.object({ kind: z.nativeEnum(FailureKind) }),
});

/**
 * Errors logged under `dir`, newest first
 *
 * Lines that are not JSON or carry no failure kind are skipped.
 */
export async function readRecentErrors(
  dir: string,
  query: RecentErrorsQuery = {},
  now: number = Date.now()
): Promise<ErrorRecord[]> {
  const since = query.withinMs === undefined ? -Infinity : now - query.withinMs;
  const firstDay = Number.isFinite(since) ? new Date(since).toISOString().slice(0, 10) : '';

  const days = (await listDirectory(dir)).filter((day) => DAY_DIR.test(day) && day >= firstDay).sort();
  const records: ErrorRecord[] = [];

  for (const day of days) {
    const files = (await listDirectory(join(dir, day))).filter((file) => file.endsWith('.jsonl')).sort();
    for (const file of files) {
      const content = await readFile(join(dir, day, file), 'utf-8');
      for (const line of content.split('\n')) {
        const record = parseErrorLine(line);
        if (!record || record.at < since || (query.unit !== undefined && record.unit !== query.unit)) {
          continue;
        }
        records.push(record);
      }
    }
  }

  return records.sort((a, b) => b.at - a.at);
}

function parseErrorLine(line: string): ErrorRecord | undefined {
  if (line.trim() === '') {
    return undefined;
  }
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = ErrorLineSchema.safeParse(value);
  if (!parsed.success || parsed.data.context.kind === FailureKind.CANCELLED) {
    return undefined;
  }
  const { timestamp, unit, message, detail, context } = parsed.data;
  return { at: Date.parse(timestamp), unit, kind: context.kind, message: detail ?? message };
}

async function listDirectory(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
