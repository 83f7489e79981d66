/**
 * Key-value persistence for checkpoints (keyed by execution id) and circuit
 * states (keyed by unit name). Every put overwrites; last writer wins.
 *
 * @module stores
 */

import type { z } from 'zod';

export interface KeyValueStore<T> {
  get(key: string): Promise<T | undefined>;
  put(key: string, value: T): Promise<void>;
  delete(key: string): Promise<boolean>;
  /** Keys in ascending order */
  keys(): Promise<string[]>;
  entries(): Promise<Array<[string, T]>>;
  close?(): Promise<void>;
}

/**
 * Schema a store parses records back through. Input is unknown because the
 * data comes from disk.
 */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;
