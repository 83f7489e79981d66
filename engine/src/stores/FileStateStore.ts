/**
 * File State Store
 *
 * One JSON file per key under a directory. Writes go to a temporary file
 * that is renamed over the target, so a crash mid-write leaves the previous
 * record intact.
 *
 * @module stores
 */

import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describeFirstIssue, StoreError } from '../errors/index.js';
import type { KeyValueStore, RecordSchema } from './KeyValueStore.js';

const EXTENSION = '.json';

export class FileStateStore<T> implements KeyValueStore<T> {
  private ready: Promise<void> | null = null;
  private writeSeq = 0;

  constructor(
    private readonly dir: string,
    private readonly schema: RecordSchema<T>
  ) {}

  async get(key: string): Promise<T | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
    return this.parse(key, raw);
  }

  async put(key: string, value: T): Promise<void> {
    await this.ensureDir();
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.${++this.writeSeq}.tmp`;
    await writeFile(temp, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    await rename(temp, target);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async keys(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
    return files
      .filter((file) => file.endsWith(EXTENSION))
      .map((file) => decodeURIComponent(file.slice(0, -EXTENSION.length)))
      .sort();
  }

  async entries(): Promise<Array<[string, T]>> {
    const result: Array<[string, T]> = [];
    for (const key of await this.keys()) {
      const value = await this.get(key);
      if (value !== undefined) {
        result.push([key, value]);
      }
    }
    return result;
  }

  private parse(key: string, raw: string): T {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw StoreError.corrupt(this.dir, key, error instanceof Error ? error.message : String(error));
    }
    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      throw StoreError.corrupt(this.dir, key, describeFirstIssue(parsed.error).message);
    }
    return parsed.data;
  }

  private pathFor(key: string): string {
    return join(this.dir, `${encodeURIComponent(key)}${EXTENSION}`);
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.dir, { recursive: true }).then(() => undefined);
      void this.ready.catch(() => {
        this.ready = null;
      });
    }
    return this.ready;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
