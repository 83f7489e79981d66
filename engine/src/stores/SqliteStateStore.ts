/**
 * SQLite State Store
 *
 * One table per store, one row per key, value stored as JSON text.
 *
 * @module stores
 */

import type { Database as DatabaseInstance } from 'better-sqlite3';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { describeFirstIssue, StoreError } from '../errors/index.js';
import type { KeyValueStore, RecordSchema } from './KeyValueStore.js';

export interface SqliteStateStoreConfig<T> {
  /** Database file; ':memory:' when neither this nor `database` is given */
  databasePath?: string;
  /** Shared connection; not closed by this store */
  database?: DatabaseInstance;
  table: string;
  schema: RecordSchema<T>;
}

const RowSchema = z.object({ key: z.string(), value: z.string() });
const TABLE_PATTERN = /^[a-z_][a-z0-9_]*$/;

export class SqliteStateStore<T> implements KeyValueStore<T> {
  private readonly db: DatabaseInstance;
  private readonly ownsDatabase: boolean;
  private readonly table: string;
  private readonly schema: RecordSchema<T>;

  constructor(config: SqliteStateStoreConfig<T>) {
    if (!TABLE_PATTERN.test(config.table)) {
      throw new RangeError(`Invalid table name "${config.table}"`);
    }
    this.ownsDatabase = config.database === undefined;
    this.db = config.database ?? new Database(config.databasePath ?? ':memory:');
    this.table = config.table;
    this.schema = config.schema;
    this.initSchema();
  }

  async get(key: string): Promise<T | undefined> {
    const row = this.db.prepare(`SELECT key, value FROM ${this.table} WHERE key = ?`).get(key);
    return row === undefined ? undefined : this.parseRow(row)[1];
  }

  async put(key: string, value: T): Promise<void> {
    this.db
      .prepare(`
        INSERT INTO ${this.table} (key, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          value = excluded.value,
          updated_at = excluded.updated_at
      `)
      .run(key, JSON.stringify(value), Date.now());
  }

  async delete(key: string): Promise<boolean> {
    const result = this.db.prepare(`DELETE FROM ${this.table} WHERE key = ?`).run(key);
    return result.changes > 0;
  }

  async keys(): Promise<string[]> {
    return this.db
      .prepare(`SELECT key, value FROM ${this.table} ORDER BY key`)
      .all()
      .map((row) => RowSchema.parse(row).key);
  }

  async entries(): Promise<Array<[string, T]>> {
    return this.db
      .prepare(`SELECT key, value FROM ${this.table} ORDER BY key`)
      .all()
      .map((row) => this.parseRow(row));
  }

  async close(): Promise<void> {
    if (this.ownsDatabase) {
      this.db.close();
    }
  }

  private parseRow(row: unknown): [string, T] {
    const { key, value } = RowSchema.parse(row);
    let json: unknown;
    try {
      json = JSON.parse(value);
    } catch (error) {
      throw StoreError.corrupt(this.table, key, error instanceof Error ? error.message : String(error));
    }
    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      throw StoreError.corrupt(this.table, key, describeFirstIssue(parsed.error).message);
    }
    return [key, parsed.data];
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
  }
}
