/**
 * @module sqlite-store
 * Row access to a SQLite database held in memory.
 *
 * The database is deserialized straight from the input bytes, so nothing is
 * written to disk. Every SQLite failure surfaces as a `BrushDecodeError`.
 */

import Database from 'better-sqlite3';
import { createDecodeError, type BrushDecodeError } from '@brushtex/core';

/** One result row keyed by column name. */
export type StoreRow = Record<string, unknown>;

/** Minimal query surface the container decoder needs. */
export interface BrushStore {
  hasTable(name: string): boolean;
  /** First row of a query, or undefined when it returns none. */
  firstRow(sql: string): StoreRow | undefined;
  allRows(sql: string): StoreRow[];
  close(): void;
}

/** Opens a store over the bytes of a database file. */
export type StoreOpener = (bytes: Uint8Array) => BrushStore;

function isRow(value: unknown): value is StoreRow {
  return typeof value === 'object' && value !== null;
}

function storeError(message: string, err: unknown): BrushDecodeError {
  return createDecodeError('MalformedHeader', message, { cause: err instanceof Error ? err : undefined });
}

/**
 * Open a better-sqlite3 database deserialized from `bytes`.
 * @throws BrushDecodeError (`MalformedHeader`) when SQLite rejects the bytes.
 */
export function openSqliteStore(bytes: Uint8Array): BrushStore {
  let db: Database.Database;
  try {
    db = new Database(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  } catch (err) {
    throw storeError('Database could not be opened', err);
  }

  const query = <T>(sql: string, run: (statement: Database.Statement) => T): T => {
    try {
      return run(db.prepare(sql));
    } catch (err) {
      throw storeError(`Query failed: ${sql}`, err);
    }
  };

  return {
    hasTable: (name) =>
      query("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?", (statement) =>
        isRow(statement.get(name)),
      ),
    firstRow: (sql) =>
      query(sql, (statement) => {
        const row: unknown = statement.get();
        return isRow(row) ? row : undefined;
      }),
    allRows: (sql) =>
      query(sql, (statement) => {
        const rows: unknown[] = statement.all();
        return rows.filter(isRow);
      }),
    close: () => db.close(),
  };
}

/**
 * Run `fn` against a store opened over `bytes` and close the store on
 * every exit path.
 */
export function withBrushStore<T>(bytes: Uint8Array, open: StoreOpener, fn: (store: BrushStore) => T): T {
  const store = open(bytes);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}
