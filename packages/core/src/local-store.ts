/**
 * LocalStore - the contract the coordinator and the query builder hold against
 * an embedded relational database.
 *
 * Rows come back keyed by column name with the driver's native typing; nothing
 * here casts.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {KeyValue} from "./plain.js";

export type Row = Record<string, unknown>;

/** Values a statement can bind */
export type SqlValue = string | number | bigint | Uint8Array | null;

/** A compiled statement, frozen once built */
export interface Statement {
  readonly sql: string;
  readonly params: readonly SqlValue[];
}

/** What one execute reports about its own statement */
export interface ExecResult {
  readonly changes: number;
  /** Row id written by this statement; null unless it inserted a row */
  readonly lastInsertId: KeyValue | null;
}

export interface LocalStore {
  select(sql: string, params?: readonly SqlValue[]): Promise<Row[]>;
  execute(sql: string, params?: readonly SqlValue[]): Promise<ExecResult>;
  /** Column names of a table, empty when the table does not exist */
  getColumns(table: string): Promise<string[]>;

  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export const Transaction = StaticTypeCompanion({
  /** Commit when fn resolves, roll back and rethrow when it throws */
  async run<T>(store: LocalStore, fn: () => Promise<T>): Promise<T> {
    await store.beginTransaction();
    try {
      const result = await fn();
      await store.commit();
      return result;
    } catch (err) {
      await store.rollback();
      throw err;
    }
  },
});
