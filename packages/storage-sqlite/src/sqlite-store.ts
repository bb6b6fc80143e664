/**
 * SqliteLocalStore - LocalStore backed by better-sqlite3.
 *
 * One connection per store, shared by every caller. Statements run
 * synchronously inside the driver; the async surface matches the LocalStore
 * contract so other engines can slot in.
 */

import Database from "better-sqlite3";
import {
  isKeyValue,
  isPlainObject,
  LifecycleManager,
  Logger,
  type ExecResult,
  type KeyValue,
  type Lifecycle,
  type LocalStore,
  type Row,
  type SqlValue,
} from "@tandem/core";
import {ErrTransactionState} from "./errors.js";
import {QueryBuilder} from "./query-builder.js";

export interface SqliteLocalStoreOptions {
  logger?: Logger;
}

export class SqliteLocalStore implements LocalStore, Lifecycle {
  readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly schemaCache = new Map<string, string[]>();

  lifecycle = LifecycleManager.on({
    stop: () => { this.close(); },
  });

  constructor(db: Database.Database, opts: SqliteLocalStoreOptions = {}) {
    this.db = db;
    this.logger = opts.logger ?? Logger.silent();
  }

  /** Open (creating if needed) the database at `path`; ":memory:" for a private in-memory one. */
  static open(path: string, opts: SqliteLocalStoreOptions = {}): SqliteLocalStore {
    return new SqliteLocalStore(new Database(path), opts);
  }

  /** A fresh builder on `table` */
  table(table: string): QueryBuilder {
    return new QueryBuilder(this, table);
  }

  // --------------------------------------------------------------------------
  // LocalStore
  // --------------------------------------------------------------------------

  async select(sql: string, params: readonly SqlValue[] = []): Promise<Row[]> {
    const rows = this.timed(sql, params, () => this.db.prepare(sql).all(...bindings(params)));
    return rows.filter(isPlainObject);
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<ExecResult> {
    const { changes, lastInsertRowid } = this.timed(sql, params, () => this.db.prepare(sql).run(...bindings(params)));
    const inserted = changes > 0 && /^\s*insert/i.test(sql);
    return { changes, lastInsertId: inserted ? rowId(lastInsertRowid) : null };
  }

  /** Cached per table; unknown tables are not cached so they can appear later */
  async getColumns(table: string): Promise<string[]> {
    const cached = this.schemaCache.get(table);
    if (cached) return [...cached];

    const rows = await this.select("SELECT name FROM pragma_table_info(?)", [table]);
    const columns = rows.map((r) => r["name"]).filter((n): n is string => typeof n === "string");
    if (columns.length > 0) this.schemaCache.set(table, columns);
    return [...columns];
  }

  clearSchemaCache(table?: string): void {
    if (table === undefined) this.schemaCache.clear();
    else this.schemaCache.delete(table);
  }

  async beginTransaction(): Promise<void> {
    if (this.db.inTransaction) throw ErrTransactionState.create({ action: "begin" });
    this.timed("BEGIN", [], () => this.db.exec("BEGIN"));
  }

  async commit(): Promise<void> {
    if (!this.db.inTransaction) throw ErrTransactionState.create({ action: "commit" });
    this.timed("COMMIT", [], () => this.db.exec("COMMIT"));
  }

  async rollback(): Promise<void> {
    if (!this.db.inTransaction) throw ErrTransactionState.create({ action: "rollback" });
    this.timed("ROLLBACK", [], () => this.db.exec("ROLLBACK"));
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /** Run a statement and log it at debug with its duration; driver errors propagate as thrown */
  private timed<T>(sql: string, params: readonly SqlValue[], run: () => T): T {
    const started = performance.now();
    let failed = true;
    try {
      const result = run();
      failed = false;
      return result;
    } finally {
      if (this.logger.enabled("debug")) {
        const durationMs = Math.round((performance.now() - started) * 1000) / 1000;
        this.logger.debug(failed ? "statement failed" : "statement", { sql, params, durationMs });
      }
    }
  }
}

/** better-sqlite3 binds Buffers, not bare Uint8Arrays */
function bindings(params: readonly SqlValue[]): SqlValue[] {
  return params.map((p) => (p instanceof Uint8Array && !Buffer.isBuffer(p) ? Buffer.from(p) : p));
}

function rowId(value: number | bigint): KeyValue | null {
  if (typeof value === "bigint") {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
  }
  return isKeyValue(value) ? value : null;
}
