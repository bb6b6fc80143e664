/**
 * QueryBuilder - fluent accumulator over one table, executed against a LocalStore.
 *
 *   const adults = await new QueryBuilder(store, "users")
 *     .where("age", ">=", 18)
 *     .where("status", "active")
 *     .orderBy("id", "desc")
 *     .limit(10)
 *     .get();
 *
 * Chain methods return the same builder. Each builder runs exactly one
 * terminal operation; anything called on it afterwards throws
 * storage.query_consumed. Rows come back with the driver's typing.
 */

import type {KeyValue, LocalStore, Row, Statement} from "@tandem/core";
import {ErrQueryConsumed} from "./errors.js";
import {SqliteGrammar, type OrderClause, type QuerySpec, type WhereClause} from "./grammar.js";

export class QueryBuilder {
  private columns: string[] = [];
  private wheres: WhereClause[] = [];
  private orders: OrderClause[] = [];
  private limitValue: number | null = null;
  private offsetValue: number | null = null;
  private consumed = false;

  readonly table: string;

  constructor(private readonly store: LocalStore, table: string) {
    this.table = SqliteGrammar.identifier(table);
  }

  // --------------------------------------------------------------------------
  // Chain
  // --------------------------------------------------------------------------

  select(...columns: (string | readonly string[])[]): this {
    this.ensureOpen();
    for (const c of columns.flat()) {
      this.columns.push(c === "*" ? c : SqliteGrammar.identifier(c));
    }
    return this;
  }

  /**
   * `where(col, value)` compares with `=`; `where(col, op, value)` with op.
   * A null value turns `=` into IS NULL and `!=` into IS NOT NULL.
   */
  where(column: string, ...args: [value: unknown] | [operator: string, value: unknown]): this {
    this.ensureOpen();
    const col = SqliteGrammar.identifier(column);
    const op = SqliteGrammar.operator(args.length === 1 ? "=" : args[0]);
    const value = args.length === 1 ? args[0] : args[1];

    if (value === null || value === undefined) {
      if (op === "=") return this.push({ column: col, operator: "IS NULL" });
      if (op === "!=") return this.push({ column: col, operator: "IS NOT NULL" });
    }
    return this.push({ column: col, operator: op, value });
  }

  whereNull(column: string): this {
    this.ensureOpen();
    return this.push({ column: SqliteGrammar.identifier(column), operator: "IS NULL" });
  }

  whereNotNull(column: string): this {
    this.ensureOpen();
    return this.push({ column: SqliteGrammar.identifier(column), operator: "IS NOT NULL" });
  }

  orderBy(column: string, direction: string = "asc"): this {
    this.ensureOpen();
    this.orders.push({ column: SqliteGrammar.identifier(column), direction: SqliteGrammar.direction(direction) });
    return this;
  }

  limit(n: number): this {
    this.ensureOpen();
    this.limitValue = SqliteGrammar.limit(n);
    return this;
  }

  offset(n: number): this {
    this.ensureOpen();
    this.offsetValue = SqliteGrammar.offset(n);
    return this;
  }

  /** The SELECT this builder would run, without consuming it */
  toSql(): Statement {
    this.ensureOpen();
    return SqliteGrammar.compileSelect(this.spec());
  }

  // --------------------------------------------------------------------------
  // Terminal operations
  // --------------------------------------------------------------------------

  async get(): Promise<Row[]> {
    this.consume();
    return this.runSelect(SqliteGrammar.compileSelect(this.spec()));
  }

  async first(): Promise<Row | null> {
    this.consume();
    const rows = await this.runSelect(SqliteGrammar.compileSelect({ ...this.spec(), limit: 1 }));
    return rows[0] ?? null;
  }

  async value(column: string): Promise<unknown> {
    this.consume();
    const col = SqliteGrammar.identifier(column);
    const rows = await this.runSelect(SqliteGrammar.compileSelect({ ...this.spec(), columns: [col], limit: 1 }));
    return rows[0]?.[col] ?? null;
  }

  async pluck(column: string): Promise<unknown[]> {
    this.consume();
    const col = SqliteGrammar.identifier(column);
    const rows = await this.runSelect(SqliteGrammar.compileSelect({ ...this.spec(), columns: [col] }));
    return rows.map((row) => row[col] ?? null);
  }

  async count(): Promise<number> {
    this.consume();
    return this.countRows();
  }

  async exists(): Promise<boolean> {
    this.consume();
    return (await this.countRows()) > 0;
  }

  /** Insert one row; resolves to the last insert id */
  async insert(row: Record<string, unknown>): Promise<KeyValue | null> {
    this.consume();
    return this.insertRow(row);
  }

  /**
   * Insert rows one by one. Each insert commits on its own; wrap the call in
   * Transaction.run for all-or-nothing.
   */
  async insertAll(rows: readonly Record<string, unknown>[]): Promise<(KeyValue | null)[]> {
    this.consume();
    const ids: (KeyValue | null)[] = [];
    for (const row of rows) {
      ids.push(await this.insertRow(row));
    }
    return ids;
  }

  /** Resolves to the affected row count; an empty row changes nothing */
  async update(row: Record<string, unknown>): Promise<number> {
    this.consume();
    if (Object.keys(row).length === 0) return 0;
    const stmt = SqliteGrammar.compileUpdate(this.spec(), row);
    const { changes } = await this.store.execute(stmt.sql, stmt.params);
    return changes;
  }

  async delete(): Promise<number> {
    this.consume();
    const stmt = SqliteGrammar.compileDelete(this.spec());
    const { changes } = await this.store.execute(stmt.sql, stmt.params);
    return changes;
  }

  async truncate(): Promise<void> {
    this.consume();
    const stmt = SqliteGrammar.compileTruncate(this.table);
    await this.store.execute(stmt.sql, stmt.params);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private spec(): QuerySpec {
    return {
      table: this.table,
      columns: [...this.columns],
      wheres: [...this.wheres],
      orders: [...this.orders],
      limit: this.limitValue,
      offset: this.offsetValue,
    };
  }

  private push(clause: WhereClause): this {
    this.wheres.push(clause);
    return this;
  }

  private ensureOpen(): void {
    if (this.consumed) throw ErrQueryConsumed.create({ table: this.table });
  }

  private consume(): void {
    this.ensureOpen();
    this.consumed = true;
  }

  private runSelect(stmt: Statement): Promise<Row[]> {
    return this.store.select(stmt.sql, stmt.params);
  }

  private async countRows(): Promise<number> {
    const stmt = SqliteGrammar.compileCount(this.spec());
    const [row] = await this.store.select(stmt.sql, stmt.params);
    const aggregate = row?.["aggregate"];
    if (typeof aggregate === "bigint") return Number(aggregate);
    return typeof aggregate === "number" ? aggregate : 0;
  }

  private async insertRow(row: Record<string, unknown>): Promise<KeyValue | null> {
    const stmt = SqliteGrammar.compileInsert(this.table, row);
    const { lastInsertId } = await this.store.execute(stmt.sql, stmt.params);
    return lastInsertId;
  }
}
