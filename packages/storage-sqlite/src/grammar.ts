/**
 * SqliteGrammar - compiles an accumulated query into `{ sql, params }`.
 *
 * Identifiers and LIMIT/OFFSET are inlined after validation; every value is
 * bound through a `?` placeholder.
 */

import {StaticTypeCompanion, type Statement} from "@tandem/core";
import {ErrInvalidIdentifier, ErrInvalidLimit, ErrInvalidOperator} from "./errors.js";
import {toSqlValue, toSqlValues} from "./values.js";

// ============================================================================
// Query specification
// ============================================================================

export type ComparisonOperator = "=" | "!=" | ">" | ">=" | "<" | "<=" | "LIKE";
export type Operator = ComparisonOperator | "IS NULL" | "IS NOT NULL";
export type Direction = "asc" | "desc";

export type WhereClause =
  | { readonly column: string; readonly operator: ComparisonOperator; readonly value: unknown }
  | { readonly column: string; readonly operator: "IS NULL" }
  | { readonly column: string; readonly operator: "IS NOT NULL" };

export interface OrderClause {
  readonly column: string;
  readonly direction: Direction;
}

export interface QuerySpec {
  readonly table: string;
  /** Empty selects `*` */
  readonly columns: readonly string[];
  readonly wheres: readonly WhereClause[];
  readonly orders: readonly OrderClause[];
  readonly limit: number | null;
  readonly offset: number | null;
}

// ============================================================================
// Validation
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ["=", "!=", ">", ">=", "<", "<=", "LIKE"];

function identifier(name: string): string {
  if (!IDENTIFIER.test(name)) throw ErrInvalidIdentifier.create({ identifier: name });
  return name;
}

function selectColumn(name: string): string {
  return name === "*" ? name : identifier(name);
}

function bound(clause: "limit" | "offset", value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) throw ErrInvalidLimit.create({ clause, value });
  return value;
}

function statement(sql: string, params: readonly unknown[]): Statement {
  return Object.freeze({ sql, params: Object.freeze(toSqlValues(params)) });
}

// ============================================================================
// Clause compilation
// ============================================================================

function compileWheres(wheres: readonly WhereClause[], params: unknown[]): string {
  if (wheres.length === 0) return "";
  const conditions = wheres.map((w) => {
    if (w.operator === "IS NULL" || w.operator === "IS NOT NULL") {
      return `${w.column} ${w.operator}`;
    }
    params.push(w.value);
    return `${w.column} ${w.operator} ?`;
  });
  return ` WHERE ${conditions.join(" AND ")}`;
}

function compileOrders(orders: readonly OrderClause[]): string {
  if (orders.length === 0) return "";
  return ` ORDER BY ${orders.map((o) => `${o.column} ${o.direction.toUpperCase()}`).join(", ")}`;
}

function compileLimit(limit: number | null, offset: number | null): string {
  // SQLite has no bare OFFSET; -1 means "no limit"
  if (limit === null && offset === null) return "";
  if (offset === null) return ` LIMIT ${limit}`;
  return ` LIMIT ${limit ?? -1} OFFSET ${offset}`;
}

// ============================================================================
// Grammar
// ============================================================================

export const SqliteGrammar = StaticTypeCompanion({
  identifier,

  direction(value: string): Direction {
    const lower = value.toLowerCase();
    if (lower === "asc" || lower === "desc") return lower;
    throw ErrInvalidLimit.create({ clause: "direction", value });
  },

  /** Normalise a caller-supplied operator; `like` is accepted in any case */
  operator(value: string): ComparisonOperator {
    const normalised = value.toUpperCase() === "LIKE" ? "LIKE" : value;
    const match = COMPARISON_OPERATORS.find((op) => op === normalised);
    if (!match) throw ErrInvalidOperator.create({ operator: value });
    return match;
  },

  limit(value: number): number {
    return bound("limit", value);
  },

  offset(value: number): number {
    return bound("offset", value);
  },

  compileSelect(spec: QuerySpec): Statement {
    const params: unknown[] = [];
    const columns = spec.columns.length > 0 ? spec.columns.map(selectColumn).join(", ") : "*";
    const sql = `SELECT ${columns} FROM ${spec.table}`
      + compileWheres(spec.wheres, params)
      + compileOrders(spec.orders)
      + compileLimit(spec.limit, spec.offset);
    return statement(sql, params);
  },

  compileCount(spec: QuerySpec): Statement {
    const params: unknown[] = [];
    const sql = `SELECT COUNT(*) AS aggregate FROM ${spec.table}` + compileWheres(spec.wheres, params);
    return statement(sql, params);
  },

  compileInsert(table: string, row: Record<string, unknown>): Statement {
    const columns = Object.keys(row).map(identifier);
    if (columns.length === 0) return statement(`INSERT INTO ${table} DEFAULT VALUES`, []);
    const placeholders = columns.map(() => "?").join(", ");
    return statement(
      `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${placeholders})`,
      Object.values(row),
    );
  },

  compileUpdate(spec: QuerySpec, row: Record<string, unknown>): Statement {
    const params: unknown[] = Object.values(row);
    const sets = Object.keys(row).map((column) => `${identifier(column)} = ?`).join(", ");
    const sql = `UPDATE ${spec.table} SET ${sets}` + compileWheres(spec.wheres, params);
    return statement(sql, params);
  },

  compileDelete(spec: QuerySpec): Statement {
    const params: unknown[] = [];
    return statement(`DELETE FROM ${spec.table}` + compileWheres(spec.wheres, params), params);
  },

  compileTruncate(table: string): Statement {
    return statement(`DELETE FROM ${table}`, []);
  },

  /** Binding preparation for a single value */
  bind: toSqlValue,
});
