/**
 * Compilation tests for SqliteGrammar. No database involved.
 */

import { describe, test, expect } from "vitest";
import { Timestamp } from "@tandem/core";
import { SqliteGrammar, type QuerySpec } from "../grammar.js";
import { ErrInvalidIdentifier, ErrInvalidLimit, ErrInvalidOperator } from "../errors.js";

const base: QuerySpec = { table: "users", columns: [], wheres: [], orders: [], limit: null, offset: null };

// ============================================================================
// SELECT
// ============================================================================

describe("compileSelect", () => {
  test("bare select", () => {
    expect(SqliteGrammar.compileSelect(base)).toEqual({ sql: "SELECT * FROM users", params: [] });
  });

  test("wheres in registration order, AND-joined, with placeholders", () => {
    const stmt = SqliteGrammar.compileSelect({
      ...base,
      columns: ["id", "name"],
      wheres: [
        { column: "age", operator: ">=", value: 18 },
        { column: "status", operator: "=", value: "active" },
        { column: "deleted_at", operator: "IS NULL" },
      ],
      orders: [{ column: "id", direction: "desc" }, { column: "name", direction: "asc" }],
      limit: 10,
      offset: 20,
    });

    expect(stmt.sql).toBe(
      "SELECT id, name FROM users WHERE age >= ? AND status = ? AND deleted_at IS NULL ORDER BY id DESC, name ASC LIMIT 10 OFFSET 20",
    );
    expect(stmt.params).toEqual([18, "active"]);
  });

  test("offset without a limit uses LIMIT -1", () => {
    expect(SqliteGrammar.compileSelect({ ...base, offset: 5 }).sql).toBe("SELECT * FROM users LIMIT -1 OFFSET 5");
  });

  test("statements are frozen", () => {
    const stmt = SqliteGrammar.compileSelect(base);
    expect(Object.isFrozen(stmt)).toBe(true);
    expect(Object.isFrozen(stmt.params)).toBe(true);
  });
});

// ============================================================================
// Writes
// ============================================================================

describe("compileInsert / compileUpdate / compileDelete", () => {
  test("insert uses the row keys as columns", () => {
    expect(SqliteGrammar.compileInsert("users", { name: "Ada", active: true })).toEqual({
      sql: "INSERT INTO users (name, active) VALUES (?, ?)",
      params: ["Ada", 1],
    });
  });

  test("an empty insert uses DEFAULT VALUES", () => {
    expect(SqliteGrammar.compileInsert("users", {}).sql).toBe("INSERT INTO users DEFAULT VALUES");
  });

  test("update binds SET values before WHERE values", () => {
    const stmt = SqliteGrammar.compileUpdate(
      { ...base, wheres: [{ column: "id", operator: "=", value: 3 }] },
      { name: "Grace", score: 9 },
    );
    expect(stmt.sql).toBe("UPDATE users SET name = ?, score = ? WHERE id = ?");
    expect(stmt.params).toEqual(["Grace", 9, 3]);
  });

  test("delete and truncate", () => {
    const stmt = SqliteGrammar.compileDelete({ ...base, wheres: [{ column: "id", operator: "!=", value: 1 }] });
    expect(stmt).toEqual({ sql: "DELETE FROM users WHERE id != ?", params: [1] });
    expect(SqliteGrammar.compileTruncate("users").sql).toBe("DELETE FROM users");
  });

  test("count ignores ordering and limits", () => {
    const stmt = SqliteGrammar.compileCount({
      ...base,
      wheres: [{ column: "status", operator: "=", value: "active" }],
      orders: [{ column: "id", direction: "asc" }],
      limit: 3,
    });
    expect(stmt).toEqual({ sql: "SELECT COUNT(*) AS aggregate FROM users WHERE status = ?", params: ["active"] });
  });
});

// ============================================================================
// Binding preparation and validation
// ============================================================================

describe("binding preparation", () => {
  test("converts booleans, temporal values and structures", () => {
    const ts = Timestamp.fromDate(new Date(2024, 0, 2, 3, 4, 5));
    expect(SqliteGrammar.bind(false)).toBe(0);
    expect(SqliteGrammar.bind(ts)).toBe("2024-01-02T03:04:05");
    expect(SqliteGrammar.bind(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02T03:04:05.000Z");
    expect(SqliteGrammar.bind({ a: [1] })).toBe('{"a":[1]}');
    expect(SqliteGrammar.bind(undefined)).toBeNull();
    expect(SqliteGrammar.bind(7)).toBe(7);
  });
});

describe("validation", () => {
  test("operators", () => {
    expect(SqliteGrammar.operator("like")).toBe("LIKE");
    expect(SqliteGrammar.operator("<=")).toBe("<=");
    expect(() => SqliteGrammar.operator("; DROP")).toThrow(ErrInvalidOperator.create({ operator: "; DROP" }).message);
  });

  test("identifiers", () => {
    expect(SqliteGrammar.identifier("users.id")).toBe("users.id");
    let caught: unknown;
    try {
      SqliteGrammar.identifier("id; --");
    } catch (err) {
      caught = err;
    }
    expect(ErrInvalidIdentifier.is(caught)).toBe(true);
  });

  test("directions and limits", () => {
    expect(SqliteGrammar.direction("DESC")).toBe("desc");
    expect(() => SqliteGrammar.direction("sideways")).toThrow("Invalid direction: sideways");
    expect(SqliteGrammar.limit(0)).toBe(0);
    expect(() => SqliteGrammar.limit(-1)).toThrow("Invalid limit: -1");
    expect(() => SqliteGrammar.offset(1.5)).toThrow("Invalid offset: 1.5");
    let caught: unknown;
    try {
      SqliteGrammar.limit(Number.NaN);
    } catch (err) {
      caught = err;
    }
    expect(ErrInvalidLimit.is(caught)).toBe(true);
  });
});
