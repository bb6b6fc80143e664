/**
 * QueryBuilder against an in-memory SQLite database.
 */

import { describe, test, expect, beforeEach } from "vitest";
import { Timestamp, Transaction } from "@tandem/core";
import { SqliteLocalStore } from "../sqlite-store.js";
import { QueryBuilder } from "../query-builder.js";
import { ErrQueryConsumed } from "../errors.js";

// ============================================================================
// Tests
// ============================================================================

describe("QueryBuilder", () => {
  let store: SqliteLocalStore;

  beforeEach(async () => {
    store = SqliteLocalStore.open(":memory:");
    await store.execute(
      "CREATE TABLE users (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT, age INTEGER, status TEXT, active INTEGER)",
    );
    await store.table("users").insertAll([
      { name: "Ada", age: 36, status: "active", active: true },
      { name: "Bob", age: 17, status: "active", active: false },
      { name: "Cy", age: 52, status: "banned", active: true },
      { name: "Di", age: 18, status: "active", active: true },
    ]);
  });

  describe("compilation", () => {
    test("the canonical chain compiles to two predicates and a limit", () => {
      const stmt = store.table("users")
        .where("age", ">=", 18)
        .where("status", "active")
        .orderBy("id", "desc")
        .limit(10)
        .toSql();

      expect(stmt.sql).toBe("SELECT * FROM users WHERE age >= ? AND status = ? ORDER BY id DESC LIMIT 10");
      expect(stmt.params).toEqual([18, "active"]);
    });

    test("null comparisons become IS NULL / IS NOT NULL", () => {
      expect(store.table("users").where("status", null).toSql().sql).toBe("SELECT * FROM users WHERE status IS NULL");
      expect(store.table("users").where("status", "!=", null).toSql().sql).toBe("SELECT * FROM users WHERE status IS NOT NULL");
    });

    test("chain methods return the same builder", () => {
      const qb = store.table("users");
      expect(qb.where("age", 1)).toBe(qb);
      expect(qb.orderBy("id")).toBe(qb);
    });
  });

  describe("reads", () => {
    test("get() returns rows with driver typing", async () => {
      const rows = await store.table("users").where("age", ">=", 18).where("status", "active").orderBy("id", "desc").get();
      expect(rows).toEqual([
        { id: 4, name: "Di", age: 18, status: "active", active: 1 },
        { id: 1, name: "Ada", age: 36, status: "active", active: 1 },
      ]);
    });

    test("select() narrows the columns", async () => {
      const rows = await store.table("users").select("id", "name").where("id", 2).get();
      expect(rows).toEqual([{ id: 2, name: "Bob" }]);
    });

    test("first() returns one row or null", async () => {
      expect(await store.table("users").orderBy("age").first()).toEqual({ id: 2, name: "Bob", age: 17, status: "active", active: 0 });
      expect(await store.table("users").where("name", "Zed").first()).toBeNull();
    });

    test("value() and pluck()", async () => {
      expect(await store.table("users").where("id", 3).value("name")).toBe("Cy");
      expect(await store.table("users").where("id", 99).value("name")).toBeNull();
      expect(await store.table("users").orderBy("id").pluck("name")).toEqual(["Ada", "Bob", "Cy", "Di"]);
    });

    test("count() and exists()", async () => {
      expect(await store.table("users").where("status", "active").count()).toBe(3);
      expect(await store.table("users").where("status", "gone").exists()).toBe(false);
    });

    test("LIKE, limit and offset", async () => {
      expect(await store.table("users").where("name", "like", "%y").pluck("name")).toEqual(["Cy"]);
      expect(await store.table("users").orderBy("id").offset(2).pluck("id")).toEqual([3, 4]);
      expect(await store.table("users").orderBy("id").limit(1).offset(1).pluck("id")).toEqual([2]);
    });
  });

  describe("writes", () => {
    test("insert() returns the new id", async () => {
      expect(await store.table("users").insert({ name: "Eve" })).toBe(5);
    });

    test("an empty insert uses column defaults", async () => {
      const id = await store.table("users").insert({});
      expect(id).toBe(5);
      expect(await store.table("users").where("id", 5).value("name")).toBeNull();
    });

    test("update() returns the affected row count", async () => {
      expect(await store.table("users").where("status", "active").update({ status: "idle" })).toBe(3);
      expect(await store.table("users").where("status", "idle").count()).toBe(3);
    });

    test("dates bind in the same canonical form timestamps are stored in", async () => {
      await store.execute("CREATE TABLE visits (id INTEGER PRIMARY KEY, seen_at TEXT)");
      const when = new Date(2024, 0, 15, 10, 30, 0);
      await store.table("visits").insert({ seen_at: when });

      expect(await store.table("visits").value("seen_at")).toBe("2024-01-15T10:30:00");
      expect(await store.table("visits").where("seen_at", when).count()).toBe(1);
      expect(await store.table("visits").where("seen_at", Timestamp.fromDate(when)).count()).toBe(1);
    });

    test("an empty update executes nothing", async () => {
      expect(await store.table("users").update({})).toBe(0);
    });

    test("delete() and truncate()", async () => {
      expect(await store.table("users").where("age", "<", 18).delete()).toBe(1);
      await store.table("users").truncate();
      expect(await store.table("users").count()).toBe(0);
    });

    test("insertAll inside a transaction rolls back as a whole", async () => {
      const attempt = Transaction.run(store, async () => {
        await store.table("users").insertAll([{ name: "Fay" }, { nope: 1 }]);
      });
      await expect(attempt).rejects.toThrow("no column named nope");
      expect(await store.table("users").count()).toBe(4);
    });

    test("SQL errors propagate unchanged", async () => {
      await expect(store.table("missing").get()).rejects.toThrow("no such table: missing");
    });
  });

  describe("consumption", () => {
    test("a builder runs one terminal operation", async () => {
      const qb = new QueryBuilder(store, "users");
      await qb.count();

      await expect(qb.get()).rejects.toThrow("Query on 'users' was already executed");
      let caught: unknown;
      try {
        qb.where("id", 1);
      } catch (err) {
        caught = err;
      }
      expect(ErrQueryConsumed.is(caught)).toBe(true);
    });
  });
});
