/**
 * NodePlatform.boot: wiring from config, overrides and lifecycle.
 */

import { describe, test, expect, vi } from "vitest";
import { Entity, EntityDef, Timestamp, type LogSink } from "@tandem/core";
import { HttpResourceClient } from "@tandem/remote-http";
import { SqliteLocalStore } from "@tandem/storage-sqlite";
import { ConfigLoader } from "../config.js";
import { NodePlatform } from "../platform.js";

const TaskDef = EntityDef.create({ name: "Task", table: "tasks", fillable: ["title"] });

class Task extends Entity {
  constructor(attributes: Record<string, unknown> = {}) { super(TaskDef, attributes) }
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("NodePlatform.boot", () => {
  test("builds the stores the config names", () => {
    const config = ConfigLoader.fromObject({
      database: { path: ":memory:" },
      remote: { baseUrl: "https://api.example.test" },
    });

    const runtime = NodePlatform.boot(config);

    expect(runtime.local).toBeInstanceOf(SqliteLocalStore);
    expect(runtime.remote).toBeInstanceOf(HttpResourceClient);
    expect(runtime.config).toBe(config);
  });

  test("without stores, saves report false", async () => {
    const runtime = NodePlatform.boot(ConfigLoader.fromObject({}));

    expect(runtime.local).toBeUndefined();
    expect(runtime.remote).toBeUndefined();
    expect(await runtime.coordinator.save(new Task({ title: "Nowhere" }))).toBe(false);
  });

  test("saves through both stores end to end", async () => {
    const fetch = vi.fn(async (_url: string, _init: RequestInit) => json(201, { data: { id: 5, title: "Ship it" } }));
    const runtime = NodePlatform.boot(
      ConfigLoader.fromObject({
        database: { path: ":memory:" },
        remote: { baseUrl: "https://api.example.test", headers: { Authorization: "Bearer test-secret" } },
      }),
      { fetch, clock: () => Timestamp.fromDate(new Date(2024, 0, 15)) },
    );
    await runtime.local?.execute("CREATE TABLE tasks (id INTEGER PRIMARY KEY, title TEXT)");
    const task = new Task({ title: "Ship it" });

    expect(await runtime.coordinator.save(task)).toBe(true);

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://api.example.test/tasks");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(task.getKey()).toBe(5);
    expect(await runtime.local?.select("SELECT id, title FROM tasks")).toEqual([{ id: 5, title: "Ship it" }]);
  });

  test("lifecycle stop closes the database", async () => {
    const runtime = NodePlatform.boot(ConfigLoader.fromObject({ database: { path: ":memory:" } }));
    const local = runtime.local;

    await runtime.lifecycle.start();
    await runtime.lifecycle.stop();

    expect(local).toBeInstanceOf(SqliteLocalStore);
    if (!(local instanceof SqliteLocalStore)) return;
    expect(local.db.open).toBe(false);
  });

  test("logs through the configured level and an injected sink", () => {
    const lines: string[] = [];
    const sink: LogSink = { write: (_level, line) => { lines.push(line) } };

    NodePlatform.boot(ConfigLoader.fromObject({ logging: { level: "debug" } }), { sink });

    expect(lines).toEqual(["[debug] runtime booted { local: false, remote: false }"]);
  });

  test("an injected remote replaces the configured one", () => {
    const remote = new HttpResourceClient({ baseUrl: "https://other.example.test" });
    const runtime = NodePlatform.boot(ConfigLoader.fromObject({ remote: { baseUrl: "https://api.example.test" } }), { remote });
    expect(runtime.remote).toBe(remote);
  });
});
