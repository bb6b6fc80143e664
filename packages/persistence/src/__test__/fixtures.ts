/**
 * Shared fixtures for the persistence tests: an in-memory RemoteResource,
 * a capturing log sink and a small Article model.
 */

import {
  Entity,
  EntityDef,
  Logger,
  ResourceResponse,
  Timestamp,
  type KeyValue,
  type LogLevel,
  type RemoteResource,
  type RequestOptions,
} from "@tandem/core";
import {SqliteLocalStore} from "@tandem/storage-sqlite";

// ============================================================================
// Models
// ============================================================================

export const ArticleDef = EntityDef.create({
  name: "Article",
  table: "articles",
  fillable: ["title", "views", "published", "tags"],
  casts: { views: "int", published: "bool" },
  timestamps: true,
});

export class Article extends Entity {
  constructor(attributes: Record<string, unknown> = {}) { super(ArticleDef, attributes) }
}

export const NoteDef = EntityDef.create({ name: "Note", table: "notes", guarded: [], useLocal: false });

/** Remote only, no timestamps */
export class Note extends Entity {
  constructor(attributes: Record<string, unknown> = {}) { super(NoteDef, attributes) }
}

export const ARTICLES_DDL = `
  CREATE TABLE articles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT,
    views INTEGER,
    published INTEGER,
    created_at TEXT,
    updated_at TEXT
  )`;

/** In-memory store with the articles table */
export function articleStore(): SqliteLocalStore {
  const store = SqliteLocalStore.open(":memory:");
  store.db.exec(ARTICLES_DDL);
  return store;
}

export const NOW = Timestamp.fromDate(new Date(2024, 0, 15, 10, 30, 0));
export const clock = (): Timestamp => NOW;

// ============================================================================
// Logging
// ============================================================================

export interface CapturedLine {
  level: Exclude<LogLevel, "silent">;
  line: string;
}

export function capturingLogger(level: LogLevel = "debug"): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = new Logger({ level, sink: { write: (lvl, line) => { lines.push({ level: lvl, line }) } } });
  return { logger, lines };
}

// ============================================================================
// FakeRemote
// ============================================================================

export interface RemoteCall {
  method: "index" | "show" | "store" | "update" | "destroy";
  resource: string;
  id?: KeyValue;
  data?: Record<string, unknown>;
}

export interface FakeRemoteOptions {
  /** Wrap bodies in `{ data: ... }` */
  envelope?: boolean;
  firstId?: number;
}

/**
 * RemoteResource over in-memory maps. Behaves like a JSON REST API: 201 on
 * create, 404 for unknown ids. Set `failing` to make every call throw.
 */
export class FakeRemote implements RemoteResource {
  readonly calls: RemoteCall[] = [];
  failing = false;

  private readonly resources = new Map<string, Map<string, Record<string, unknown>>>();
  private readonly envelope: boolean;
  private nextId: number;

  constructor(opts: FakeRemoteOptions = {}) {
    this.envelope = opts.envelope ?? true;
    this.nextId = opts.firstId ?? 100;
  }

  /** Put a record straight into the fake, bypassing the call log */
  seed(resource: string, record: Record<string, unknown> & { id: KeyValue }): void {
    this.table(resource).set(String(record.id), { ...record });
  }

  records(resource: string): Record<string, unknown>[] {
    return [...this.table(resource).values()];
  }

  async index(resource: string, _opts?: RequestOptions): Promise<ResourceResponse> {
    this.record({ method: "index", resource });
    return this.respond(200, this.records(resource));
  }

  async show(resource: string, id: KeyValue): Promise<ResourceResponse> {
    this.record({ method: "show", resource, id });
    const found = this.table(resource).get(String(id));
    return found ? this.respond(200, found) : this.notFound();
  }

  async store(resource: string, data: Record<string, unknown>): Promise<ResourceResponse> {
    this.record({ method: "store", resource, data });
    const created = { ...data, id: this.nextId++ };
    this.table(resource).set(String(created.id), created);
    return this.respond(201, created);
  }

  async update(resource: string, id: KeyValue, data: Record<string, unknown>): Promise<ResourceResponse> {
    this.record({ method: "update", resource, id, data });
    const existing = this.table(resource).get(String(id));
    if (!existing) return this.notFound();
    const updated = { ...existing, ...data };
    this.table(resource).set(String(id), updated);
    return this.respond(200, updated);
  }

  async destroy(resource: string, id: KeyValue): Promise<ResourceResponse> {
    this.record({ method: "destroy", resource, id });
    if (!this.table(resource).delete(String(id))) return this.notFound();
    return new ResourceResponse({ statusCode: 204 });
  }

  private record(call: RemoteCall): void {
    this.calls.push(call);
    if (this.failing) throw new Error("remote offline");
  }

  private respond(statusCode: number, body: unknown): ResourceResponse {
    return new ResourceResponse({ statusCode, data: this.envelope ? { data: body } : body });
  }

  private notFound(): ResourceResponse {
    return new ResourceResponse({ statusCode: 404, data: { message: "Not found" } });
  }

  private table(resource: string): Map<string, Record<string, unknown>> {
    let table = this.resources.get(resource);
    if (!table) {
      table = new Map();
      this.resources.set(resource, table);
    }
    return table;
  }
}

/** Unwrap a value the test expects to be present */
export function must<T>(value: T | null | undefined): T {
  if (value === null || value === undefined) throw new Error("expected a value");
  return value;
}
