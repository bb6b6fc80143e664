/**
 * Entity - an attribute bag with casts, mass-assignment guarding, dirty
 * tracking, relation materialisation and visibility-aware serialisation.
 *
 * An Entity knows nothing about where it is stored. Persistence goes through
 * the coordinator, which reads `toStorageMap()` and calls `syncOriginal()`.
 */

import {AttributeStore, plainSnapshot} from "./attribute-store.js";
import {Cast} from "./casts.js";
import type {EntityDef} from "./entity-def.js";
import {Inspect} from "./inspect.js";
import {isKeyValue, isPlainObject, type KeyValue} from "./plain.js";
import {Timestamp} from "./timestamp.js";

/** Created/updated bookkeeping, a no-op unless the definition enables it */
export interface Timestamped {
  updateTimestamps(now?: Timestamp): void;
  touch(now?: Timestamp): boolean;
  readonly createdAt: Timestamp | null;
  readonly updatedAt: Timestamp | null;
}

/** Flattens materialised relations back to their raw attributes */
const entitySnapshot = (value: unknown): unknown => {
  if (value instanceof Entity) return entitySnapshot(value.getAttributes());
  if (Array.isArray(value)) return value.map(entitySnapshot);
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) copy[k] = entitySnapshot(v);
    return copy;
  }
  return plainSnapshot(value);
};

export class Entity implements Timestamped {
  readonly def: EntityDef;

  /** Persisted in at least one store */
  exists = false;

  /** True right after a successful create, cleared by the next save */
  recentlyCreated = false;

  private readonly store = new AttributeStore(entitySnapshot);
  private readonly runtimeHidden = new Set<string>();
  private readonly runtimeVisible = new Set<string>();
  private readonly runtimeAppends = new Set<string>();

  static {
    Inspect(this, (self) => ({
      format: "%s(%s) %O",
      params: [self.def.name, self.exists ? String(self.getKey()) : "new", self.getAttributes()],
    }));
  }

  constructor(def: EntityDef, attributes: Record<string, unknown> = {}) {
    this.def = def;
    this.fill(attributes);
  }

  // --------------------------------------------------------------------------
  // Keys
  // --------------------------------------------------------------------------

  getKeyName(): string {
    return this.def.primaryKey;
  }

  getKey(): KeyValue | null {
    const raw = this.store.get(this.def.primaryKey);
    return isKeyValue(raw) ? raw : null;
  }

  setKey(id: KeyValue): this {
    this.store.set(this.def.primaryKey, id);
    return this;
  }

  // --------------------------------------------------------------------------
  // Attribute access
  // --------------------------------------------------------------------------

  getAttribute(field: string): unknown {
    const accessor = this.def.accessorFor(field);
    if (accessor) return accessor(this);
    return this.castAttribute(field);
  }

  setAttribute(field: string, value: unknown): this {
    this.store.set(field, Cast.encode(this.def.castFor(field), value));
    return this;
  }

  has(field: string): boolean {
    return this.store.has(field) || this.def.accessorFor(field) !== undefined;
  }

  getString(field: string): string | null {
    const value = this.getAttribute(field);
    return typeof value === "string" ? value : null;
  }

  getNumber(field: string): number | null {
    const value = this.getAttribute(field);
    return typeof value === "number" ? value : null;
  }

  getBoolean(field: string): boolean | null {
    const value = this.getAttribute(field);
    return typeof value === "boolean" ? value : null;
  }

  getTimestamp(field: string): Timestamp | null {
    const value = this.getAttribute(field);
    return value instanceof Timestamp ? value : null;
  }

  getJson(field: string): Record<string, unknown> | unknown[] | null {
    const value = this.getAttribute(field);
    return isPlainObject(value) || Array.isArray(value) ? value : null;
  }

  /** Mass assignment; keys rejected by the guard are skipped */
  fill(attributes: Record<string, unknown>): this {
    for (const [key, value] of Object.entries(attributes)) {
      if (this.def.isFillable(key)) this.setAttribute(key, value);
    }
    return this;
  }

  forceFill(attributes: Record<string, unknown>): this {
    for (const [key, value] of Object.entries(attributes)) {
      this.setAttribute(key, value);
    }
    return this;
  }

  // --------------------------------------------------------------------------
  // Dirty tracking
  // --------------------------------------------------------------------------

  isDirty(field?: string): boolean {
    return this.store.isDirty(field);
  }

  isClean(field?: string): boolean {
    return !this.store.isDirty(field);
  }

  getDirty(): Record<string, unknown> {
    return this.store.dirty();
  }

  syncOriginal(): this {
    this.store.sync();
    return this;
  }

  /** Replace the raw attributes without casting or guarding */
  setRawAttributes(attributes: Record<string, unknown>, sync = false): this {
    this.store.replace(attributes, sync);
    return this;
  }

  getAttributes(): Record<string, unknown> {
    return this.store.current();
  }

  getOriginal(): Record<string, unknown> {
    return this.store.snapshotted();
  }

  // --------------------------------------------------------------------------
  // Relations
  // --------------------------------------------------------------------------

  /** Materialise a single related entity; the instance replaces the raw map */
  getRelation(key: string): Entity | null {
    const relation = this.def.relations[key];
    const raw = this.store.get(key);
    if (raw instanceof Entity) return raw;
    if (relation?.kind !== "one" || !isPlainObject(raw)) return null;
    const related = Entity.hydrateWith(relation.make, raw);
    this.store.set(key, related);
    return related;
  }

  getRelations(key: string): Entity[] {
    const relation = this.def.relations[key];
    const raw = this.store.get(key);
    if (relation?.kind !== "many" || !Array.isArray(raw)) return [];
    const related: Entity[] = [];
    for (const item of raw) {
      if (item instanceof Entity) related.push(item);
      else if (isPlainObject(item)) related.push(Entity.hydrateWith(relation.make, item));
    }
    // Only cache a complete list, skipped items would otherwise read as a change
    if (related.length === raw.length) this.store.set(key, related);
    return related;
  }

  private static hydrateWith(make: () => Entity, raw: Record<string, unknown>): Entity {
    const entity = make();
    entity.setRawAttributes(raw, true);
    entity.exists = true;
    return entity;
  }

  // --------------------------------------------------------------------------
  // Serialisation
  // --------------------------------------------------------------------------

  makeHidden(...keys: string[]): this {
    for (const k of keys) {
      this.runtimeHidden.add(k);
      this.runtimeVisible.delete(k);
    }
    return this;
  }

  makeVisible(...keys: string[]): this {
    for (const k of keys) {
      this.runtimeVisible.add(k);
      this.runtimeHidden.delete(k);
    }
    return this;
  }

  append(...keys: string[]): this {
    for (const k of keys) this.runtimeAppends.add(k);
    return this;
  }

  /** Public view: visibility rules and appends applied */
  toMap(): Record<string, unknown> {
    const visible = new Set([...this.def.visible, ...this.runtimeVisible]);
    const hidden = new Set([...this.def.hidden, ...this.runtimeHidden].filter((k) => !visible.has(k)));
    const allowlist = this.def.visible.length > 0;

    const out: Record<string, unknown> = {};
    for (const key of this.store.keys()) {
      if (allowlist && !visible.has(key)) continue;
      if (hidden.has(key)) continue;
      out[key] = serialize(this.getAttribute(key), (e) => e.toMap());
    }
    for (const key of [...this.def.appends, ...this.runtimeAppends]) {
      if (key in out || hidden.has(key)) continue;
      out[key] = serialize(this.getAttribute(key), (e) => e.toMap());
    }
    return out;
  }

  /** Every stored attribute, cast and converted, for writing to a store */
  toStorageMap(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const key of this.store.keys()) {
      out[key] = serialize(this.castAttribute(key), (e) => e.toStorageMap());
    }
    return out;
  }

  toJSON(): Record<string, unknown> {
    return this.toMap();
  }

  toJson(): string {
    return JSON.stringify(this.toMap());
  }

  // --------------------------------------------------------------------------
  // Timestamps
  // --------------------------------------------------------------------------

  updateTimestamps(now: Timestamp = Timestamp.now()): void {
    const columns = this.def.timestamps;
    if (!columns) return;
    this.setAttribute(columns.updatedAt, now);
    if (!this.exists && !this.isDirty(columns.createdAt)) {
      this.setAttribute(columns.createdAt, now);
    }
  }

  touch(now: Timestamp = Timestamp.now()): boolean {
    const columns = this.def.timestamps;
    if (!columns) return false;
    this.setAttribute(columns.updatedAt, now);
    return true;
  }

  get createdAt(): Timestamp | null {
    return this.def.timestamps ? this.getTimestamp(this.def.timestamps.createdAt) : null;
  }

  get updatedAt(): Timestamp | null {
    return this.def.timestamps ? this.getTimestamp(this.def.timestamps.updatedAt) : null;
  }

  private castAttribute(field: string): unknown {
    return Cast.decode(this.def.castFor(field), this.store.get(field), {
      entityType: this.def.name,
      field,
    });
  }
}

function serialize(value: unknown, nested: (entity: Entity) => Record<string, unknown>): unknown {
  if (value instanceof Entity) return nested(value);
  if (value instanceof Timestamp) return value.format();
  if (value instanceof Date) return Timestamp.fromDate(value).format();
  if (Array.isArray(value)) return value.map((v) => serialize(v, nested));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = serialize(v, nested);
    return out;
  }
  return value;
}
