/**
 * AttributeStore - raw attribute values plus the snapshot taken at the last
 * sync point. Dirty checks compare the two by value, never by identity.
 */

import {isDeepStrictEqual} from "node:util";
import {isPlainObject} from "./plain.js";

/**
 * Reduces a value to plain data for snapshots and comparisons.
 * The entity layer supplies one that also flattens materialised relations.
 */
export type Snapshotter = (value: unknown) => unknown;

/** Deep-copies plain objects and arrays, leaves everything else as is */
export const plainSnapshot: Snapshotter = (value) => {
  if (Array.isArray(value)) return value.map(plainSnapshot);
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) copy[k] = plainSnapshot(v);
    return copy;
  }
  return value;
};

export class AttributeStore {
  private attributes = new Map<string, unknown>();
  private original = new Map<string, unknown>();

  constructor(private readonly snapshot: Snapshotter = plainSnapshot) {}

  get(key: string): unknown {
    return this.attributes.get(key);
  }

  set(key: string, value: unknown): void {
    this.attributes.set(key, value);
  }

  has(key: string): boolean {
    return this.attributes.has(key);
  }

  keys(): string[] {
    return [...this.attributes.keys()];
  }

  /** Replace every attribute; with `sync` the snapshot is taken too */
  replace(values: Record<string, unknown>, sync: boolean): void {
    this.attributes = new Map(Object.entries(values));
    if (sync) this.sync();
  }

  sync(): void {
    this.original = new Map([...this.attributes].map(([k, v]) => [k, this.snapshot(v)]));
  }

  isDirty(key?: string): boolean {
    if (key !== undefined) return this.differs(key);
    return this.keys().some((k) => this.differs(k));
  }

  dirty(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [k, v] of this.attributes) {
      if (this.differs(k)) out[k] = v;
    }
    return out;
  }

  current(): Record<string, unknown> {
    return Object.fromEntries(this.attributes);
  }

  snapshotted(): Record<string, unknown> {
    return Object.fromEntries([...this.original].map(([k, v]) => [k, plainSnapshot(v)]));
  }

  private differs(key: string): boolean {
    const current = this.attributes.get(key);
    if (!this.original.has(key)) return this.attributes.has(key);
    return !isDeepStrictEqual(this.snapshot(current), this.original.get(key));
  }
}
