/**
 * EntityDef - the per-type configuration of an entity, fixed at definition time.
 *
 *   const UserDef = EntityDef.create({
 *     name: "User",
 *     table: "users",
 *     fillable: ["name", "email"],
 *     casts: { is_admin: "bool", settings: "json" },
 *     timestamps: true,
 *   });
 *
 *   class User extends Entity {
 *     constructor() { super(UserDef) }
 *   }
 */

import type {CastKind} from "./casts.js";
import type {Entity} from "./entity.js";
import type {RelationMap} from "./relation.js";
import {StaticTypeCompanion} from "./companion.js";

/** Computes a virtual attribute from the entity */
export type Accessor = (entity: Entity) => unknown;

export interface TimestampColumns {
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface EntityDefOptions {
  name: string;
  table: string;
  /** Remote resource name; defaults to the table */
  resource?: string;
  primaryKey?: string;
  incrementing?: boolean;
  fillable?: readonly string[];
  guarded?: readonly string[];
  casts?: Readonly<Record<string, CastKind>>;
  relations?: RelationMap;
  hidden?: readonly string[];
  visible?: readonly string[];
  appends?: readonly string[];
  accessors?: Readonly<Record<string, Accessor>>;
  useLocal?: boolean;
  useRemote?: boolean;
  timestamps?: boolean | Partial<TimestampColumns>;
}

export interface EntityDef {
  readonly name: string;
  readonly table: string;
  readonly resource: string;
  readonly primaryKey: string;
  readonly incrementing: boolean;
  readonly fillable: readonly string[];
  readonly guarded: readonly string[];
  readonly casts: Readonly<Record<string, CastKind>>;
  readonly relations: RelationMap;
  readonly hidden: readonly string[];
  readonly visible: readonly string[];
  readonly appends: readonly string[];
  readonly accessors: Readonly<Record<string, Accessor>>;
  readonly useLocal: boolean;
  readonly useRemote: boolean;
  /** null when timestamps are off */
  readonly timestamps: TimestampColumns | null;

  /** Declared cast; timestamp columns read as datetime unless declared otherwise */
  castFor(field: string): CastKind | undefined;
  accessorFor(field: string): Accessor | undefined;

  /** Mass-assignment guard: a non-empty allowlist wins, then `*`, then the denylist */
  isFillable(key: string): boolean;
}

// ============================================================================
// EntityDef Implementation (internal)
// ============================================================================

const DEFAULT_TIMESTAMPS: TimestampColumns = { createdAt: "created_at", updatedAt: "updated_at" };

function resolveTimestamps(option: EntityDefOptions["timestamps"]): TimestampColumns | null {
  if (option === undefined || option === false) return null;
  if (option === true) return DEFAULT_TIMESTAMPS;
  return { ...DEFAULT_TIMESTAMPS, ...option };
}

class EntityDefImpl implements EntityDef {
  readonly name: string;
  readonly table: string;
  readonly resource: string;
  readonly primaryKey: string;
  readonly incrementing: boolean;
  readonly fillable: readonly string[];
  readonly guarded: readonly string[];
  readonly casts: Readonly<Record<string, CastKind>>;
  readonly relations: RelationMap;
  readonly hidden: readonly string[];
  readonly visible: readonly string[];
  readonly appends: readonly string[];
  readonly accessors: Readonly<Record<string, Accessor>>;
  readonly useLocal: boolean;
  readonly useRemote: boolean;
  readonly timestamps: TimestampColumns | null;

  constructor(opts: EntityDefOptions) {
    this.name = opts.name;
    this.table = opts.table;
    this.resource = opts.resource ?? opts.table;
    this.primaryKey = opts.primaryKey ?? "id";
    this.incrementing = opts.incrementing ?? true;
    this.fillable = Object.freeze([...(opts.fillable ?? [])]);
    this.guarded = Object.freeze([...(opts.guarded ?? ["*"])]);
    this.casts = Object.freeze({ ...opts.casts });
    this.relations = Object.freeze({ ...opts.relations });
    this.hidden = Object.freeze([...(opts.hidden ?? [])]);
    this.visible = Object.freeze([...(opts.visible ?? [])]);
    this.appends = Object.freeze([...(opts.appends ?? [])]);
    this.accessors = Object.freeze({ ...opts.accessors });
    this.useLocal = opts.useLocal ?? true;
    this.useRemote = opts.useRemote ?? true;
    this.timestamps = resolveTimestamps(opts.timestamps);
    Object.freeze(this);
  }

  castFor(field: string): CastKind | undefined {
    if (Object.hasOwn(this.casts, field)) return this.casts[field];
    if (this.timestamps && (field === this.timestamps.createdAt || field === this.timestamps.updatedAt)) {
      return "datetime";
    }
    return undefined;
  }

  accessorFor(field: string): Accessor | undefined {
    return Object.hasOwn(this.accessors, field) ? this.accessors[field] : undefined;
  }

  isFillable(key: string): boolean {
    if (this.fillable.length > 0) return this.fillable.includes(key);
    if (this.guarded.includes("*")) return false;
    return !this.guarded.includes(key);
  }
}

// ============================================================================
// EntityDef Static Methods (namespace merge)
// ============================================================================

export const EntityDef = StaticTypeCompanion({
  create(opts: EntityDefOptions): EntityDef {
    return new EntityDefImpl(opts);
  },
});
