/**
 * PersistenceCoordinator - find, list, save, delete and refresh entities
 * across a local SQLite store and a remote REST resource.
 *
 * A store takes part in an operation when the entity's definition enables it
 * and the coordinator was given that store. Reads prefer local and fall back
 * to remote; writes go to remote first, then local, and succeed when either
 * does. Store failures never escape: they become StoreResults, are logged, and
 * surface as null, [] or false.
 */

import {
  Entity,
  ErrNotConfigured,
  Logger,
  TandemError,
  Timestamp,
  type Constructor,
  type EntityDef,
  type KeyValue,
  type LocalStore,
  type RemoteResource,
  type Row,
  isKeyValue,
} from "@tandem/core";
import {QueryBuilder} from "@tandem/storage-sqlite";
import type {EventSink, ModelEventName} from "./events.js";
import type {Persistable} from "./persistable.js";
import {StoreResult, type StoreName} from "./store-result.js";

export interface CoordinatorDeps {
  local?: LocalStore;
  remote?: RemoteResource;
  events?: EventSink;
  logger?: Logger;
  /** Source of "now" for timestamps */
  clock?: () => Timestamp;
}

export class PersistenceCoordinator {
  readonly local?: LocalStore;
  readonly remote?: RemoteResource;
  private readonly events?: EventSink;
  private readonly logger: Logger;
  private readonly clock: () => Timestamp;

  constructor(deps: CoordinatorDeps = {}) {
    this.local = deps.local;
    this.remote = deps.remote;
    this.events = deps.events;
    this.logger = deps.logger ?? Logger.silent();
    this.clock = deps.clock ?? Timestamp.now;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /** Local row if there is one, else the remote item (synced into local). */
  async find<T extends Entity>(Class: Constructor<T>, id: KeyValue): Promise<T | null> {
    const def = new Class().def;
    if (!this.anyStore(def, "find")) return null;

    const local = this.participating(def, "local");
    if (local) {
      const result = await this.attempt(def, "local", "find", () =>
        new QueryBuilder(local, def.table).where(def.primaryKey, id).first());
      if (result.ok && result.value) return this.hydrate(Class, result.value);
    }

    const remote = this.participating(def, "remote");
    if (remote) {
      const result = await this.attempt(def, "remote", "find", () => remote.show(def.resource, id));
      const item = result.ok && result.value.successful ? result.value.item() : null;
      if (item) {
        const entity = this.hydrate(Class, item);
        await this.syncToLocal(entity);
        return entity;
      }
    }
    return null;
  }

  /** Every local row when local answers, else every remote item. Never merged. */
  async allModels<T extends Entity>(Class: Constructor<T>): Promise<T[]> {
    const def = new Class().def;
    if (!this.anyStore(def, "allModels")) return [];

    const local = this.participating(def, "local");
    if (local) {
      const result = await this.attempt(def, "local", "allModels", () => new QueryBuilder(local, def.table).get());
      if (result.ok) return this.hydrateAll(Class, result.value);
    }

    const remote = this.participating(def, "remote");
    if (remote) {
      const result = await this.attempt(def, "remote", "allModels", () => remote.index(def.resource));
      if (result.ok && result.value.successful) {
        const entities = this.hydrateAll(Class, result.value.list());
        for (const entity of entities) await this.syncToLocal(entity);
        return entities;
      }
    }
    return [];
  }

  /** A fresh builder on the entity's table. Throws core.not_configured without a local store. */
  query<T extends Entity>(Class: Constructor<T>): QueryBuilder {
    const def = new Class().def;
    if (!this.local) {
      throw ErrNotConfigured.create({ entityType: def.name, requirement: "a local store" });
    }
    return new QueryBuilder(this.local, def.table);
  }

  /** Local rows matching one condition, as entities */
  async where<T extends Entity>(
    Class: Constructor<T>,
    column: string,
    ...args: [value: unknown] | [operator: string, value: unknown]
  ): Promise<T[]> {
    const rows = await this.query(Class).where(column, ...args).get();
    return this.hydrateAll(Class, rows);
  }

  hydrate<T extends Entity>(Class: Constructor<T>, row: Row): T {
    const entity = new Class();
    entity.setRawAttributes(row, true);
    entity.exists = true;
    return entity;
  }

  hydrateAll<T extends Entity>(Class: Constructor<T>, rows: readonly Row[]): T[] {
    return rows.map((row) => this.hydrate(Class, row));
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /** Create or update in every participating store; true when any of them took the write. */
  async save(entity: Entity): Promise<boolean> {
    const def = entity.def;
    const creating = !entity.exists;

    await this.fire("saving", entity);
    await this.fire(creating ? "creating" : "updating", entity);
    entity.updateTimestamps(this.clock());

    if (!this.anyStore(def, "save")) return false;

    const payload = entity.toStorageMap();
    const remoteOk = await this.saveRemote(entity, payload, creating);
    const localOk = await this.saveLocal(entity, creating);

    if (!remoteOk && !localOk) return false;

    entity.exists = true;
    entity.recentlyCreated = creating;
    entity.syncOriginal();
    await this.fire(creating ? "created" : "updated", entity);
    await this.fire("saved", entity);
    return true;
  }

  /** Remove from every participating store; true when any of them did. */
  async delete(entity: Entity): Promise<boolean> {
    const def = entity.def;
    const id = entity.getKey();
    if (!entity.exists || id === null) return false;
    if (!this.anyStore(def, "delete")) return false;

    let deleted = false;

    const remote = this.participating(def, "remote");
    if (remote) {
      const result = await this.attempt(def, "remote", "delete", () => remote.destroy(def.resource, id));
      deleted = result.ok && result.value.successful;
    }

    const local = this.participating(def, "local");
    if (local) {
      const result = await this.attempt(def, "local", "delete", () =>
        new QueryBuilder(local, def.table).where(def.primaryKey, id).delete());
      deleted = result.ok || deleted;
    }

    if (!deleted) return false;
    entity.exists = false;
    await this.fire("deleted", entity);
    return true;
  }

  /** Reload attributes from local, else remote, and resync the snapshot. */
  async refresh(entity: Entity): Promise<boolean> {
    const def = entity.def;
    const id = entity.getKey();
    if (!entity.exists || id === null) return false;
    if (!this.anyStore(def, "refresh")) return false;

    const local = this.participating(def, "local");
    if (local) {
      const result = await this.attempt(def, "local", "refresh", () =>
        new QueryBuilder(local, def.table).where(def.primaryKey, id).first());
      if (result.ok && result.value) {
        entity.setRawAttributes(result.value, true);
        return true;
      }
    }

    const remote = this.participating(def, "remote");
    if (remote) {
      const result = await this.attempt(def, "remote", "refresh", () => remote.show(def.resource, id));
      const item = result.ok && result.value.successful ? result.value.item() : null;
      if (item) {
        entity.setRawAttributes(item, true);
        return true;
      }
    }
    return false;
  }

  /** save/delete/refresh/touch bound to one entity */
  persistable(entity: Entity): Persistable {
    return {
      entity,
      save: () => this.save(entity),
      delete: () => this.delete(entity),
      refresh: () => this.refresh(entity),
      touch: async () => entity.touch(this.clock()) && this.save(entity),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async saveRemote(entity: Entity, payload: Record<string, unknown>, creating: boolean): Promise<boolean> {
    const def = entity.def;
    const remote = this.participating(def, "remote");
    if (!remote) return false;

    const id = entity.getKey();
    if (!creating && id === null) return false;

    const result = await this.attempt(def, "remote", "save", () =>
      creating || id === null ? remote.store(def.resource, payload) : remote.update(def.resource, id, payload));
    if (!result.ok || !result.value.successful) return false;

    if (creating) {
      const assigned = result.value.item()?.[def.primaryKey];
      if (isKeyValue(assigned)) entity.setKey(assigned);
    }
    return true;
  }

  private async saveLocal(entity: Entity, creating: boolean): Promise<boolean> {
    const def = entity.def;
    const local = this.participating(def, "local");
    if (!local) return false;

    const result = await this.attempt(def, "local", "save", async () => {
      // Re-serialised so a key assigned by the remote store is included
      const row = await this.filterToColumns(local, def.table, entity.toStorageMap());
      const id = entity.getKey();
      if (creating) {
        const insertedId = await new QueryBuilder(local, def.table).insert(row);
        if (id === null && insertedId !== null) entity.setKey(insertedId);
        return;
      }
      if (id === null) throw ErrNotConfigured.create({ entityType: def.name, requirement: "a primary key to update by" });
      await new QueryBuilder(local, def.table).where(def.primaryKey, id).update(row);
    });
    return result.ok;
  }

  /** Best-effort copy of a remote-sourced entity into the local store */
  private async syncToLocal(entity: Entity): Promise<void> {
    const def = entity.def;
    const local = this.participating(def, "local");
    const id = entity.getKey();
    if (!local || id === null) return;

    try {
      const row = await this.filterToColumns(local, def.table, entity.toStorageMap());
      const present = await new QueryBuilder(local, def.table).where(def.primaryKey, id).exists();
      if (present) await new QueryBuilder(local, def.table).where(def.primaryKey, id).update(row);
      else await new QueryBuilder(local, def.table).insert(row);
    } catch (err) {
      this.logger.debug(`local sync of ${def.name} ${id} failed`, TandemError.from(err));
    }
  }

  /** Drop keys that are not columns of the table */
  private async filterToColumns(local: LocalStore, table: string, data: Record<string, unknown>): Promise<Record<string, unknown>> {
    const columns = new Set(await local.getColumns(table));
    return Object.fromEntries(Object.entries(data).filter(([key]) => columns.has(key)));
  }

  private participating(def: EntityDef, store: "local"): LocalStore | undefined;
  private participating(def: EntityDef, store: "remote"): RemoteResource | undefined;
  private participating(def: EntityDef, store: StoreName): LocalStore | RemoteResource | undefined {
    if (store === "local") return def.useLocal ? this.local : undefined;
    return def.useRemote ? this.remote : undefined;
  }

  /** False (and a debug line) when neither store can take part */
  private anyStore(def: EntityDef, operation: string): boolean {
    if (this.participating(def, "local") || this.participating(def, "remote")) return true;
    const err = ErrNotConfigured.create({ entityType: def.name, requirement: "a local or remote store" }, operation);
    this.logger.debug(err.message);
    return false;
  }

  private attempt<T>(def: EntityDef, store: StoreName, operation: string, fn: () => Promise<T>): Promise<StoreResult<T>> {
    return StoreResult.attempt({ store, entityType: def.name, operation, logger: this.logger }, fn);
  }

  /** Listener failures are logged, never propagated */
  private async fire(name: ModelEventName, entity: Entity): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.dispatch({ name, entity });
    } catch (err) {
      this.logger.warn(`${name} listener failed for ${entity.def.name}`, TandemError.from(err));
    }
  }
}
