/**
 * NodePlatform - assembles a runtime from a TandemConfig.
 *
 *   const runtime = NodePlatform.boot(ConfigLoader.fromFile("tandem.yaml"));
 *   await runtime.lifecycle.start();
 *   const user = await runtime.coordinator.find(User, 1);
 *   await runtime.lifecycle.stop();
 *
 * Config decides which stores exist. Overrides inject prebuilt pieces
 * instead, e.g. a fake remote or a capturing log sink in tests.
 */

import {
  LifecycleManager,
  Logger,
  StaticTypeCompanion,
  type Lifecycle,
  type LifecycleMethods,
  type LogSink,
  type LocalStore,
  type RemoteResource,
  type Timestamp,
} from "@tandem/core";
import {ModelEvents, PersistenceCoordinator} from "@tandem/persistence";
import {HttpResourceClient, type FetchFn, type Interceptor} from "@tandem/remote-http";
import {SqliteLocalStore} from "@tandem/storage-sqlite";
import type {TandemConfig} from "./config.js";

export interface PlatformOverrides {
  sink?: LogSink;
  logger?: Logger;
  /** Used instead of opening `database.path` */
  local?: LocalStore & Partial<Lifecycle>;
  /** Used instead of building an HttpResourceClient from `remote` */
  remote?: RemoteResource;
  /** fetch for the HttpResourceClient built from config */
  fetch?: FetchFn;
  interceptors?: readonly Interceptor[];
  events?: ModelEvents;
  clock?: () => Timestamp;
}

export interface TandemRuntime extends Lifecycle {
  readonly config: TandemConfig;
  readonly logger: Logger;
  readonly events: ModelEvents;
  readonly local?: LocalStore;
  readonly remote?: RemoteResource;
  readonly coordinator: PersistenceCoordinator;
}

class NodeRuntime implements TandemRuntime {
  readonly lifecycle: LifecycleMethods;

  constructor(
    readonly config: TandemConfig,
    readonly logger: Logger,
    readonly events: ModelEvents,
    readonly coordinator: PersistenceCoordinator,
    readonly local: (LocalStore & Partial<Lifecycle>) | undefined,
    readonly remote: RemoteResource | undefined,
  ) {
    this.lifecycle = LifecycleManager.auto(() => {
      const owned = this.local?.lifecycle;
      return owned ? [{ lifecycle: owned }] : [];
    });
  }
}

export const NodePlatform = StaticTypeCompanion({
  boot(config: TandemConfig, overrides: PlatformOverrides = {}): TandemRuntime {
    const logger = overrides.logger ?? new Logger({ level: config.logging.level, sink: overrides.sink });
    const events = overrides.events ?? new ModelEvents({ logger: logger.child("events") });

    const local = overrides.local ?? (config.database
      ? SqliteLocalStore.open(config.database.path, { logger: logger.child("sqlite") })
      : undefined);

    const remote = overrides.remote ?? (config.remote
      ? new HttpResourceClient({
          baseUrl: config.remote.baseUrl,
          timeoutMs: config.remote.timeoutMs,
          defaultHeaders: config.remote.headers,
          interceptors: overrides.interceptors,
          fetch: overrides.fetch,
          logger: logger.child("http"),
        })
      : undefined);

    const coordinator = new PersistenceCoordinator({
      local,
      remote,
      events,
      logger: logger.child("coordinator"),
      clock: overrides.clock,
    });

    logger.debug("runtime booted", { local: local !== undefined, remote: remote !== undefined });
    return new NodeRuntime(config, logger, events, coordinator, local, remote);
  },
});
