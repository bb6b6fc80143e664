/**
 * @tandem/persistence - coordinator, lifecycle events and factories
 */

export { PersistenceCoordinator } from "./coordinator.js";
export type { CoordinatorDeps } from "./coordinator.js";
export type { Persistable } from "./persistable.js";
export { StoreResult } from "./store-result.js";
export type { StoreName, AttemptContext } from "./store-result.js";
export { ModelEvents } from "./events.js";
export type { ModelEvent, ModelEventName, ModelEventListener, EventSink } from "./events.js";
export { EntityFactory } from "./factory.js";
export type { EntityFactoryOptions } from "./factory.js";
