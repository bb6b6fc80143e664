/**
 * Model lifecycle events fired by the coordinator around save and delete.
 */

import {Logger, TandemError, type Entity} from "@tandem/core";

export type ModelEventName = "saving" | "creating" | "created" | "updating" | "updated" | "deleted" | "saved";

export interface ModelEvent {
  readonly name: ModelEventName;
  readonly entity: Entity;
}

/** Anything that can receive model events; dispatch may be sync or async */
export interface EventSink {
  dispatch(event: ModelEvent): void | Promise<void>;
}

export type ModelEventListener = (event: ModelEvent) => void | Promise<void>;

/**
 * In-process listener registry. Listeners run in registration order; a
 * failing listener is logged and the rest still run.
 */
export class ModelEvents implements EventSink {
  private readonly listeners = new Map<ModelEventName, ModelEventListener[]>();
  private readonly logger: Logger;

  constructor(opts: { logger?: Logger } = {}) {
    this.logger = opts.logger ?? Logger.silent();
  }

  /** Returns an unsubscribe function */
  on(name: ModelEventName, listener: ModelEventListener): () => void {
    const list = this.listeners.get(name) ?? [];
    list.push(listener);
    this.listeners.set(name, list);
    return () => this.off(name, listener);
  }

  off(name: ModelEventName, listener: ModelEventListener): void {
    const list = this.listeners.get(name);
    if (!list) return;
    const idx = list.indexOf(listener);
    if (idx !== -1) list.splice(idx, 1);
  }

  async dispatch(event: ModelEvent): Promise<void> {
    for (const listener of [...(this.listeners.get(event.name) ?? [])]) {
      try {
        await listener(event);
      } catch (err) {
        this.logger.warn(`${event.name} listener failed for ${event.entity.def.name}`, TandemError.from(err));
      }
    }
  }
}
