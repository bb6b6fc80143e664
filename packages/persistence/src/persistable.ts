import type {Entity} from "@tandem/core";

/** An entity bound to the coordinator that persists it */
export interface Persistable {
  readonly entity: Entity;
  save(): Promise<boolean>;
  delete(): Promise<boolean>;
  refresh(): Promise<boolean>;
  /** Bump the updated timestamp and save; false when timestamps are off */
  touch(): Promise<boolean>;
}
