/**
 * Relation - typed factories for materialising nested payloads into entities.
 *
 *   relations: {
 *     author: Relation.one(() => new User()),
 *     comments: Relation.many(() => new Comment()),
 *   }
 *
 * The factory is a thunk so definitions can refer to classes declared later.
 */

import type {Entity} from "./entity.js";
import {StaticTypeCompanion} from "./companion.js";

export interface OneRelation<T extends Entity = Entity> {
  readonly kind: "one";
  readonly make: () => T;
}

export interface ManyRelation<T extends Entity = Entity> {
  readonly kind: "many";
  readonly make: () => T;
}

export type Relation<T extends Entity = Entity> = OneRelation<T> | ManyRelation<T>;

export type RelationMap = Readonly<Record<string, Relation>>;

export const Relation = StaticTypeCompanion({
  one<T extends Entity>(make: () => T): OneRelation<T> {
    return Object.freeze({ kind: "one" as const, make });
  },

  many<T extends Entity>(make: () => T): ManyRelation<T> {
    return Object.freeze({ kind: "many" as const, make });
  },
});
