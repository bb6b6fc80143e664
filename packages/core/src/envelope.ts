/**
 * Envelope - unwraps the `{ data: ... }` wrapper many REST APIs put around
 * their payloads. Bare bodies are accepted as they are.
 */

import {StaticTypeCompanion} from "./companion.js";
import {isPlainObject} from "./plain.js";

export const Envelope = StaticTypeCompanion({
  /** `{data: {...}}` → inner map, any other map → itself, anything else → null */
  item(body: unknown): Record<string, unknown> | null {
    if (!isPlainObject(body)) return null;
    const inner = body["data"];
    return isPlainObject(inner) ? inner : body;
  },

  /** `{data: [...]}` or `[...]` → the maps in it; non-map items are dropped */
  list(body: unknown): Record<string, unknown>[] {
    const items = Array.isArray(body) ? body : isPlainObject(body) ? body["data"] : undefined;
    if (!Array.isArray(items)) return [];
    return items.filter(isPlainObject);
  },
});
