/**
 * Guards for the loosely typed values that flow through rows, response bodies
 * and attribute maps.
 */

/** Object literal or JSON-decoded object (prototype is Object.prototype or null) */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Primary key values accepted by both stores */
export type KeyValue = string | number;

export function isKeyValue(value: unknown): value is KeyValue {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}
