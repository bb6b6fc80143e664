/**
 * Binding preparation: turn attribute values into something the driver binds.
 */

import {Timestamp, type SqlValue} from "@tandem/core";

export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") return value;
  if (value instanceof Uint8Array) return value;
  if (value instanceof Timestamp) return value.format();
  if (value instanceof Date) return Timestamp.fromDate(value).format();
  // Maps, lists and anything with toJSON (entities) are stored as JSON text
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function toSqlValues(values: readonly unknown[]): SqlValue[] {
  return values.map(toSqlValue);
}
