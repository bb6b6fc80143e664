/**
 * Cast - per-field coercion between the stored representation and the value
 * callers work with.
 *
 * Decoding is lazy (every read), encoding is eager (every write). Decoding never
 * throws except for malformed JSON, which is a data defect and surfaces as
 * core.decode_failed.
 */

import {StaticTypeCompanion} from "./companion.js";
import {ErrDecodeFailed} from "./errors/errors.js";
import {isPlainObject} from "./plain.js";
import {Timestamp} from "./timestamp.js";

export type CastKind = "datetime" | "json" | "bool" | "int" | "double";

export const CastKinds: readonly CastKind[] = ["datetime", "json", "bool", "int", "double"];

/** Identifies the attribute being decoded, for error data */
export interface CastTarget {
  entityType: string;
  field: string;
}

const INTEGER_TEXT = /^[+-]?\d+$/;

function decodeDatetime(value: unknown): unknown {
  if (value instanceof Timestamp) return value;
  if (value instanceof Date) return Timestamp.fromDate(value);
  if (typeof value === "string") return Timestamp.parse(value) ?? value;
  return value;
}

function decodeJson(value: unknown, target: CastTarget): unknown {
  if (isPlainObject(value) || Array.isArray(value)) return value;
  if (typeof value !== "string") return value;
  return ErrDecodeFailed.wrap(target, (): unknown => JSON.parse(value));
}

function decodeBool(value: unknown): unknown {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value === 1;
  if (typeof value === "string") return value.toLowerCase() === "true";
  return value;
}

function decodeInt(value: unknown): unknown {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) return Number.parseInt(value.trim(), 10);
  return value;
}

function decodeDouble(value: unknown): unknown {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

export const Cast = StaticTypeCompanion({
  /** Stored value → rich value. `null`/`undefined` always read as null. */
  decode(kind: CastKind | undefined, value: unknown, target: CastTarget): unknown {
    if (value === null || value === undefined) return null;
    switch (kind) {
      case "datetime": return decodeDatetime(value);
      case "json": return decodeJson(value, target);
      case "bool": return decodeBool(value);
      case "int": return decodeInt(value);
      case "double": return decodeDouble(value);
      case undefined: return value;
    }
  },

  /**
   * Rich value → stored value. Temporal values become canonical text whatever
   * the cast; maps and lists on a json field become JSON text.
   */
  encode(kind: CastKind | undefined, value: unknown): unknown {
    if (value instanceof Timestamp) return value.format();
    if (value instanceof Date) return Timestamp.fromDate(value).format();
    if (kind === "json" && (isPlainObject(value) || Array.isArray(value))) {
      return JSON.stringify(value);
    }
    return value;
  },

  isCastKind(value: string): value is CastKind {
    return CastKinds.some((k) => k === value);
  },
});
