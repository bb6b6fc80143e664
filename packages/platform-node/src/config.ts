/**
 * TandemConfig - the YAML file a runtime boots from.
 *
 *   database:
 *     path: ./storage/app.sqlite
 *   remote:
 *     baseUrl: https://api.example.test
 *     timeoutMs: 10000
 *     headers: { Accept: application/json }
 *   logging:
 *     level: info
 *
 * Omitting `database` or `remote` boots without that store.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import {z} from "zod";
import {StaticTypeCompanion} from "@tandem/core";
import {ErrConfigInvalid, ErrConfigUnreadable} from "./errors.js";

export const MEMORY_DATABASE = ":memory:";

const DatabaseSchema = z.object({
  path: z.string().min(1),
}).strict();

const RemoteSchema = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive().default(10_000),
  headers: z.record(z.string()).default({}),
}).strict();

const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
}).strict();

export const TandemConfigSchema = z.object({
  database: DatabaseSchema.optional(),
  remote: RemoteSchema.optional(),
  logging: LoggingSchema.default({}),
}).strict();

export type TandemConfig = z.infer<typeof TandemConfigSchema>;
export type TandemConfigInput = z.input<typeof TandemConfigSchema>;

function summarise(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export const ConfigLoader = StaticTypeCompanion({
  /** Read and validate a YAML file; a relative database path resolves against the file's directory */
  fromFile(file: string): TandemConfig {
    const text = ErrConfigUnreadable.wrap({ path: file }, () => fs.readFileSync(file, "utf8"));

    let raw: unknown;
    try {
      raw = YAML.parse(text);
    } catch (err) {
      throw ErrConfigInvalid.create({ source: file, issues: "not valid YAML" }, err);
    }

    const config = ConfigLoader.fromObject(raw ?? {}, file);
    const database = config.database;
    if (!database || database.path === MEMORY_DATABASE || path.isAbsolute(database.path)) return config;
    return { ...config, database: { path: path.resolve(path.dirname(file), database.path) } };
  },

  /** Validate an already-parsed value, filling defaults */
  fromObject(value: unknown, source = "config object"): TandemConfig {
    const result = TandemConfigSchema.safeParse(value);
    if (!result.success) {
      throw ErrConfigInvalid.create({ source, issues: summarise(result.error) });
    }
    return result.data;
  },
});
