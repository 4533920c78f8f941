import type { z } from "zod";
import type { EntityKind } from "@appsource/schema";
import { REQUIRED_KEYS } from "@appsource/schema";
import type { Diagnostics } from "../diagnostics.js";
import { ValidationError } from "../errors.js";
import { isRawRecord, type Extensions, type RawRecord } from "./types.js";

export interface ReadContext {
  diagnostics: Diagnostics;
  /** Where the record sits in the document, e.g. `apps[2].versions[0]`. */
  path: string;
}

/**
 * Splits a raw record into the fields `schema` declares (each checked on its
 * own) and everything else. Keys in `nested` are left to the caller.
 */
export function readFields<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  raw: RawRecord,
  context: ReadContext,
  nested: readonly string[] = []
) {
  const accepted: RawRecord = {};
  const extensions: Extensions = {};

  for (const [key, value] of Object.entries(raw)) {
    if (nested.includes(key)) {
      continue;
    }

    const field = Object.prototype.hasOwnProperty.call(schema.shape, key) ? schema.shape[key] : undefined;
    if (!field) {
      extensions[key] = value;
      continue;
    }

    const result = field.safeParse(value);
    if (result.success) {
      accepted[key] = result.data;
    } else {
      extensions[key] = value;
      context.diagnostics.warn("field.invalid", `${context.path}.${key} has an unexpected value and was kept as-is`, {
        path: context.path,
        key,
        issues: result.error.issues.map((issue) => issue.message)
      });
    }
  }

  // Every accepted value already passed its own field schema.
  const fields = schema.partial().parse(accepted);
  return { fields, extensions };
}

export function missingKeys(kind: EntityKind, record: RawRecord): string[] {
  return REQUIRED_KEYS[kind].filter((key) => record[key] === undefined || record[key] === null);
}

export function reportMissingKeys(kind: EntityKind, record: RawRecord, context: ReadContext) {
  const missing = missingKeys(kind, record);
  if (missing.length === 0) {
    return;
  }

  const error = new ValidationError(`${context.path} is missing required keys: ${missing.join(", ")}`, missing, {
    kind
  });
  context.diagnostics.warn("entity.missing_keys", error.message, { path: context.path, ...error.details });
}

/**
 * Writes the named fields in declaration order, skipping `undefined`. With
 * `fullDocument`, extension fields follow (never overriding a named field).
 */
export function writeFields(
  keys: readonly string[],
  record: RawRecord,
  extensions: Extensions,
  fullDocument: boolean
): RawRecord {
  const output: RawRecord = {};
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined) {
      output[key] = value;
    }
  }

  if (fullDocument) {
    for (const [key, value] of Object.entries(extensions)) {
      if (!(key in output) && value !== undefined) {
        output[key] = value;
      }
    }
  }

  return output;
}

export function childPath(parent: string, key: string, index?: number) {
  const base = parent ? `${parent}.${key}` : key;
  return index === undefined ? base : `${base}[${index}]`;
}

/** Reads an array of nested records, dropping (and reporting) entries that are not objects. */
export function readList<R>(
  value: unknown,
  context: ReadContext,
  key: string,
  read: (raw: RawRecord, context: ReadContext) => R
): R[] | undefined {
  const path = childPath(context.path, key);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    context.diagnostics.warn("field.invalid", `${path} is not a list and was ignored`, { path });
    return undefined;
  }

  const records: R[] = [];
  value.forEach((entry: unknown, index) => {
    const entryPath = childPath(context.path, key, index);
    if (!isRawRecord(entry)) {
      context.diagnostics.warn("entity.not_an_object", `${entryPath} is not an object and was dropped`, {
        path: entryPath
      });
      return;
    }
    records.push(read(entry, { ...context, path: entryPath }));
  });
  return records;
}
