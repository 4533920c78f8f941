import { VersionSchema } from "@appsource/schema";
import { missingKeys, readFields, reportMissingKeys, writeFields, type ReadContext } from "./fields.js";
import type { RawRecord, Version } from "./types.js";

const VERSION_KEYS = Object.keys(VersionSchema.shape);

export function readVersion(raw: RawRecord, context: ReadContext): Version {
  const { fields, extensions } = readFields(VersionSchema, raw, context);
  reportMissingKeys("version", fields, context);
  return { ...fields, extensions };
}

export function isVersionValid(version: Version) {
  return missingKeys("version", version).length === 0;
}

export function writeVersion(version: Version, fullDocument: boolean): RawRecord {
  return writeFields(VERSION_KEYS, version, version.extensions, fullDocument);
}

/** Versions collide when both their display and build versions match. */
export function sameRelease(left: Version, right: Version) {
  return left.version === right.version && left.buildVersion === right.buildVersion;
}
