import {
  EntitlementSchema,
  isKnownPrivacyCategory,
  PrivacyUsageSchema,
  type PermissionsDocument
} from "@appsource/schema";
import { missingKeys, readFields, readList, reportMissingKeys, writeFields, type ReadContext } from "./fields.js";
import type { Entitlement, Permissions, PrivacyUsage, RawRecord } from "./types.js";

const ENTITLEMENT_KEYS = Object.keys(EntitlementSchema.shape);
const PRIVACY_KEYS = Object.keys(PrivacyUsageSchema.shape);

export function readEntitlement(raw: RawRecord, context: ReadContext): Entitlement {
  const { fields, extensions } = readFields(EntitlementSchema, raw, context);
  reportMissingKeys("entitlement", fields, context);
  return { ...fields, extensions };
}

export function readPrivacyUsage(raw: RawRecord, context: ReadContext): PrivacyUsage {
  const { fields, extensions } = readFields(PrivacyUsageSchema, raw, context);
  reportMissingKeys("privacy", fields, context);
  if (fields.name && !isKnownPrivacyCategory(fields.name)) {
    context.diagnostics.warn("privacy.unknown_category", `${context.path} uses unknown privacy category ${fields.name}`, {
      path: context.path,
      name: fields.name
    });
  }
  return { ...fields, extensions };
}

export function readPermissions(raw: RawRecord, context: ReadContext): Permissions {
  const extensions: RawRecord = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key !== "entitlements" && key !== "privacy") {
      extensions[key] = value;
    }
  }

  return {
    entitlements: readList(raw.entitlements, context, "entitlements", readEntitlement),
    privacy: readList(raw.privacy, context, "privacy", readPrivacyUsage),
    extensions
  };
}

export function isPermissionsValid(permissions: Permissions) {
  return (
    (permissions.entitlements ?? []).every((entry) => missingKeys("entitlement", entry).length === 0) &&
    (permissions.privacy ?? []).every((entry) => missingKeys("privacy", entry).length === 0)
  );
}

/** Privacy entries are accepted whatever their name; this lists the names outside the known set. */
export function unknownPrivacyCategories(permissions: Permissions | undefined): string[] {
  return (permissions?.privacy ?? [])
    .map((entry) => entry.name)
    .filter((name): name is string => typeof name === "string" && !isKnownPrivacyCategory(name));
}

export function emptyPermissions(): Permissions {
  return { entitlements: [], privacy: [], extensions: {} };
}

export function writePermissions(permissions: Permissions, fullDocument: boolean): RawRecord {
  const output: RawRecord = {
    entitlements: (permissions.entitlements ?? []).map((entry) =>
      writeFields(ENTITLEMENT_KEYS, entry, entry.extensions, fullDocument)
    ),
    privacy: (permissions.privacy ?? []).map((entry) => writeFields(PRIVACY_KEYS, entry, entry.extensions, fullDocument))
  };
  return fullDocument ? { ...output, ...withoutKeys(permissions.extensions, Object.keys(output)) } : output;
}

function withoutKeys(record: RawRecord, keys: string[]) {
  return Object.fromEntries(Object.entries(record).filter(([key]) => !keys.includes(key)));
}

export function permissionsFromDocument(document: PermissionsDocument): Permissions {
  return {
    entitlements: document.entitlements.map((entry) => ({ ...entry, extensions: {} })),
    privacy: document.privacy.map((entry) => ({ ...entry, extensions: {} })),
    extensions: {}
  };
}
