import { AppFieldsSchema, AppSchema } from "@appsource/schema";
import { childPath, missingKeys, readFields, readList, reportMissingKeys, writeFields, type ReadContext } from "./fields.js";
import { isPermissionsValid, readPermissions, writePermissions } from "./permissions.js";
import { isRawRecord, type App, type RawRecord, type Version } from "./types.js";
import { isVersionValid, readVersion, sameRelease, writeVersion } from "./version.js";

const APP_KEYS = Object.keys(AppSchema.shape);

/**
 * Builds the single version a first-generation document describes through its
 * top-level `version`, `versionDate`, `downloadURL`, `versionDescription` and
 * `size` fields.
 */
export function synthesizeLegacyVersion(raw: RawRecord, context: ReadContext): Version {
  const legacy: RawRecord = {};
  const mapping: Array<[string, string]> = [
    ["version", "version"],
    ["versionDate", "date"],
    ["downloadURL", "downloadURL"],
    ["versionDescription", "localizedDescription"],
    ["size", "size"]
  ];
  for (const [from, to] of mapping) {
    if (raw[from] !== undefined && raw[from] !== null) {
      legacy[to] = raw[from];
    }
  }

  context.diagnostics.info("app.legacy_version", `${context.path} has no versions; built one from its legacy fields`, {
    path: context.path
  });
  return readVersion(legacy, { ...context, path: childPath(context.path, "versions", 0) });
}

export function readApp(raw: RawRecord, context: ReadContext): App {
  const { fields, extensions } = readFields(AppFieldsSchema, raw, context, ["versions", "appPermissions"]);

  const versions =
    raw.versions === undefined
      ? [synthesizeLegacyVersion(raw, context)]
      : readList(raw.versions, context, "versions", readVersion) ?? [];

  const app: App = { ...fields, versions, extensions };

  if (isRawRecord(raw.appPermissions)) {
    app.appPermissions = readPermissions(raw.appPermissions, {
      ...context,
      path: childPath(context.path, "appPermissions")
    });
  } else if (raw.appPermissions !== undefined && raw.appPermissions !== null) {
    extensions.appPermissions = raw.appPermissions;
    context.diagnostics.warn("field.invalid", `${context.path}.appPermissions is not an object and was kept as-is`, {
      path: context.path,
      key: "appPermissions"
    });
  }

  reportMissingKeys("app", app, context);
  return app;
}

/** The key an app is tracked by inside a catalog. */
export function appIdentity(app: App): string | undefined {
  return app.appID ?? app.bundleIdentifier;
}

export function isAppValid(app: App) {
  let validVersions = app.versions.length >= 1 && app.versions.every(isVersionValid);

  // First-generation documents describe their version at the top level.
  if (!validVersions) {
    validVersions = app.version !== undefined && app.downloadURL !== undefined && app.versionDate !== undefined;
  }

  const validPermissions = app.appPermissions === undefined || isPermissionsValid(app.appPermissions);
  return validVersions && validPermissions && missingKeys("app", app).length === 0;
}

function timestamp(version: Version) {
  const parsed = version.date ? Date.parse(version.date) : Number.NaN;
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * The first entry of `versions`, which the merge rules keep as the newest one.
 * With `byDate`, the entry with the latest `date` instead.
 */
export function latestVersion(app: App, options: { byDate?: boolean } = {}): Version | undefined {
  if (!options.byDate) {
    return app.versions[0];
  }

  let latest: Version | undefined;
  for (const version of app.versions) {
    if (!latest || timestamp(version) > timestamp(latest)) {
      latest = version;
    }
  }
  return latest;
}

/** Copies the newest version onto the deprecated top-level fields. */
export function syncLegacyFields(app: App) {
  const newest = app.versions[0];
  if (!newest) {
    return;
  }

  app.version = newest.version;
  app.size = newest.size;
  app.downloadURL = newest.downloadURL;
  app.versionDate = newest.date;
  app.versionDescription = newest.localizedDescription;
}

export function addVersion(app: App, version: Version): "added" | "replaced" {
  const index = app.versions.findIndex((existing) => sameRelease(existing, version));
  let outcome: "added" | "replaced";

  if (index === -1) {
    app.versions.unshift(version);
    outcome = "added";
  } else {
    app.versions[index] = version;
    outcome = "replaced";
  }

  syncLegacyFields(app);
  return outcome;
}

export function writeApp(app: App, fullDocument: boolean): RawRecord {
  return writeFields(
    APP_KEYS,
    {
      ...app,
      versions: app.versions.map((version) => writeVersion(version, fullDocument)),
      appPermissions: app.appPermissions ? writePermissions(app.appPermissions, fullDocument) : undefined
    },
    app.extensions,
    fullDocument
  );
}
