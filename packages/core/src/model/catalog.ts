import { CATALOG_API_VERSION, CatalogFieldsSchema, CatalogSchema } from "@appsource/schema";
import type { Diagnostics } from "../diagnostics.js";
import type { EntityKind } from "@appsource/schema";
import { appIdentity, isAppValid, readApp, writeApp } from "./app.js";
import { childPath, missingKeys, readFields, readList, reportMissingKeys, writeFields } from "./fields.js";
import { isNewsArticleValid, readNewsArticle, writeNewsArticle } from "./news.js";
import { unknownPrivacyCategories } from "./permissions.js";
import type { Catalog, RawRecord } from "./types.js";

const CATALOG_KEYS = Object.keys(CatalogSchema.shape);

export interface SerializeOptions {
  /** Also write fields this model does not name. */
  fullDocument?: boolean;
}

/**
 * Reads a parsed catalog document. Nothing here throws on bad content:
 * missing keys, wrong-typed fields and malformed entries are recorded in
 * `diagnostics` and the best-effort record is returned.
 */
export function readCatalog(raw: RawRecord, diagnostics: Diagnostics): Catalog {
  const context = { diagnostics, path: "catalog" };
  const { fields, extensions } = readFields(CatalogFieldsSchema, raw, context, ["apps", "news"]);

  const catalog: Catalog = {
    ...fields,
    apps: readList(raw.apps, context, "apps", readApp) ?? [],
    extensions
  };

  const news = readList(raw.news, context, "news", readNewsArticle);
  if (news) {
    catalog.news = news;
  }

  // Loaded documents are always written back in the current layout.
  catalog.apiVersion = CATALOG_API_VERSION;

  reportMissingKeys("catalog", { ...catalog, apps: raw.apps }, context);
  return catalog;
}

export function createCatalog(details: { name: string; identifier: string }): Catalog {
  return {
    name: details.name,
    identifier: details.identifier,
    apiVersion: CATALOG_API_VERSION,
    apps: [],
    news: [],
    extensions: {}
  };
}

export function isCatalogValid(catalog: Catalog) {
  return (
    missingKeys("catalog", catalog).length === 0 &&
    catalog.apps.every(isAppValid) &&
    (catalog.news ?? []).every(isNewsArticleValid)
  );
}

export interface CatalogIssue {
  severity: "error" | "warning";
  path: string;
  message: string;
}

function missingKeyIssues(
  kind: EntityKind,
  record: RawRecord,
  path: string,
  severity: CatalogIssue["severity"] = "error"
): CatalogIssue[] {
  const missing = missingKeys(kind, record);
  return missing.length === 0 ? [] : [{ severity, path, message: `Missing keys: ${missing.join(", ")}` }];
}

/**
 * Everything `isCatalogValid` objects to, as errors, plus warnings that do not
 * make the catalog invalid (such as privacy categories outside the known set).
 */
export function catalogIssues(catalog: Catalog): CatalogIssue[] {
  const issues = missingKeyIssues("catalog", catalog, "catalog");

  catalog.apps.forEach((app, index) => {
    const path = `${childPath("catalog", "apps", index)} (${appIdentity(app) ?? "unknown"})`;
    // Legacy top-level version fields can keep an app valid despite incomplete entries.
    const versionSeverity = isAppValid(app) ? "warning" : "error";
    issues.push(...missingKeyIssues("app", app, path));
    app.versions.forEach((version, position) => {
      issues.push(...missingKeyIssues("version", version, childPath(path, "versions", position), versionSeverity));
    });
    if (app.versions.length === 0 && versionSeverity === "error") {
      issues.push({ severity: "error", path, message: "No versions" });
    }

    (app.appPermissions?.entitlements ?? []).forEach((entry, position) => {
      issues.push(...missingKeyIssues("entitlement", entry, childPath(path, "appPermissions.entitlements", position)));
    });
    (app.appPermissions?.privacy ?? []).forEach((entry, position) => {
      issues.push(...missingKeyIssues("privacy", entry, childPath(path, "appPermissions.privacy", position)));
    });
    for (const name of unknownPrivacyCategories(app.appPermissions)) {
      issues.push({ severity: "warning", path, message: `Unknown privacy category ${name}` });
    }
  });

  (catalog.news ?? []).forEach((article, index) => {
    issues.push(...missingKeyIssues("news", article, childPath("catalog", "news", index)));
  });

  return issues;
}

export function serializeCatalog(catalog: Catalog, options: SerializeOptions = {}): RawRecord {
  const fullDocument = options.fullDocument ?? false;
  return writeFields(
    CATALOG_KEYS,
    {
      ...catalog,
      apps: catalog.apps.map((app) => writeApp(app, fullDocument)),
      news: catalog.news?.map((article) => writeNewsArticle(article, fullDocument))
    },
    catalog.extensions,
    fullDocument
  );
}
