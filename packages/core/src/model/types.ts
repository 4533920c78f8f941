import type {
  AppFields,
  CatalogFields,
  EntitlementDocument,
  NewsArticleDocument,
  PrivacyUsageDocument,
  VersionDocument
} from "@appsource/schema";

/**
 * Fields a document carried that this model does not name (or named, but with
 * a value of the wrong type). They are written back out with full documents.
 */
export type Extensions = Record<string, unknown>;

// Required keys may be absent on loaded entities: a document that misses them
// is reported, not rejected.
export type Version = Partial<VersionDocument> & { extensions: Extensions };

export type Entitlement = Partial<EntitlementDocument> & { extensions: Extensions };

export type PrivacyUsage = Partial<PrivacyUsageDocument> & { extensions: Extensions };

export type Permissions = {
  entitlements?: Entitlement[];
  privacy?: PrivacyUsage[];
  extensions: Extensions;
};

export type App = Partial<AppFields> & {
  versions: Version[];
  appPermissions?: Permissions;
  extensions: Extensions;
};

export type NewsArticle = Partial<NewsArticleDocument> & { extensions: Extensions };

export type Catalog = Partial<CatalogFields> & {
  apps: App[];
  news?: NewsArticle[];
  extensions: Extensions;
};

export type RawRecord = Record<string, unknown>;

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
