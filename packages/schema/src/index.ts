import { z } from "zod";

export const CATALOG_API_VERSION = "v2";

const SHA256_DIGEST_PATTERN = /^[a-f0-9]{64}$/i;

export function normalizeSha256(value: string | undefined | null): string | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  const digest = trimmed.toLowerCase().startsWith("sha256:") ? trimmed.slice(7).trim() : trimmed;

  if (!SHA256_DIGEST_PATTERN.test(digest)) {
    return undefined;
  }

  return digest.toLowerCase();
}

export function hasSha256Digest(value: string | undefined | null): boolean {
  return Boolean(normalizeSha256(value));
}

// Not exhaustive: the usage-description categories apps most commonly declare.
export const KNOWN_PRIVACY_CATEGORIES = [
  "BluetoothAlways",
  "BluetoothPeripheral",
  "Calendars",
  "Reminders",
  "Camera",
  "Microphone",
  "Contacts",
  "FaceID",
  "DesktopFolder",
  "DocumentsFolder",
  "DownloadsFolder",
  "NetworkVolumes",
  "RemovableVolumes",
  "FileProviderDomain",
  "GKFriendList",
  "HealthClinicalHealthRecordsShare",
  "HealthShare",
  "HealthUpdate",
  "HomeKit",
  "LocationAlwaysAndWhenInUse",
  "Location",
  "LocationWhenInUse",
  "LocationAlways",
  "AppleMusic",
  "Motion",
  "FallDetection",
  "LocalNetwork",
  "NearbyInteraction",
  "NearbyInteractionAllowOnce",
  "NFCReader",
  "PhotoLibraryAdd",
  "PhotoLibrary",
  "UserTracking",
  "AppleEvents",
  "SystemAdministration",
  "SensorKit",
  "Siri",
  "SpeechRecognition",
  "VideoSubscriberAccount",
  "Identity"
] as const;

const knownPrivacyCategories = new Set<string>(KNOWN_PRIVACY_CATEGORIES);

export function isKnownPrivacyCategory(name: string): boolean {
  return knownPrivacyCategories.has(name);
}

export const EntitlementSchema = z.object({
  name: z.string().min(1)
});

export const PrivacyUsageSchema = z.object({
  name: z.string().min(1),
  usageDescription: z.string()
});

export const PermissionsSchema = z.object({
  entitlements: z.array(EntitlementSchema).default([]),
  privacy: z.array(PrivacyUsageSchema).default([])
});

export const VersionSchema = z.object({
  version: z.string().min(1),
  absoluteVersion: z.string().min(1).optional(),
  buildVersion: z.string().min(1).optional(),
  date: z.string().min(1),
  localizedDescription: z.string().optional(),
  downloadURL: z.string(),
  size: z.number().int().nonnegative(),
  sha256: z.string().optional(),
  minOSVersion: z.string().optional(),
  maxOSVersion: z.string().optional()
});

/** Version 1 permission entries, e.g. `{ type: "camera", usageDescription: "..." }`. */
export const LegacyPermissionSchema = z.object({
  type: z.string(),
  usageDescription: z.string()
});

export const AppFieldsSchema = z.object({
  appID: z.string().min(1).optional(),
  name: z.string().min(1),
  bundleIdentifier: z.string().min(1),
  developerName: z.string().min(1),
  subtitle: z.string().optional(),
  localizedDescription: z.string(),
  iconURL: z.string(),
  tintColor: z.string().optional(),
  screenshotURLs: z.array(z.string()).optional(),
  beta: z.boolean().optional(),
  // Mirrors of the newest version, kept for consumers of the first document schema.
  version: z.string().optional(),
  versionDate: z.string().optional(),
  versionDescription: z.string().optional(),
  downloadURL: z.string().optional(),
  size: z.number().int().nonnegative().optional(),
  permissions: z.array(LegacyPermissionSchema).optional()
});

export const AppSchema = AppFieldsSchema.extend({
  versions: z.array(VersionSchema).min(1),
  appPermissions: PermissionsSchema.optional()
});

export const NewsArticleSchema = z.object({
  title: z.string().min(1),
  identifier: z.string().min(1),
  caption: z.string(),
  date: z.string().min(1),
  tintColor: z.string().optional(),
  imageURL: z.string().optional(),
  notify: z.boolean().optional(),
  url: z.string().optional(),
  appID: z.string().optional()
});

export const CatalogFieldsSchema = z.object({
  name: z.string().min(1),
  identifier: z.string().min(1),
  apiVersion: z.string().optional(),
  subtitle: z.string().optional(),
  description: z.string().optional(),
  iconURL: z.string().optional(),
  headerURL: z.string().optional(),
  website: z.string().optional(),
  tintColor: z.string().optional(),
  featuredApps: z.array(z.string()).optional(),
  userinfo: z.record(z.unknown()).optional()
});

export const CatalogSchema = CatalogFieldsSchema.extend({
  apps: z.array(AppSchema),
  news: z.array(NewsArticleSchema).optional()
});

export type EntityKind = "catalog" | "app" | "version" | "permissions" | "entitlement" | "privacy" | "news";

export const REQUIRED_KEYS: Record<EntityKind, readonly string[]> = {
  catalog: ["name", "identifier", "apps"],
  app: ["name", "bundleIdentifier", "developerName", "versions", "localizedDescription", "iconURL"],
  version: ["version", "date", "downloadURL", "size"],
  permissions: [],
  entitlement: ["name"],
  privacy: ["name", "usageDescription"],
  news: ["title", "identifier", "caption", "date"]
};

export const DEPRECATED_APP_KEYS = [
  "version",
  "versionDate",
  "versionDescription",
  "downloadURL",
  "size",
  "permissions"
] as const;

export const PROVIDER_KINDS = ["catalog", "github", "curated"] as const;

/**
 * A plain id, or a single-entry `{ appID: remoteId }` mapping used when the id
 * an app should carry in this catalog differs from the one the provider uses.
 */
export const IdEntrySchema = z.union([
  z.string().min(1),
  z
    .record(z.string().min(1))
    .refine((value) => Object.keys(value).length === 1, {
      message: "An id mapping must have exactly one entry"
    })
]);

export const MergeStrategySchema = z.enum(["replace", "patch"]);

export const CatalogProviderConfigSchema = z.object({
  kind: z.literal("catalog"),
  source: z.string().min(1),
  ids: z.array(IdEntrySchema).optional(),
  getAllApps: z.boolean().default(false),
  getAllNews: z.boolean().default(false),
  ignoreNews: z.boolean().default(false),
  mergeStrategy: MergeStrategySchema.default("replace")
});

export const UploadTargetSchema = z.object({
  repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
  tag: z.string().min(1).optional()
});

const releaseSelectionFields = {
  ids: z.array(IdEntrySchema).optional(),
  includePrereleases: z.boolean().default(false),
  preferDate: z.boolean().default(false),
  assetPattern: z.string().min(1).default(".*\\.ipa"),
  tagPattern: z.string().min(1).optional(),
  tagReplacement: z.string().default(""),
  extractTwice: z.boolean().default(false),
  upload: UploadTargetSchema.optional()
};

export const GithubProviderConfigSchema = z.object({
  kind: z.literal("github"),
  repository: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/)
    .optional(),
  url: z.string().url().optional(),
  ...releaseSelectionFields
});

export const CuratedProviderConfigSchema = z.object({
  kind: z.literal("curated"),
  url: z.string().url(),
  ...releaseSelectionFields
});

export const ProviderConfigSchema = z.discriminatedUnion("kind", [
  CatalogProviderConfigSchema,
  GithubProviderConfigSchema,
  CuratedProviderConfigSchema
]);

export const AppOverridesSchema = z.record(z.record(z.unknown()));

export const SourcesFileSchema = z.object({
  sources: z.array(z.unknown()),
  overrides: AppOverridesSchema.optional()
});

export type VersionDocument = z.infer<typeof VersionSchema>;
export type EntitlementDocument = z.infer<typeof EntitlementSchema>;
export type PrivacyUsageDocument = z.infer<typeof PrivacyUsageSchema>;
export type PermissionsDocument = z.infer<typeof PermissionsSchema>;
export type LegacyPermission = z.infer<typeof LegacyPermissionSchema>;
export type AppFields = z.infer<typeof AppFieldsSchema>;
export type AppDocument = z.infer<typeof AppSchema>;
export type NewsArticleDocument = z.infer<typeof NewsArticleSchema>;
export type CatalogFields = z.infer<typeof CatalogFieldsSchema>;
export type CatalogDocument = z.infer<typeof CatalogSchema>;
export type IdEntry = z.infer<typeof IdEntrySchema>;
export type MergeStrategy = z.infer<typeof MergeStrategySchema>;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];
export type CatalogProviderConfig = z.infer<typeof CatalogProviderConfigSchema>;
export type GithubProviderConfig = z.infer<typeof GithubProviderConfigSchema>;
export type CuratedProviderConfig = z.infer<typeof CuratedProviderConfigSchema>;
export type ReleaseProviderConfig = GithubProviderConfig | CuratedProviderConfig;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;
export type UploadTarget = z.infer<typeof UploadTargetSchema>;
export type AppOverrides = z.infer<typeof AppOverridesSchema>;
export type SourcesFile = z.infer<typeof SourcesFileSchema>;
