import type { AppOverrides } from "@appsource/schema";
import type { Collaborators, PackageMetadata } from "./collaborators.js";
import { Diagnostics } from "./diagnostics.js";
import { backfillHashesAndPermissions, type BackfillSummary } from "./enrichment.js";
import { ConfigurationError } from "./errors.js";
import { isUrl } from "./io/documents.js";
import { addVersion, appIdentity, isAppValid, readApp, syncLegacyFields, writeApp } from "./model/app.js";
import { createCatalog } from "./model/catalog.js";
import { permissionsFromDocument } from "./model/permissions.js";
import type { App, Catalog } from "./model/types.js";
import { runUpdate, type UpdateOptions, type UpdateSummary } from "./merge.js";
import { loadCatalogFile, saveCatalogFile, type FormatOptions } from "./persistence.js";

export const PLACEHOLDER_APP = {
  name: "Example App",
  developerName: "Example.com",
  localizedDescription: "An app that is an example.",
  iconURL: "https://example.com/icon.png"
} as const;

const PLACEHOLDER_KEYS = ["name", "developerName", "localizedDescription", "iconURL"] as const;

export interface AppDetails {
  name?: string;
  developerName?: string;
  localizedDescription?: string;
  iconURL?: string;
}

export interface SourceManagerOptions {
  collaborators: Collaborators;
  diagnostics?: Diagnostics;
  now?: () => Date;
}

export type AddAppResult = { added: true } | { added: false; reason: string };

/** `2024-05-25T03:39:23Z`: second precision, UTC. */
export function formatTimestamp(date: Date) {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Owns one catalog and the collaborators used to update it.
 */
export class SourceManager {
  readonly diagnostics: Diagnostics;
  private readonly deps: Collaborators;
  private readonly now: () => Date;

  private constructor(
    readonly catalog: Catalog,
    public path: string | undefined,
    options: SourceManagerOptions
  ) {
    this.deps = options.collaborators;
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.now = options.now ?? (() => new Date());
  }

  static async open(path: string, options: SourceManagerOptions) {
    const diagnostics = options.diagnostics ?? new Diagnostics();
    const catalog = await loadCatalogFile(path, diagnostics);
    return new SourceManager(catalog, path, { ...options, diagnostics });
  }

  static create(details: { name: string; identifier: string }, path: string | undefined, options: SourceManagerOptions) {
    return new SourceManager(createCatalog(details), path, options);
  }

  private async inspect(downloadURL: string, packagePath: string | undefined): Promise<PackageMetadata> {
    if (packagePath) {
      return this.deps.packages.inspect(packagePath);
    }
    if (!isUrl(downloadURL)) {
      throw new ConfigurationError("Either a package path or a download URL is required", { downloadURL });
    }

    const asset = await this.deps.assets.retrieve(downloadURL);
    try {
      return await this.deps.packages.inspect(asset.path);
    } finally {
      await asset.dispose();
    }
  }

  /**
   * Builds a new app from a package file (downloaded from `downloadURL` when
   * no path is given). Details not supplied get placeholder values that should
   * be edited before publishing.
   */
  async buildAppFromPackage(downloadURL: string, packagePath?: string, details: AppDetails = {}): Promise<App> {
    if (downloadURL === "") {
      this.diagnostics.warn("app.missing_download_url", "Users will be unable to download the app until a valid download URL is set");
    }

    const metadata = await this.inspect(downloadURL, packagePath);
    const placeholders = PLACEHOLDER_KEYS.filter((key) => !details[key]);

    const app: App = {
      name: details.name ?? PLACEHOLDER_APP.name,
      bundleIdentifier: metadata.bundleIdentifier,
      developerName: details.developerName ?? PLACEHOLDER_APP.developerName,
      localizedDescription: details.localizedDescription ?? PLACEHOLDER_APP.localizedDescription,
      iconURL: details.iconURL ?? PLACEHOLDER_APP.iconURL,
      versions: [],
      appPermissions: permissionsFromDocument(metadata.permissions),
      extensions: {}
    };

    addVersion(app, {
      version: metadata.version,
      buildVersion: metadata.buildVersion,
      date: formatTimestamp(this.now()),
      size: metadata.size,
      sha256: metadata.sha256,
      downloadURL,
      minOSVersion: metadata.minOSVersion,
      extensions: {}
    });

    if (!metadata.bundleIdentifier) {
      this.diagnostics.error("app.missing_bundle_id", "No bundleIdentifier found in package", { downloadURL });
    }
    if (placeholders.length > 0) {
      this.diagnostics.info("app.placeholders", `Remember to set: ${placeholders.join(", ")}`, { placeholders });
    }
    return app;
  }

  addApp(app: App): AddAppResult {
    if (app.appID === undefined) {
      app.appID = app.bundleIdentifier;
    }

    if (!isAppValid(app)) {
      this.diagnostics.error("app.not_added", "App is invalid", { app: app.appID });
      return { added: false, reason: "App is invalid" };
    }

    const id = appIdentity(app);
    if (this.catalog.apps.some((existing) => appIdentity(existing) === id)) {
      this.diagnostics.error("app.not_added", `Could not add app. ${id} already exists in the catalog`, { app: id });
      return { added: false, reason: `${id} already exists in the catalog` };
    }

    this.catalog.apps.push(app);
    this.diagnostics.info("app.added", `Adding ${app.name ?? id} to ${this.catalog.name ?? "catalog"}`, { app: id });
    return { added: true };
  }

  runUpdate(configs: readonly unknown[], options?: UpdateOptions): Promise<UpdateSummary> {
    return runUpdate(this.catalog, configs, { ...this.deps, diagnostics: this.diagnostics }, options);
  }

  backfillHashesAndPermissions(onlyLatest = true, force = false): Promise<BackfillSummary> {
    return backfillHashesAndPermissions(this.catalog, { onlyLatest, force }, this.deps, this.diagnostics);
  }

  /**
   * Overwrites fields of the apps named in `patch` (keyed by appID). Values
   * go through the same lenient reader as loaded documents, so `versions` and
   * `appPermissions` are rebuilt from their raw form. Returns the ids applied.
   */
  applyManualOverrides(patch: AppOverrides): string[] {
    const applied: string[] = [];

    this.catalog.apps.forEach((app, position) => {
      const id = appIdentity(app);
      const overrides = id === undefined ? undefined : patch[id];
      if (id === undefined || !overrides) {
        return;
      }

      const patched = readApp(
        { ...writeApp(app, true), ...overrides },
        { diagnostics: this.diagnostics, path: `apps[${position}]` }
      );
      syncLegacyFields(patched);
      this.catalog.apps[position] = patched;
      applied.push(id);
    });

    const unknown = Object.keys(patch).filter((id) => !applied.includes(id));
    if (unknown.length > 0) {
      this.diagnostics.warn("overrides.unknown_app", `No app found for overrides: ${unknown.join(", ")}`, {
        ids: unknown
      });
    }
    return applied;
  }

  async save(path?: string, options: FormatOptions = {}) {
    const target = path ?? this.path;
    if (!target) {
      throw new ConfigurationError("No path to save the catalog to");
    }
    await saveCatalogFile(this.catalog, target, options);
    this.path = target;
    return target;
  }
}
