import type { ReleaseProviderConfig } from "@appsource/schema";
import type { Collaborators } from "./collaborators.js";
import { Diagnostics, type Diagnostic } from "./diagnostics.js";
import { enrichVersion } from "./enrichment.js";
import { ConfigurationError, describeError, isCatalogError, VersionParseError } from "./errors.js";
import { resolveIdentity, type IdentityFilter } from "./identity.js";
import { addVersion, appIdentity, latestVersion, syncLegacyFields } from "./model/app.js";
import { upsertNewsArticle } from "./model/news.js";
import type { App, Catalog, Version } from "./model/types.js";
import type { CatalogMirrorProvider } from "./providers/catalog-mirror.js";
import { createProvider, parseProviderConfig } from "./providers/index.js";
import type { SingleReleaseProvider } from "./providers/release-feed.js";
import type { ProviderDeps } from "./providers/types.js";
import { compareVersions, isNewerVersion } from "./version.js";

export const BUNDLE_ID_CHANGED_NOTE =
  "\n\nNOTE: BundleIdentifier changed in this version and automatic updates have been disabled until manual install occurs.";

export interface UpdateDeps extends Collaborators {
  diagnostics?: Diagnostics;
}

export interface UpdateOptions {
  /** Hash and inspect accepted versions that lack those fields. Defaults to true. */
  enrich?: boolean;
}

export interface ConfigFailure {
  index: number;
  kind?: string;
  ids?: unknown[];
  code: string;
  message: string;
}

export interface UpdateSummary {
  appsUpdated: number;
  appsAdded: number;
  newsAdded: number;
  failures: ConfigFailure[];
  diagnostics: Diagnostic[];
}

interface Counts {
  appsUpdated: number;
  appsAdded: number;
  newsAdded: number;
}

interface MergeContext {
  deps: ProviderDeps;
  enrich: boolean;
}

function emptyCounts(): Counts {
  return { appsUpdated: 0, appsAdded: 0, newsAdded: 0 };
}

/** appID (or bundleIdentifier) -> position; the first app wins when ids repeat. */
export function buildIdIndex(catalog: Catalog): Map<string, number> {
  const index = new Map<string, number>();
  catalog.apps.forEach((app, position) => {
    const id = appIdentity(app);
    if (id !== undefined && !index.has(id)) {
      index.set(id, position);
    }
  });
  return index;
}

function requireSingleTarget(config: ReleaseProviderConfig): IdentityFilter {
  const filter = resolveIdentity(config.ids);
  if (!filter) {
    throw new ConfigurationError(`Updating from a ${config.kind} provider without ids is not supported`, {
      kind: config.kind
    });
  }
  if (config.ids?.length !== 1 || filter.targetIds.length !== 1) {
    throw new ConfigurationError(`A ${config.kind} provider updates exactly one app id`, {
      kind: config.kind,
      ids: config.ids
    });
  }
  return filter;
}

async function enrichAccepted(app: App, context: MergeContext) {
  const version = latestVersion(app);
  if (context.enrich && version) {
    await enrichVersion(app, version, context.deps, context.deps.diagnostics);
  }
}

async function mergeCatalogMirror(
  catalog: Catalog,
  provider: CatalogMirrorProvider,
  context: MergeContext
): Promise<Counts> {
  const { config } = provider;
  const counts = emptyCounts();
  const { diagnostics } = context.deps;
  const index = buildIdIndex(catalog);

  const apps = await provider.fetchApps(config.getAllApps ? undefined : resolveIdentity(config.ids));
  for (const app of apps) {
    const id = appIdentity(app);
    if (id === undefined) {
      continue;
    }

    const position = index.get(id);
    if (position === undefined) {
      catalog.apps.push(app);
      index.set(id, catalog.apps.length - 1);
      counts.appsAdded += 1;
      diagnostics.info("merge.app_added", `Added ${app.name ?? id}`, { app: id, source: config.source });
      await enrichAccepted(app, context);
      continue;
    }

    const existing = catalog.apps[position];
    const incoming = latestVersion(app);
    const current = latestVersion(existing);
    const accepted = incoming !== undefined && (current === undefined || isNewerVersion(incoming, current));

    if (incoming && accepted) {
      counts.appsUpdated += 1;
      addVersion(existing, incoming);
      diagnostics.info("merge.app_updated", `Updated ${existing.name ?? id} to ${incoming.version ?? "?"}`, {
        app: id,
        version: incoming.version,
        source: config.source
      });
    }

    // "replace" keeps the mirror's copy of the app authoritative, whether or not its version was newer.
    const survivor = config.mergeStrategy === "replace" ? app : existing;
    if (survivor === app) {
      syncLegacyFields(app);
      catalog.apps[position] = app;
    }
    if (accepted) {
      await enrichAccepted(survivor, context);
    }
  }

  if (!config.ignoreNews) {
    const articles = await provider.fetchNews(config.getAllNews ? undefined : resolveIdentity(config.ids));
    if (articles.length > 0) {
      catalog.news ??= [];
    }
    for (const article of articles) {
      if (upsertNewsArticle(catalog.news ?? [], article) === "added") {
        counts.newsAdded += 1;
      }
    }
  }

  return counts;
}

/** With `preferDate`, a tag that is not a version leaves the decision to the release date. */
function isNewerRelease(current: Version, provider: SingleReleaseProvider, diagnostics: Diagnostics) {
  try {
    return compareVersions(current, { absoluteVersion: provider.version, version: provider.version }) < 0;
  } catch (error) {
    if (!provider.preferDate || !(error instanceof VersionParseError)) {
      throw error;
    }
    diagnostics.debug("release.unversioned_tag", `${provider.version} is not a version; comparing dates`, {
      tag: provider.version
    });
    return false;
  }
}

function shouldUpdateFromRelease(app: App, provider: SingleReleaseProvider, diagnostics: Diagnostics) {
  const current = latestVersion(app);
  if (!current) {
    return true;
  }

  if (isNewerRelease(current, provider, diagnostics)) {
    return true;
  }

  if (!provider.preferDate) {
    return false;
  }

  const currentDate = current.date ? Date.parse(current.date) : Number.NaN;
  const candidateDate = Date.parse(provider.versionDate);
  if (Number.isNaN(currentDate) || Number.isNaN(candidateDate)) {
    diagnostics.warn("release.unparseable_date", `Cannot compare release dates for ${app.name ?? appIdentity(app)}`, {
      current: current.date,
      candidate: provider.versionDate
    });
    return false;
  }
  return currentDate < candidateDate;
}

async function mergeSingleRelease(
  catalog: Catalog,
  provider: SingleReleaseProvider,
  context: MergeContext
): Promise<Counts> {
  const filter = requireSingleTarget(provider.config);
  const counts = emptyCounts();
  const { diagnostics } = context.deps;
  const index = buildIdIndex(catalog);
  const [targetId] = filter.targetIds;
  const [remoteId] = filter.fetchKeys;

  const position = index.get(targetId) ?? index.get(remoteId);
  if (position === undefined) {
    diagnostics.warn(
      "release.app_not_found",
      `${remoteId} not found in ${catalog.name ?? "catalog"}. Create an app entry with this id first.`,
      { app: remoteId }
    );
    return counts;
  }

  const app = catalog.apps[position];
  if (!shouldUpdateFromRelease(app, provider, diagnostics)) {
    diagnostics.debug("release.up_to_date", `${app.name ?? targetId} is up to date`, {
      app: targetId,
      candidate: provider.version
    });
    return counts;
  }

  const [candidate] = await provider.fetchApps(filter);
  const version = candidate.versions[0];

  if (!candidate.bundleIdentifier) {
    diagnostics.error("release.missing_bundle_id", "No bundleIdentifier found in package", { app: targetId });
  } else if (candidate.bundleIdentifier !== app.bundleIdentifier) {
    diagnostics.warn(
      "release.bundle_id_changed",
      `${app.name ?? targetId} bundleIdentifier changed to ${candidate.bundleIdentifier}`,
      { app: targetId, from: app.bundleIdentifier, to: candidate.bundleIdentifier }
    );
    app.bundleIdentifier = candidate.bundleIdentifier;
    version.localizedDescription = `${version.localizedDescription ?? ""}${BUNDLE_ID_CHANGED_NOTE}`;
  }

  if (app.appID === undefined) {
    app.appID = targetId;
  }

  addVersion(app, version);
  app.appPermissions = candidate.appPermissions;
  counts.appsUpdated += 1;
  diagnostics.info("merge.app_updated", `Updated ${app.name ?? targetId} to ${version.version ?? "?"}`, {
    app: targetId,
    version: version.version
  });

  if (context.enrich) {
    await enrichVersion(app, version, context.deps, diagnostics);
  }
  return counts;
}

function describeConfig(input: unknown) {
  if (typeof input !== "object" || input === null) {
    return { label: String(input) };
  }
  const kind = "kind" in input && typeof input.kind === "string" ? input.kind : undefined;
  const ids = "ids" in input && Array.isArray(input.ids) ? input.ids : undefined;
  return { kind, ids, label: JSON.stringify(ids ?? kind ?? null) };
}

function restore(catalog: Catalog, snapshot: Pick<Catalog, "apps" | "news">) {
  catalog.apps.splice(0, catalog.apps.length, ...snapshot.apps);
  if (snapshot.news === undefined) {
    delete catalog.news;
  } else if (catalog.news) {
    catalog.news.splice(0, catalog.news.length, ...snapshot.news);
  } else {
    catalog.news = snapshot.news;
  }
}

/**
 * Runs every provider configuration in order against `catalog`, mutating it
 * in place. A failing configuration leaves the catalog exactly as it found it
 * and the run moves on; only an unsupported provider kind aborts the run.
 */
export async function runUpdate(
  catalog: Catalog,
  configs: readonly unknown[],
  deps: UpdateDeps,
  options: UpdateOptions = {}
): Promise<UpdateSummary> {
  const diagnostics = deps.diagnostics ?? new Diagnostics();
  const mark = diagnostics.size;
  const context: MergeContext = { deps: { ...deps, diagnostics }, enrich: options.enrich ?? true };
  const totals = emptyCounts();
  const failures: ConfigFailure[] = [];

  diagnostics.info("update.start", `Starting on ${catalog.name ?? "catalog"}`, { configurations: configs.length });

  for (const [index, input] of configs.entries()) {
    const snapshot = { apps: structuredClone(catalog.apps), news: catalog.news && structuredClone(catalog.news) };

    try {
      const config = parseProviderConfig(input);
      if (config.kind !== "catalog") {
        // Checked before anything is fetched.
        requireSingleTarget(config);
      }

      const provider = await createProvider(config, context.deps);
      const counts =
        provider.kind === "catalog"
          ? await mergeCatalogMirror(catalog, provider, context)
          : await mergeSingleRelease(catalog, provider, context);

      totals.appsUpdated += counts.appsUpdated;
      totals.appsAdded += counts.appsAdded;
      totals.newsAdded += counts.newsAdded;
    } catch (error) {
      if (error instanceof ConfigurationError && error.fatal) {
        throw error;
      }

      restore(catalog, snapshot);
      const { kind, ids, label } = describeConfig(input);
      const failure: ConfigFailure = {
        index,
        kind,
        ids,
        code: isCatalogError(error) ? error.code : "INTERNAL_ERROR",
        message: error instanceof Error ? error.message : String(error)
      };
      failures.push(failure);
      diagnostics.error("update.config_failed", `Unable to process ${label}. ${describeError(error)}`, {
        index,
        kind,
        code: failure.code
      });
    }
  }

  diagnostics.info("update.done", `${totals.appsUpdated} app(s) updated.`, { ...totals });
  diagnostics.info(
    "update.done",
    `${totals.appsAdded} app(s) added, ${totals.newsAdded} news article(s) added.`,
    { ...totals }
  );

  return { ...totals, failures, diagnostics: diagnostics.since(mark) };
}
