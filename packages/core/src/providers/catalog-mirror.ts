import type { CatalogProviderConfig } from "@appsource/schema";
import { ProviderAcquisitionError } from "../errors.js";
import { assignAppId, type IdentityFilter } from "../identity.js";
import { appIdentity, isAppValid } from "../model/app.js";
import { readCatalog } from "../model/catalog.js";
import { missingKeys } from "../model/fields.js";
import { isNewsArticleValid } from "../model/news.js";
import { isRawRecord, type App, type Catalog, type NewsArticle } from "../model/types.js";
import { compareVersionStrings } from "../version.js";
import type { AppProvider, NewsProvider, ProviderDeps } from "./types.js";

/**
 * Pulls a whole remote catalog and hands out the apps and news a
 * configuration asks for.
 */
export class CatalogMirrorProvider implements AppProvider, NewsProvider {
  readonly kind = "catalog" as const;

  private constructor(
    readonly config: CatalogProviderConfig,
    private readonly catalog: Catalog,
    private readonly deps: ProviderDeps
  ) {}

  static async create(config: CatalogProviderConfig, deps: ProviderDeps) {
    const document = await deps.documents.fetchDocument(config.source);
    if (!isRawRecord(document)) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `${config.source} is not a catalog document`, {
        source: config.source
      });
    }

    const catalog = readCatalog(document, deps.diagnostics);
    const missing = missingKeys("catalog", { ...catalog, apps: document.apps });
    if (missing.length > 0) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `${config.source} is not a valid catalog`, {
        source: config.source,
        missing_keys: missing
      });
    }

    return new CatalogMirrorProvider(config, catalog, deps);
  }

  get name() {
    return this.catalog.name ?? this.config.source;
  }

  async fetchApps(filter: IdentityFilter | undefined): Promise<App[]> {
    const kept: App[] = [];
    const keys: string[] = [];

    for (const app of this.catalog.apps) {
      const key = appIdentity(app);
      if (!key || !isAppValid(app)) {
        this.deps.diagnostics.warn("mirror.invalid_app", `Skipped invalid app ${app.name ?? key ?? "(unnamed)"}`, {
          source: this.config.source,
          app: key
        });
        continue;
      }

      const seen = keys.indexOf(key);
      if (seen !== -1) {
        // Duplicates are settled on the display version alone; the later entry wins a tie.
        if (compareVersionStrings(kept[seen].versions[0]?.version, app.versions[0]?.version) > 0) {
          continue;
        }
        kept[seen] = app;
      } else if (!filter || filter.fetchKeys.includes(key)) {
        kept.push(app);
        keys.push(key);
      } else {
        continue;
      }

      if (app.appID === undefined || filter?.table.has(key)) {
        app.appID = assignAppId(key, filter);
      }
    }

    if (filter) {
      const missing = [...new Set(filter.fetchKeys.filter((id) => !keys.includes(id)))];
      if (missing.length > 0) {
        this.deps.diagnostics.warn(
          "mirror.missing_ids",
          `Requested ids not found in ${this.name}: ${missing.join(", ")}`,
          { source: this.config.source, missing_ids: missing }
        );
      }
    }

    return kept;
  }

  async fetchNews(filter: IdentityFilter | undefined): Promise<NewsArticle[]> {
    const wanted = filter ? new Set([...filter.fetchKeys, ...filter.targetIds]) : undefined;
    return (this.catalog.news ?? []).filter(
      (article) =>
        isNewsArticleValid(article) && (!wanted || (article.appID !== undefined && wanted.has(article.appID)))
    );
  }
}
