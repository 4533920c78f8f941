import type { Collaborators } from "../collaborators.js";
import type { Diagnostics } from "../diagnostics.js";
import type { IdentityFilter } from "../identity.js";
import type { App, NewsArticle } from "../model/types.js";

export interface ProviderDeps extends Collaborators {
  diagnostics: Diagnostics;
}

/** What every provider offers the merge engine. */
export interface AppProvider {
  readonly kind: "catalog" | "github" | "curated";
  fetchApps(filter: IdentityFilter | undefined): Promise<App[]>;
}

export interface NewsProvider {
  fetchNews(filter: IdentityFilter | undefined): Promise<NewsArticle[]>;
}
