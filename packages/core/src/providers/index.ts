import { PROVIDER_KINDS, ProviderConfigSchema, type ProviderConfig } from "@appsource/schema";
import { ConfigurationError, UnsupportedProviderError } from "../errors.js";
import { isRawRecord } from "../model/types.js";
import { CatalogMirrorProvider } from "./catalog-mirror.js";
import { CuratedFeedProvider } from "./curated-feed.js";
import { ReleaseFeedProvider } from "./release-feed.js";
import type { ProviderDeps } from "./types.js";

export type Provider = CatalogMirrorProvider | ReleaseFeedProvider | CuratedFeedProvider;

function isProviderKind(kind: unknown): kind is ProviderConfig["kind"] {
  return PROVIDER_KINDS.some((known) => known === kind);
}

/**
 * Validates one raw configuration entry. An unknown `kind` is fatal for the
 * whole run; any other problem only rejects this entry.
 */
export function parseProviderConfig(input: unknown): ProviderConfig {
  const kind = isRawRecord(input) ? input.kind : undefined;
  if (!isProviderKind(kind)) {
    throw new UnsupportedProviderError(kind);
  }

  const parsed = ProviderConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${kind} provider configuration`, {
      kind,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }
  return parsed.data;
}

export async function createProvider(config: ProviderConfig, deps: ProviderDeps): Promise<Provider> {
  switch (config.kind) {
    case "catalog":
      return CatalogMirrorProvider.create(config, deps);
    case "github":
      return ReleaseFeedProvider.create(config, deps);
    case "curated":
      return CuratedFeedProvider.create(config, deps);
  }
}

export { CatalogMirrorProvider } from "./catalog-mirror.js";
export { CuratedFeedProvider } from "./curated-feed.js";
export { ReleaseFeedProvider, SingleReleaseProvider, matchAsset, normalizeTag, selectRelease } from "./release-feed.js";
export type { AppProvider, NewsProvider, ProviderDeps } from "./types.js";
