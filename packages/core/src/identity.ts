import type { IdEntry } from "@appsource/schema";

export interface IdentityFilter {
  /** Ids to look for on the provider side: plain ids and the values of mappings. */
  fetchKeys: string[];
  /** Ids the matched apps should carry here: plain ids and the keys of mappings. */
  targetIds: string[];
  /** Provider-side id -> appID, combined from every mapping entry. */
  table: Map<string, string>;
  /** Ids that were given as plain strings. */
  verbatim: Set<string>;
}

/**
 * Flattens a mixed id list. Mapping entries contribute their keys (the appID
 * wanted in this catalog) with `useKeys`, otherwise their values (the id the
 * provider knows the app by).
 */
export function flattenIds(ids: readonly IdEntry[], options: { useKeys?: boolean } = {}): string[] {
  const useKeys = options.useKeys ?? true;
  return ids.flatMap((entry) => {
    if (typeof entry === "string") {
      return [entry];
    }
    return useKeys ? Object.keys(entry) : Object.values(entry);
  });
}

export function buildIdTable(ids: readonly IdEntry[]): Map<string, string> {
  const table = new Map<string, string>();
  for (const entry of ids) {
    if (typeof entry === "string") {
      continue;
    }
    for (const [appId, remoteId] of Object.entries(entry)) {
      table.set(remoteId, appId);
    }
  }
  return table;
}

/** Returns `undefined` when no ids were given (absent or empty), meaning "fetch everything". */
export function resolveIdentity(ids: readonly IdEntry[] | undefined | null): IdentityFilter | undefined {
  if (ids === undefined || ids === null || ids.length === 0) {
    return undefined;
  }

  return {
    fetchKeys: flattenIds(ids, { useKeys: false }),
    targetIds: flattenIds(ids, { useKeys: true }),
    table: buildIdTable(ids),
    verbatim: new Set(ids.filter((entry): entry is string => typeof entry === "string"))
  };
}

/** The appID a fetched app should be given, or the provider-side id when there is no mapping. */
export function assignAppId(remoteId: string, filter: IdentityFilter | undefined): string {
  if (!filter || filter.verbatim.has(remoteId)) {
    return remoteId;
  }
  return filter.table.get(remoteId) ?? remoteId;
}
