import type { Collaborators, RetrievedAsset } from "./collaborators.js";
import type { Diagnostics } from "./diagnostics.js";
import { describeError, EnrichmentFailure } from "./errors.js";
import { latestVersion } from "./model/app.js";
import { permissionsFromDocument } from "./model/permissions.js";
import type { App, Catalog, Version } from "./model/types.js";

export type EnrichmentDeps = Pick<Collaborators, "assets" | "hasher" | "packages">;

export type EnrichmentOutcome = "enriched" | "skipped" | "failed";

export interface EnrichOptions {
  /** Recompute even when the fields are already present. */
  force?: boolean;
  /** Also rebuild the app's permissions from this version's package. */
  permissions?: boolean;
}

export interface BackfillSummary {
  enriched: number;
  skipped: number;
  failed: number;
}

/**
 * Fills in the content hash of `version` (and the app's permissions) from its
 * package. Failures are recorded as warnings and leave the fields unset so a
 * later run can retry.
 */
export async function enrichVersion(
  app: App,
  version: Version,
  deps: EnrichmentDeps,
  diagnostics: Diagnostics,
  options: EnrichOptions = {}
): Promise<EnrichmentOutcome> {
  const force = options.force ?? false;
  const needsHash = force || !version.sha256;
  const needsPermissions = (options.permissions ?? true) && (force || !app.appPermissions);
  if (!needsHash && !needsPermissions) {
    return "skipped";
  }

  const label = { app: app.appID ?? app.bundleIdentifier, version: version.version };
  if (!version.downloadURL) {
    diagnostics.warn("enrichment.failed", `${app.name ?? label.app} (${version.version ?? "?"}) has no download URL`, label);
    return "failed";
  }

  let asset: RetrievedAsset;
  try {
    asset = await deps.assets.retrieve(version.downloadURL);
  } catch (error) {
    const failure = new EnrichmentFailure(
      `Broken download link for ${app.name ?? label.app} (${version.version ?? "?"}) prevented updating package based properties`,
      { ...label, cause: describeError(error) }
    );
    diagnostics.warn("enrichment.failed", failure.message, failure.details);
    return "failed";
  }

  try {
    if (needsHash) {
      version.sha256 = await deps.hasher.hashFile(asset.path);
    }
    if (needsPermissions) {
      const metadata = await deps.packages.inspect(asset.path);
      app.appPermissions = permissionsFromDocument(metadata.permissions);
    }
    diagnostics.debug("enrichment.done", `Updated package properties of ${app.name ?? label.app}`, label);
    return "enriched";
  } catch (error) {
    const failure = new EnrichmentFailure(`Unable to read package of ${app.name ?? label.app}`, {
      ...label,
      cause: describeError(error)
    });
    diagnostics.warn("enrichment.failed", failure.message, failure.details);
    return "failed";
  } finally {
    await asset.dispose();
  }
}

/**
 * Hashes versions that have no `sha256` yet (every version with `force`) and
 * rebuilds missing permissions from each app's newest package.
 */
export async function backfillHashesAndPermissions(
  catalog: Catalog,
  options: { onlyLatest?: boolean; force?: boolean },
  deps: EnrichmentDeps,
  diagnostics: Diagnostics
): Promise<BackfillSummary> {
  const summary: BackfillSummary = { enriched: 0, skipped: 0, failed: 0 };
  const onlyLatest = options.onlyLatest ?? true;

  for (const app of catalog.apps) {
    const latest = latestVersion(app);
    const versions = onlyLatest ? (latest ? [latest] : []) : app.versions;

    for (const version of versions) {
      const outcome = await enrichVersion(app, version, deps, diagnostics, {
        force: options.force,
        permissions: version === latest
      });
      summary[outcome] += 1;
    }
  }

  return summary;
}
