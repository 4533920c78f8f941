import { basename } from "node:path";
import type { GithubProviderConfig, ReleaseProviderConfig } from "@appsource/schema";
import type { PackageMetadata } from "../collaborators.js";
import type { Diagnostics } from "../diagnostics.js";
import { ConfigurationError, ProviderAcquisitionError } from "../errors.js";
import type { IdentityFilter } from "../identity.js";
import { getGithubJson, GITHUB_API_BASE_URL, ReleaseListSchema, type Release, type ReleaseAsset } from "../io/github-api.js";
import { permissionsFromDocument } from "../model/permissions.js";
import type { App, Version } from "../model/types.js";
import { compareVersionStrings, isValidVersion } from "../version.js";
import type { AppProvider, ProviderDeps } from "./types.js";

export interface SelectedRelease {
  /** Normalized tag. */
  tag: string;
  title: string;
  body: string;
  asset: ReleaseAsset;
}

export interface ReleaseMetadata extends PackageMetadata {
  downloadURL: string;
}

function compilePattern(pattern: string, option: string) {
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (error) {
    throw new ConfigurationError(`${option} is not a valid regular expression`, {
      [option]: pattern,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
}

export function normalizeTag(tag: string, config: Pick<ReleaseProviderConfig, "tagPattern" | "tagReplacement">) {
  if (!config.tagPattern) {
    return tag.replace(/^v+/, "");
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(config.tagPattern);
  } catch (error) {
    throw new ConfigurationError("tagPattern is not a valid regular expression", {
      tagPattern: config.tagPattern,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
  return tag.replace(pattern, config.tagReplacement);
}

function updatedAt(asset: ReleaseAsset) {
  const parsed = Date.parse(asset.updated_at);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/** The most recently updated asset whose whole name matches `pattern`. */
export function matchAsset(release: Release, pattern: RegExp): ReleaseAsset | undefined {
  let match: ReleaseAsset | undefined;
  for (const asset of release.assets) {
    if (pattern.test(asset.name) && (!match || updatedAt(asset) >= updatedAt(match))) {
      match = asset;
    }
  }
  return match;
}

/**
 * Picks the newest qualifying release: by matched-asset timestamp with
 * `preferDate`, otherwise by highest normalized tag. Tags that are not
 * versions are dropped (and reported) on the tag path only.
 */
export function selectRelease(
  releases: Release[],
  config: ReleaseProviderConfig,
  diagnostics: Diagnostics
): SelectedRelease {
  const assetPattern = compilePattern(config.assetPattern, "assetPattern");
  const eligible = config.includePrereleases ? releases : releases.filter((release) => release.prerelease !== true);
  if (eligible.length === 0) {
    throw new ProviderAcquisitionError("NO_MATCHING_RELEASES", "No matching releases found");
  }

  const describe = (release: Release, tag: string, asset: ReleaseAsset): SelectedRelease => ({
    tag,
    title: release.name ?? release.tag_name,
    body: release.body ?? "",
    asset
  });

  if (config.preferDate) {
    let best: { release: Release; asset: ReleaseAsset } | undefined;
    for (const release of eligible) {
      const asset = matchAsset(release, assetPattern);
      if (asset && (!best || updatedAt(asset) >= updatedAt(best.asset))) {
        best = { release, asset };
      }
    }
    if (!best) {
      throw new ProviderAcquisitionError("NO_MATCHING_ASSET", "Could not find a download asset matching the criteria", {
        assetPattern: config.assetPattern
      });
    }
    return describe(best.release, normalizeTag(best.release.tag_name, config), best.asset);
  }

  let newest: { release: Release; tag: string } | undefined;
  for (const release of eligible) {
    const tag = normalizeTag(release.tag_name, config);
    if (!isValidVersion(tag)) {
      diagnostics.warn("release.invalid_tag", `Invalid version removed: ${release.tag_name}`, {
        tag: release.tag_name,
        normalized: tag
      });
      continue;
    }
    if (!newest || compareVersionStrings(tag, newest.tag) >= 0) {
      newest = { release, tag };
    }
  }
  if (!newest) {
    throw new ProviderAcquisitionError("NO_MATCHING_RELEASES", "No release carries a valid version tag");
  }

  const asset = matchAsset(newest.release, assetPattern);
  if (!asset) {
    throw new ProviderAcquisitionError("NO_MATCHING_ASSET", "Could not find a download asset matching the criteria", {
      tag: newest.release.tag_name,
      assetPattern: config.assetPattern
    });
  }
  return describe(newest.release, newest.tag, asset);
}

/**
 * Shared shape of the single-release providers: one resolved release, one
 * target app.
 */
export abstract class SingleReleaseProvider implements AppProvider {
  abstract readonly kind: "github" | "curated";

  protected constructor(
    readonly config: ReleaseProviderConfig,
    protected readonly selected: SelectedRelease,
    protected readonly deps: ProviderDeps
  ) {}

  get preferDate() {
    return this.config.preferDate;
  }

  get version() {
    return this.selected.tag;
  }

  get versionDate() {
    return this.selected.asset.updated_at;
  }

  get versionDescription() {
    return `# ${this.selected.title}\n\n${this.selected.body}`;
  }

  get downloadURL() {
    return this.selected.asset.browser_download_url;
  }

  /** Downloads and inspects the release package, re-uploading it first when configured. */
  async fetchMetadata(): Promise<ReleaseMetadata> {
    const asset = await this.deps.assets.retrieve(this.downloadURL);
    try {
      const metadata = await this.deps.packages.inspect(asset.path, { extractTwice: this.config.extractTwice });
      let downloadURL = this.downloadURL;

      if (this.config.upload) {
        if (!this.deps.uploader) {
          throw new ConfigurationError("Package upload is configured but no uploader is available", {
            repository: this.config.upload.repository
          });
        }
        const assetName =
          metadata.bundleIdentifier && metadata.version
            ? `${metadata.bundleIdentifier}-${metadata.version}.ipa`
            : basename(metadata.packagePath);
        downloadURL = await this.deps.uploader.upload(metadata.packagePath, {
          repository: this.config.upload.repository,
          tag: this.config.upload.tag,
          assetName
        });
      }

      return { ...metadata, downloadURL };
    } finally {
      await asset.dispose();
    }
  }

  /** The candidate version this release would add. */
  buildVersion(metadata: ReleaseMetadata): Version {
    return {
      absoluteVersion: this.version,
      date: this.versionDate,
      localizedDescription: this.versionDescription,
      size: metadata.size,
      sha256: metadata.sha256,
      version: metadata.version ?? this.version,
      buildVersion: metadata.buildVersion,
      downloadURL: metadata.downloadURL,
      minOSVersion: metadata.minOSVersion,
      extensions: {}
    };
  }

  /**
   * A one-app, one-version candidate for the filter's single target. The
   * package is downloaded on every call.
   */
  async fetchApps(filter: IdentityFilter | undefined): Promise<App[]> {
    if (!filter || filter.targetIds.length !== 1) {
      throw new ConfigurationError(`A ${this.kind} provider updates exactly one app id`, {
        ids: filter?.targetIds ?? null
      });
    }

    const metadata = await this.fetchMetadata();
    return [
      {
        appID: filter.targetIds[0],
        bundleIdentifier: metadata.bundleIdentifier,
        versions: [this.buildVersion(metadata)],
        appPermissions: permissionsFromDocument(metadata.permissions),
        extensions: {}
      }
    ];
  }
}

export function releasesUrl(config: GithubProviderConfig) {
  if (config.url) {
    return config.url;
  }
  if (config.repository) {
    return `${GITHUB_API_BASE_URL}/repos/${config.repository}/releases`;
  }
  throw new ConfigurationError("A github provider needs either `url` or `repository`");
}

/** Resolves the newest release of one GitHub repository. */
export class ReleaseFeedProvider extends SingleReleaseProvider {
  readonly kind = "github" as const;

  static async create(config: GithubProviderConfig, deps: ProviderDeps) {
    const releases = await getGithubJson(deps.http, releasesUrl(config), ReleaseListSchema, deps.githubToken);
    return new ReleaseFeedProvider(config, selectRelease(releases, config, deps.diagnostics), deps);
  }
}
