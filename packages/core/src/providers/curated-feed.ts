import { z } from "zod";
import type { CuratedProviderConfig } from "@appsource/schema";
import { ProviderAcquisitionError } from "../errors.js";
import { ReleaseAssetSchema, type Release } from "../io/github-api.js";
import type { ProviderDeps } from "./types.js";
import { selectRelease, SingleReleaseProvider } from "./release-feed.js";

const CuratedReleaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullish(),
  body: z.string().nullish(),
  published_at: z.string(),
  prerelease: z.boolean().optional(),
  browser_download_url: z.string().optional(),
  assets: z.array(ReleaseAssetSchema).optional()
});

const CuratedFeedSchema = z.array(CuratedReleaseSchema);

type CuratedRelease = z.infer<typeof CuratedReleaseSchema>;

/**
 * Entries without an asset list describe a single download; it becomes an
 * asset named after its path, stamped with the release's publish time.
 */
export function toRelease(entry: CuratedRelease, feedUrl: string): Release {
  const assets =
    entry.assets ??
    (entry.browser_download_url
      ? [
          {
            name: decodeURIComponent(new URL(entry.browser_download_url, feedUrl).pathname.split("/").pop() ?? ""),
            updated_at: entry.published_at,
            browser_download_url: new URL(entry.browser_download_url, feedUrl).toString()
          }
        ]
      : []);

  return {
    tag_name: entry.tag_name,
    name: entry.name,
    body: entry.body,
    prerelease: entry.prerelease,
    published_at: entry.published_at,
    assets
  };
}

/** A flat JSON list of releases published by a team outside any code host. */
export class CuratedFeedProvider extends SingleReleaseProvider {
  readonly kind = "curated" as const;

  static async create(config: CuratedProviderConfig, deps: ProviderDeps) {
    const response = await deps.http.getJson(config.url);
    if (!response.ok) {
      throw new ProviderAcquisitionError(
        response.status === 404 ? "DOCUMENT_NOT_FOUND" : "PROVIDER_ACQUISITION_FAILED",
        `Release feed request failed (${response.status})`,
        { url: config.url, status_code: response.status }
      );
    }

    const parsed = CuratedFeedSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `${config.url} is not a release list`, {
        url: config.url,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }

    const releases = parsed.data.map((entry) => toRelease(entry, config.url));
    return new CuratedFeedProvider(config, selectRelease(releases, config, deps.diagnostics), deps);
  }
}
