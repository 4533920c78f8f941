import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ReleaseUploader, UploadTarget } from "../collaborators.js";
import { ConfigurationError, ProviderAcquisitionError } from "../errors.js";
import { GITHUB_API_BASE_URL, githubApiError, githubHeaders, ReleaseSchema, type Release } from "./github-api.js";
import type { HttpClient } from "./http.js";

const STORAGE_TAG = "v0.0";

const UploadedAssetSchema = z.object({ browser_download_url: z.string() });

/**
 * Uploads packages as assets of a storage release, creating the release when
 * the repository has none.
 */
export class GithubReleaseUploader implements ReleaseUploader {
  constructor(
    private readonly http: HttpClient,
    private readonly token: string | undefined,
    private readonly apiBaseUrl = GITHUB_API_BASE_URL
  ) {}

  private async findOrCreateRelease(repository: string, tag: string | undefined): Promise<Release> {
    const lookup = tag
      ? `${this.apiBaseUrl}/repos/${repository}/releases/tags/${encodeURIComponent(tag)}`
      : `${this.apiBaseUrl}/repos/${repository}/releases/latest`;

    const existing = await this.http.getJson(lookup, { headers: githubHeaders(this.token) });
    if (existing.ok) {
      const parsed = ReleaseSchema.safeParse(existing.body);
      if (parsed.success) {
        return parsed.data;
      }
    } else if (existing.status !== 404) {
      throw githubApiError(existing.body, existing.status, lookup);
    }

    const createUrl = `${this.apiBaseUrl}/repos/${repository}/releases`;
    const created = await this.http.getJson(createUrl, {
      method: "POST",
      headers: { ...githubHeaders(this.token), "content-type": "application/json" },
      body: JSON.stringify({
        tag_name: tag ?? STORAGE_TAG,
        name: "Package Storage Release",
        body: "Generated to host uploaded packages for download."
      })
    });
    if (!created.ok) {
      throw githubApiError(created.body, created.status, createUrl);
    }
    const parsed = ReleaseSchema.safeParse(created.body);
    if (!parsed.success) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `Unexpected payload from ${createUrl}`, {
        url: createUrl
      });
    }
    return parsed.data;
  }

  async upload(filePath: string, target: UploadTarget): Promise<string> {
    if (!this.token) {
      throw new ConfigurationError("Uploading packages requires a GitHub token", {
        repository: target.repository
      });
    }

    const release = await this.findOrCreateRelease(target.repository, target.tag);
    if (!release.upload_url) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", "Release has no upload URL", {
        repository: target.repository,
        tag: release.tag_name
      });
    }

    // Replace an asset uploaded under the same name by an earlier run.
    const stale = release.assets.find((asset) => asset.name === target.assetName);
    if (stale?.id !== undefined) {
      const deleteUrl = `${this.apiBaseUrl}/repos/${target.repository}/releases/assets/${stale.id}`;
      await this.http.drain(deleteUrl, { method: "DELETE", headers: githubHeaders(this.token) });
    }

    const uploadUrl = `${release.upload_url.replace(/\{.*\}$/, "")}?name=${encodeURIComponent(target.assetName)}`;
    const response = await this.http.getJson(uploadUrl, {
      method: "POST",
      headers: { ...githubHeaders(this.token), "content-type": "application/octet-stream" },
      body: await readFile(filePath)
    });
    if (!response.ok) {
      throw githubApiError(response.body, response.status, uploadUrl);
    }

    const uploaded = UploadedAssetSchema.safeParse(response.body);
    if (!uploaded.success) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `Unexpected payload from ${uploadUrl}`, {
        url: uploadUrl
      });
    }
    return uploaded.data.browser_download_url;
  }
}
