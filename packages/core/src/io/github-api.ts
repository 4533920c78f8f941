import { z } from "zod";
import { ProviderAcquisitionError } from "../errors.js";
import type { HttpClient } from "./http.js";

export const GITHUB_API_BASE_URL = "https://api.github.com";

export const ReleaseAssetSchema = z.object({
  id: z.number().optional(),
  name: z.string(),
  updated_at: z.string(),
  browser_download_url: z.string(),
  size: z.number().optional()
});

export const ReleaseSchema = z.object({
  id: z.number().optional(),
  tag_name: z.string(),
  name: z.string().nullish(),
  body: z.string().nullish(),
  prerelease: z.boolean().optional(),
  published_at: z.string().nullish(),
  upload_url: z.string().optional(),
  assets: z.array(ReleaseAssetSchema).default([])
});

export const ReleaseListSchema = z.array(ReleaseSchema);

const ApiErrorSchema = z.object({ message: z.string() });

export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;
export type Release = z.infer<typeof ReleaseSchema>;

export function githubHeaders(token: string | undefined): Record<string, string> {
  return {
    accept: "application/vnd.github+json",
    "x-github-api-version": "2022-11-28",
    ...(token ? { authorization: `Bearer ${token}` } : {})
  };
}

/** Maps a GitHub error payload (`{ message }`) onto an acquisition error. */
export function githubApiError(body: unknown, status: number, url: string): ProviderAcquisitionError {
  const parsed = ApiErrorSchema.safeParse(body);
  const message = parsed.success ? parsed.data.message : `GitHub API request failed (${status})`;
  const details = { url, status_code: status, message };

  if (message === "Not Found") {
    return new ProviderAcquisitionError("REPOSITORY_NOT_FOUND", "GitHub repository not found", details);
  }
  if (message.startsWith("API rate limit exceeded")) {
    return new ProviderAcquisitionError(
      "RATE_LIMITED",
      "GitHub API rate limit has been exceeded for this hour",
      details
    );
  }
  return new ProviderAcquisitionError("PROVIDER_ACQUISITION_FAILED", `GitHub API issue: ${message}`, details);
}

export async function getGithubJson<T extends z.ZodTypeAny>(
  http: HttpClient,
  url: string,
  schema: T,
  token: string | undefined
): Promise<z.infer<T>> {
  const response = await http.getJson(url, { headers: githubHeaders(token) });
  if (!response.ok) {
    throw githubApiError(response.body, response.status, url);
  }

  const parsed = schema.safeParse(response.body);
  if (!parsed.success) {
    // An error object can also arrive with a 2xx status from proxies and mirrors.
    if (ApiErrorSchema.safeParse(response.body).success) {
      throw githubApiError(response.body, response.status, url);
    }
    throw new ProviderAcquisitionError("INVALID_RESPONSE", `Unexpected payload from ${url}`, {
      url,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }
  return parsed.data;
}
