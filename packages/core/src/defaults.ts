import type { Collaborators } from "./collaborators.js";
import { FetchAssetRetriever } from "./io/assets.js";
import { DefaultDocumentFetcher } from "./io/documents.js";
import { GithubReleaseUploader } from "./io/github-uploader.js";
import { Sha256Hasher } from "./io/hash.js";
import { HttpClient } from "./io/http.js";
import { ZipPackageInspector } from "./io/package-inspector.js";

export interface RuntimeOptions {
  githubToken?: string;
  timeoutMs?: number;
  retries?: number;
  userAgent?: string;
}

/** The network- and file-backed collaborators used outside of tests. */
export function createCollaborators(options: RuntimeOptions = {}): Collaborators {
  const http = new HttpClient({
    timeoutMs: options.timeoutMs,
    retries: options.retries,
    userAgent: options.userAgent
  });
  const hasher = new Sha256Hasher();

  return {
    http,
    documents: new DefaultDocumentFetcher(http),
    assets: new FetchAssetRetriever(http),
    hasher,
    packages: new ZipPackageInspector(hasher),
    uploader: new GithubReleaseUploader(http, options.githubToken),
    githubToken: options.githubToken
  };
}
