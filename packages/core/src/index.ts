export * from "./collaborators.js";
export * from "./defaults.js";
export * from "./diagnostics.js";
export * from "./enrichment.js";
export * from "./errors.js";
export * from "./identity.js";
export * from "./manager.js";
export * from "./merge.js";
export * from "./persistence.js";
export * from "./version.js";

export * from "./model/app.js";
export * from "./model/catalog.js";
export { missingKeys } from "./model/fields.js";
export * from "./model/news.js";
export * from "./model/permissions.js";
export * from "./model/types.js";
export * from "./model/version.js";

export * from "./providers/index.js";

export { DefaultDocumentFetcher, isUrl } from "./io/documents.js";
export { FetchAssetRetriever, hasZipSignature } from "./io/assets.js";
export { GithubReleaseUploader } from "./io/github-uploader.js";
export { HttpClient, DEFAULT_RETRIES, DEFAULT_TIMEOUT_MS, type HttpClientOptions } from "./io/http.js";
export { Sha256Hasher } from "./io/hash.js";
export { extractPermissions, parseInfoPlist, ZipPackageInspector } from "./io/package-inspector.js";
