import type { PermissionsDocument } from "@appsource/schema";
import type { HttpClient } from "./io/http.js";

/** Loads a parsed JSON document from a file path or URL. */
export interface DocumentFetcher {
  fetchDocument(location: string): Promise<unknown>;
}

export interface RetrievedAsset {
  path: string;
  size: number;
  /** Removes the temporary file. */
  dispose(): Promise<void>;
}

/** Downloads an asset to a temporary file. */
export interface AssetRetriever {
  retrieve(url: string): Promise<RetrievedAsset>;
}

export interface ContentHasher {
  /** Lowercase hex digest of the file's contents. */
  hashFile(path: string): Promise<string>;
}

export interface PackageMetadata {
  bundleIdentifier?: string;
  version?: string;
  buildVersion?: string;
  displayName?: string;
  minOSVersion?: string;
  size: number;
  sha256: string;
  permissions: PermissionsDocument;
  /** The package the metadata was read from; differs from the input when it had to be unwrapped. */
  packagePath: string;
}

export interface InspectOptions {
  /** The package is itself shipped inside a zip archive. */
  extractTwice?: boolean;
}

export interface PackageInspector {
  inspect(packagePath: string, options?: InspectOptions): Promise<PackageMetadata>;
}

export interface UploadTarget {
  repository: string;
  tag?: string;
  assetName: string;
}

export interface ReleaseUploader {
  /** Returns the public download URL of the uploaded file. */
  upload(filePath: string, target: UploadTarget): Promise<string>;
}

export interface Collaborators {
  http: HttpClient;
  documents: DocumentFetcher;
  assets: AssetRetriever;
  hasher: ContentHasher;
  packages: PackageInspector;
  uploader?: ReleaseUploader;
  /** Sent to the GitHub releases API when present. */
  githubToken?: string;
}
