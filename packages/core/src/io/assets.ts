import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AssetRetriever, RetrievedAsset } from "../collaborators.js";
import { ProviderAcquisitionError } from "../errors.js";
import type { HttpClient } from "./http.js";

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

export function hasZipSignature(bytes: Uint8Array) {
  return ZIP_SIGNATURE.every((byte, index) => bytes[index] === byte);
}

export async function createTempDir() {
  return mkdtemp(join(tmpdir(), "appsource-"));
}

export class FetchAssetRetriever implements AssetRetriever {
  constructor(private readonly http: HttpClient) {}

  async retrieve(url: string): Promise<RetrievedAsset> {
    const bytes = await this.http.download(url);
    if (!hasZipSignature(bytes)) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `${url} is not a package archive`, { url });
    }

    const dir = await createTempDir();
    const path = join(dir, "asset.ipa");
    await writeFile(path, bytes);

    return {
      path,
      size: bytes.byteLength,
      dispose: () => rm(dir, { recursive: true, force: true })
    };
  }
}
