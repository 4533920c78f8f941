import { readFile, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import bplist from "bplist-parser";
import { unzipSync } from "fflate";
import plist from "plist";
import type { PermissionsDocument } from "@appsource/schema";
import type { ContentHasher, InspectOptions, PackageInspector, PackageMetadata } from "../collaborators.js";
import { PackageInspectionError } from "../errors.js";
import { isRawRecord, type RawRecord } from "../model/types.js";
import { Sha256Hasher } from "./hash.js";

const INFO_PLIST_PATTERN = /^Payload\/[^/]+\.app\/Info\.plist$/;
const PACKAGE_PATTERN = /\.ipa$/i;
const USAGE_SUFFIX = "UsageDescription";

function unzip(bytes: Uint8Array, filter: (name: string) => boolean, packagePath: string) {
  try {
    return unzipSync(bytes, { filter: (file) => filter(file.name) });
  } catch (error) {
    throw new PackageInspectionError(`${packagePath} is not a readable archive`, {
      package_path: packagePath,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
}

export function parseInfoPlist(bytes: Uint8Array): RawRecord {
  const header = Buffer.from(bytes.subarray(0, 6)).toString("latin1");
  const parsed: unknown =
    header === "bplist" ? bplist.parseBuffer(Buffer.from(bytes))[0] : plist.parse(Buffer.from(bytes).toString("utf-8"));

  if (!isRawRecord(parsed)) {
    throw new PackageInspectionError("Info.plist does not contain a dictionary");
  }
  return parsed;
}

function stringValue(info: RawRecord, key: string) {
  const value = info[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Every `NS<Category>UsageDescription` key becomes a privacy entry named `<Category>`. */
export function extractPermissions(info: RawRecord): PermissionsDocument {
  const privacy = Object.entries(info).flatMap(([key, value]) => {
    if (!key.endsWith(USAGE_SUFFIX) || typeof value !== "string") {
      return [];
    }
    return [{ name: key.slice(2, key.indexOf(USAGE_SUFFIX)), usageDescription: value }];
  });

  return { entitlements: [], privacy };
}

export function readPackageInfo(info: RawRecord) {
  return {
    bundleIdentifier: stringValue(info, "CFBundleIdentifier"),
    version: stringValue(info, "CFBundleShortVersionString")?.replace(/^v+/, ""),
    buildVersion: stringValue(info, "CFBundleVersion"),
    displayName: stringValue(info, "CFBundleDisplayName") ?? stringValue(info, "CFBundleName"),
    minOSVersion: stringValue(info, "MinimumOSVersion"),
    permissions: extractPermissions(info)
  };
}

export class ZipPackageInspector implements PackageInspector {
  constructor(private readonly hasher: ContentHasher = new Sha256Hasher()) {}

  private async unwrap(outerPath: string, bytes: Uint8Array) {
    const entries = unzip(bytes, (name) => PACKAGE_PATTERN.test(name), outerPath);
    const names = Object.keys(entries);
    if (names.length === 0) {
      throw new PackageInspectionError(`No package found inside ${outerPath}`, { package_path: outerPath });
    }
    if (names.length > 1) {
      throw new PackageInspectionError(`More than one package inside ${outerPath}`, {
        package_path: outerPath,
        entries: names
      });
    }

    const inner = entries[names[0]];
    const innerPath = join(dirname(outerPath), `${basename(outerPath)}.inner.ipa`);
    await writeFile(innerPath, inner);
    return { path: innerPath, bytes: inner };
  }

  async inspect(packagePath: string, options: InspectOptions = {}): Promise<PackageMetadata> {
    let path = packagePath;
    let bytes: Uint8Array;
    try {
      bytes = await readFile(packagePath);
    } catch (error) {
      throw new PackageInspectionError(`Unable to read ${packagePath}`, {
        package_path: packagePath,
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    if (options.extractTwice) {
      ({ path, bytes } = await this.unwrap(packagePath, bytes));
    }

    const entries = unzip(bytes, (name) => INFO_PLIST_PATTERN.test(name), path);
    const plistName = Object.keys(entries).sort()[0];
    if (!plistName) {
      throw new PackageInspectionError(`${path} has no Payload/*.app/Info.plist`, { package_path: path });
    }

    const info = readPackageInfo(parseInfoPlist(entries[plistName]));
    return {
      ...info,
      size: bytes.byteLength,
      sha256: await this.hasher.hashFile(path),
      packagePath: path
    };
  }
}
