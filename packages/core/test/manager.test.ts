import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { formatTimestamp, PLACEHOLDER_APP, SourceManager } from "../src/manager.js";
import { appRecord, DIGEST, fakeCollaborators, versionRecord } from "./fakes.js";
import type { PackageMetadata } from "../src/collaborators.js";
import { readApp } from "../src/model/app.js";
import { Diagnostics } from "../src/diagnostics.js";

const NOW = new Date("2024-05-25T03:39:23.456Z");

const METADATA: Partial<PackageMetadata> = {
  bundleIdentifier: "org.example.app",
  version: "1.0",
  buildVersion: "1",
  minOSVersion: "15.0",
  permissions: { entitlements: [], privacy: [{ name: "Camera", usageDescription: "Scan codes" }] }
};

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "appsource-test-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function manager(metadata: Partial<PackageMetadata> = METADATA) {
  const collaborators = fakeCollaborators({ metadata });
  const source = SourceManager.create(
    { name: "Mine", identifier: "org.example.mine" },
    join(dir, "source.json"),
    { collaborators, now: () => NOW }
  );
  return { source, collaborators };
}

describe("SourceManager", () => {
  it("formats timestamps to the second", () => {
    expect(formatTimestamp(NOW)).toBe("2024-05-25T03:39:23Z");
  });

  it("builds an app from a local package with placeholder details", async () => {
    const { source, collaborators } = manager();

    const app = await source.buildAppFromPackage("https://example.com/app.ipa", "/packages/app.ipa");

    expect(app.name).toBe(PLACEHOLDER_APP.name);
    expect(app.bundleIdentifier).toBe("org.example.app");
    expect(app.version).toBe("1.0");
    expect(app.versions).toEqual([
      {
        version: "1.0",
        buildVersion: "1",
        date: "2024-05-25T03:39:23Z",
        size: 2048,
        sha256: DIGEST,
        downloadURL: "https://example.com/app.ipa",
        minOSVersion: "15.0",
        extensions: {}
      }
    ]);
    expect(app.appPermissions?.privacy).toEqual([{ name: "Camera", usageDescription: "Scan codes", extensions: {} }]);
    expect(collaborators.assets.retrieved).toEqual([]);
    expect(source.diagnostics.byEvent("app.placeholders")[0].msg).toBe(
      "Remember to set: name, developerName, localizedDescription, iconURL"
    );
  });

  it("downloads the package when no path is given", async () => {
    const { source, collaborators } = manager();

    await source.buildAppFromPackage("https://example.com/app.ipa", undefined, {
      name: "Example",
      developerName: "Example Developer",
      localizedDescription: "Does things",
      iconURL: "https://example.com/icon.png"
    });

    expect(collaborators.assets.retrieved).toEqual(["https://example.com/app.ipa"]);
    expect(collaborators.assets.disposed).toBe(1);
    expect(source.diagnostics.byEvent("app.placeholders")).toEqual([]);
  });

  it("needs a package path or a download URL", async () => {
    const { source } = manager();

    await expect(source.buildAppFromPackage("")).rejects.toThrow(ConfigurationError);
    expect(source.diagnostics.byEvent("app.missing_download_url")).toHaveLength(1);
  });

  it("adds valid apps once", async () => {
    const { source } = manager();
    const app = await source.buildAppFromPackage("https://example.com/app.ipa", "/packages/app.ipa");

    expect(source.addApp(app)).toEqual({ added: true });
    expect(app.appID).toBe("org.example.app");
    expect(source.addApp(structuredClone(app))).toEqual({
      added: false,
      reason: "org.example.app already exists in the catalog"
    });
    expect(source.catalog.apps).toHaveLength(1);
  });

  it("refuses apps without a bundle identifier", async () => {
    const { source } = manager({ ...METADATA, bundleIdentifier: undefined });
    const app = await source.buildAppFromPackage("https://example.com/app.ipa", "/packages/app.ipa");

    expect(source.addApp(app)).toEqual({ added: false, reason: "App is invalid" });
    expect(source.diagnostics.byEvent("app.missing_bundle_id")).toHaveLength(1);
  });

  it("applies manual overrides by app id", () => {
    const { source } = manager();
    source.catalog.apps.push(readApp(appRecord("org.example.one", ["1.0"]), { diagnostics: new Diagnostics(), path: "app" }));

    const applied = source.applyManualOverrides({
      "org.example.one": { name: "Renamed", tintColor: "ff0000" },
      "org.example.ghost": { name: "Nobody" }
    });

    expect(applied).toEqual(["org.example.one"]);
    expect(source.catalog.apps[0]).toMatchObject({ name: "Renamed", tintColor: "ff0000", bundleIdentifier: "org.example.one" });
    expect(source.catalog.apps[0].versions.map((version) => version.version)).toEqual(["1.0"]);
    expect(source.diagnostics.byEvent("overrides.unknown_app")[0].msg).toBe("No app found for overrides: org.example.ghost");
  });

  it("mirrors overridden versions onto the legacy fields", () => {
    const { source } = manager();
    const legacy = { version: "1.0", versionDate: "2024-01-01T00:00:00Z", downloadURL: "https://example.com/app-1.0.ipa" };
    source.catalog.apps.push(
      readApp(appRecord("org.example.one", ["1.0"], legacy), { diagnostics: new Diagnostics(), path: "app" })
    );

    source.applyManualOverrides({
      "org.example.one": { versions: [versionRecord("2.0", { date: "2024-06-01T00:00:00Z" })] }
    });

    expect(source.catalog.apps[0]).toMatchObject({
      version: "2.0",
      versionDate: "2024-06-01T00:00:00Z",
      downloadURL: "https://example.com/app-2.0.ipa",
      size: 1000
    });
  });

  it("saves to its path and reopens", async () => {
    const { source, collaborators } = manager();
    const app = await source.buildAppFromPackage("https://example.com/app.ipa", "/packages/app.ipa");
    source.addApp(app);

    const path = await source.save();
    const reopened = await SourceManager.open(path, { collaborators });

    expect(path).toBe(join(dir, "source.json"));
    expect(reopened.catalog.apps[0].appID).toBe("org.example.app");
    expect(reopened.catalog.name).toBe("Mine");
    expect((await readFile(path, "utf-8")).endsWith("}\n")).toBe(true);
  });

  it("backfills missing hashes through its collaborators", async () => {
    const { source, collaborators } = manager();
    source.catalog.apps.push(readApp(appRecord("org.example.one", ["1.0"]), { diagnostics: new Diagnostics(), path: "app" }));

    await expect(source.backfillHashesAndPermissions()).resolves.toEqual({ enriched: 1, skipped: 0, failed: 0 });
    expect(collaborators.hasher.hashed).toEqual(["/virtual/app-1.0.ipa"]);
  });
});
