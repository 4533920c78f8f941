import { describe, expect, it } from "vitest";
import { Diagnostics } from "../src/diagnostics.js";
import { addVersion, isAppValid, latestVersion, readApp } from "../src/model/app.js";
import { catalogIssues, createCatalog, isCatalogValid, readCatalog, serializeCatalog } from "../src/model/catalog.js";
import { upsertNewsArticle } from "../src/model/news.js";
import { unknownPrivacyCategories } from "../src/model/permissions.js";
import type { App, NewsArticle } from "../src/model/types.js";
import { appRecord, catalogRecord, makeVersion, versionRecord } from "./fakes.js";

function read(raw: Record<string, unknown>) {
  const diagnostics = new Diagnostics();
  return { app: readApp(raw, { diagnostics, path: "apps[0]" }), diagnostics };
}

describe("lenient reading", () => {
  it("builds a version from first-generation fields", () => {
    const { app, diagnostics } = read({
      name: "Legacy",
      bundleIdentifier: "org.example.legacy",
      developerName: "Example Developer",
      localizedDescription: "Old layout",
      iconURL: "https://example.com/icon.png",
      version: "1.0",
      versionDate: "2023-05-01",
      versionDescription: "First",
      downloadURL: "https://example.com/legacy.ipa",
      size: 500
    });

    expect(app.versions).toEqual([
      {
        version: "1.0",
        date: "2023-05-01",
        localizedDescription: "First",
        downloadURL: "https://example.com/legacy.ipa",
        size: 500,
        extensions: {}
      }
    ]);
    expect(isAppValid(app)).toBe(true);
    expect(diagnostics.byEvent("app.legacy_version")).toHaveLength(1);
  });

  it("keeps wrong-typed and unknown fields as extensions", () => {
    const { app, diagnostics } = read(
      appRecord("org.example.one", [], { versions: [versionRecord("1.0", { size: "big", channel: "beta" })], rating: 5 })
    );

    expect(app.extensions).toEqual({ rating: 5 });
    expect(app.versions[0].size).toBeUndefined();
    expect(app.versions[0].extensions).toEqual({ size: "big", channel: "beta" });
    expect(diagnostics.byEvent("field.invalid")).toHaveLength(1);
    expect(diagnostics.byEvent("entity.missing_keys")[0].msg).toBe(
      "apps[0].versions[0] is missing required keys: size"
    );
    expect(isAppValid(app)).toBe(false);
  });

  it("drops list entries that are not objects", () => {
    const diagnostics = new Diagnostics();
    const catalog = readCatalog(catalogRecord(["oops", appRecord("org.example.one", ["1.0"])]), diagnostics);

    expect(catalog.apps).toHaveLength(1);
    expect(diagnostics.byEvent("entity.not_an_object")[0].data).toEqual({ path: "catalog.apps[0]" });
  });

  it("always loads catalogs as the current api version", () => {
    const catalog = readCatalog(catalogRecord([], { apiVersion: "v1" }), new Diagnostics());
    expect(catalog.apiVersion).toBe("v2");
  });

  it("reports a catalog without apps", () => {
    const diagnostics = new Diagnostics();
    readCatalog({ name: "Empty", identifier: "org.example.empty" }, diagnostics);

    expect(diagnostics.byEvent("entity.missing_keys")[0].data?.missing_keys).toEqual(["apps"]);
  });
});

describe("versions", () => {
  function appWith(...versions: string[]): App {
    return read(appRecord("org.example.one", versions)).app;
  }

  it("prepends new releases and mirrors them onto the legacy fields", () => {
    const app = appWith("1.0");

    expect(addVersion(app, makeVersion("1.1"))).toBe("added");
    expect(app.versions.map((version) => version.version)).toEqual(["1.1", "1.0"]);
    expect(app.version).toBe("1.1");
    expect(app.downloadURL).toBe("https://example.com/app-1.1.ipa");
    expect(app.versionDate).toBe("2024-01-01T00:00:00Z");
  });

  it("replaces a release with the same version and build in place", () => {
    const app = appWith("2.0", "1.0");

    expect(addVersion(app, makeVersion("1.0", { size: 42 }))).toBe("replaced");
    expect(app.versions.map((version) => [version.version, version.size])).toEqual([
      ["2.0", 1000],
      ["1.0", 42]
    ]);
    expect(app.version).toBe("2.0");
  });

  it("finds the latest version by date on request", () => {
    const app = read(
      appRecord("org.example.one", [], {
        versions: [versionRecord("1.0", { date: "2024-01-01" }), versionRecord("0.9", { date: "2024-03-01" })]
      })
    ).app;

    expect(latestVersion(app)?.version).toBe("1.0");
    expect(latestVersion(app, { byDate: true })?.version).toBe("0.9");
  });
});

describe("news", () => {
  it("upserts by identifier", () => {
    const news: NewsArticle[] = [];
    const article = { title: "Hello", identifier: "hello", caption: "First", date: "2024-01-01", extensions: {} };

    expect(upsertNewsArticle(news, article)).toBe("added");
    expect(upsertNewsArticle(news, { ...article, caption: "Edited" })).toBe("replaced");
    expect(news).toHaveLength(1);
    expect(news[0].caption).toBe("Edited");
  });
});

describe("serialization", () => {
  it("writes a blank catalog in schema order", () => {
    const document = serializeCatalog(createCatalog({ name: "Mine", identifier: "org.example.mine" }));

    expect(Object.keys(document)).toEqual(["name", "identifier", "apiVersion", "apps", "news"]);
    expect(document).toEqual({ name: "Mine", identifier: "org.example.mine", apiVersion: "v2", apps: [], news: [] });
  });

  it("writes extension fields only for full documents", () => {
    const catalog = readCatalog(
      catalogRecord([appRecord("org.example.one", ["1.0"], { rating: 5 })], { sponsor: "Example" }),
      new Diagnostics()
    );

    expect(serializeCatalog(catalog).sponsor).toBeUndefined();
    expect(serializeCatalog(catalog, { fullDocument: true }).sponsor).toBe("Example");

    expect(serializeCatalog(catalog, { fullDocument: true }).apps).toEqual([
      expect.objectContaining({ rating: 5, bundleIdentifier: "org.example.one" })
    ]);
  });
});

describe("validation", () => {
  it("lists missing keys as errors and unknown privacy categories as warnings", () => {
    const catalog = readCatalog(
      catalogRecord([
        {
          name: "Partial",
          bundleIdentifier: "org.example.partial",
          developerName: "Example Developer",
          localizedDescription: "Missing an icon",
          versions: [versionRecord("1.0")],
          appPermissions: { entitlements: [], privacy: [{ name: "Teleportation", usageDescription: "Beam me up" }] }
        }
      ]),
      new Diagnostics()
    );

    expect(unknownPrivacyCategories(catalog.apps[0].appPermissions)).toEqual(["Teleportation"]);
    expect(isCatalogValid(catalog)).toBe(false);
    expect(catalogIssues(catalog)).toEqual([
      { severity: "error", path: "catalog.apps[0] (org.example.partial)", message: "Missing keys: iconURL" },
      {
        severity: "warning",
        path: "catalog.apps[0] (org.example.partial)",
        message: "Unknown privacy category Teleportation"
      }
    ]);
  });

  it("accepts a complete catalog", () => {
    const catalog = readCatalog(catalogRecord([appRecord("org.example.one", ["1.0"])], { news: [] }), new Diagnostics());

    expect(isCatalogValid(catalog)).toBe(true);
    expect(catalogIssues(catalog)).toEqual([]);
  });
});
