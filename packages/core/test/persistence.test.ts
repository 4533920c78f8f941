import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Diagnostics } from "../src/diagnostics.js";
import { createCatalog, readCatalog } from "../src/model/catalog.js";
import { formatCatalog, loadCatalogFile, saveCatalogFile } from "../src/persistence.js";
import { appRecord, catalogRecord } from "./fakes.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "appsource-test-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("catalog files", () => {
  it("formats with two-space indentation and one trailing newline", () => {
    const text = formatCatalog(createCatalog({ name: "Mine", identifier: "org.example.mine" }));

    expect(text).toBe(
      '{\n  "name": "Mine",\n  "identifier": "org.example.mine",\n  "apiVersion": "v2",\n  "apps": [],\n  "news": []\n}\n'
    );
  });

  it("formats compactly on request", () => {
    const text = formatCatalog(createCatalog({ name: "Mine", identifier: "org.example.mine" }), { pretty: false });

    expect(text).toBe('{"name":"Mine","identifier":"org.example.mine","apiVersion":"v2","apps":[],"news":[]}\n');
  });

  it("writes a saved catalog back byte for byte after reloading", async () => {
    const path = join(dir, "nested", "source.json");
    const catalog = readCatalog(catalogRecord([appRecord("org.example.one", ["1.1", "1.0"])]), new Diagnostics());

    await saveCatalogFile(catalog, path);
    const first = await readFile(path, "utf-8");
    await saveCatalogFile(await loadCatalogFile(path, new Diagnostics()), path);

    expect(await readFile(path, "utf-8")).toBe(first);
    expect(await readdir(join(dir, "nested"))).toEqual(["source.json"]);
  });

  it("keeps unknown fields only in full documents", async () => {
    const path = join(dir, "source.json");
    await writeFile(path, JSON.stringify(catalogRecord([], { sponsor: "Example" })));
    const catalog = await loadCatalogFile(path, new Diagnostics());

    expect(JSON.parse(formatCatalog(catalog, { fullDocument: true })).sponsor).toBe("Example");
    expect(JSON.parse(formatCatalog(catalog)).sponsor).toBeUndefined();
  });

  it("fails on missing and malformed files", async () => {
    const broken = join(dir, "broken.json");
    await writeFile(broken, "[1, 2]");

    await expect(loadCatalogFile(join(dir, "missing.json"), new Diagnostics())).rejects.toMatchObject({
      code: "CATALOG_NOT_FOUND"
    });
    await expect(loadCatalogFile(broken, new Diagnostics())).rejects.toMatchObject({ code: "INVALID_DOCUMENT" });
  });
});
