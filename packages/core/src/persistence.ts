import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Diagnostics } from "./diagnostics.js";
import { CatalogError } from "./errors.js";
import { readCatalog, serializeCatalog } from "./model/catalog.js";
import { isRawRecord, type Catalog } from "./model/types.js";

export interface FormatOptions {
  /** Two-space indentation; otherwise no whitespace at all. Defaults to true. */
  pretty?: boolean;
  fullDocument?: boolean;
}

export async function loadCatalogFile(path: string, diagnostics: Diagnostics): Promise<Catalog> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new CatalogError("CATALOG_NOT_FOUND", `Unable to read catalog at ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new CatalogError("INVALID_DOCUMENT", `${path} is not valid JSON`, {
      path,
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  if (!isRawRecord(document)) {
    throw new CatalogError("INVALID_DOCUMENT", `${path} does not hold a catalog object`, { path });
  }
  return readCatalog(document, diagnostics);
}

export function formatCatalog(catalog: Catalog, options: FormatOptions = {}) {
  const document = serializeCatalog(catalog, { fullDocument: options.fullDocument });
  return `${JSON.stringify(document, null, options.pretty === false ? undefined : 2)}\n`;
}

export async function saveCatalogFile(catalog: Catalog, path: string, options: FormatOptions = {}) {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${randomBytes(4).toString("hex")}.tmp`;
  await writeFile(tmpPath, formatCatalog(catalog, options));
  await rename(tmpPath, path);
}
