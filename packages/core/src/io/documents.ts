import { readFile } from "node:fs/promises";
import type { DocumentFetcher } from "../collaborators.js";
import { ProviderAcquisitionError } from "../errors.js";
import type { HttpClient } from "./http.js";

export function isUrl(location: string) {
  try {
    const url = new URL(location);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export class DefaultDocumentFetcher implements DocumentFetcher {
  constructor(private readonly http: HttpClient) {}

  async fetchDocument(location: string): Promise<unknown> {
    if (isUrl(location)) {
      const response = await this.http.getJson(location);
      if (!response.ok) {
        throw new ProviderAcquisitionError(
          response.status === 404 ? "DOCUMENT_NOT_FOUND" : "PROVIDER_ACQUISITION_FAILED",
          `Request for ${location} failed (${response.status})`,
          { location, status_code: response.status }
        );
      }
      return response.body;
    }

    let content: string;
    try {
      content = await readFile(location, "utf-8");
    } catch (error) {
      throw new ProviderAcquisitionError("DOCUMENT_NOT_FOUND", `Unable to read ${location}`, {
        location,
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new ProviderAcquisitionError("INVALID_RESPONSE", `${location} is not valid JSON`, {
        location,
        cause: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
