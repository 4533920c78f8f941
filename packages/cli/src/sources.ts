import { SourcesFileSchema, type SourcesFile } from '@appsource/schema';
import type { DocumentFetcher } from '@appsource/core';
import { CliError, EXIT_CONFIGURATION } from './errors.js';

/**
 * Reads a sources file (`{ sources, overrides? }`) from a path or URL. A bare
 * array is taken as the `sources` list.
 */
export async function loadSources(location: string, documents: DocumentFetcher): Promise<SourcesFile> {
  const document = await documents.fetchDocument(location);
  const parsed = SourcesFileSchema.safeParse(Array.isArray(document) ? { sources: document } : document);
  if (!parsed.success) {
    throw new CliError('SOURCES_INVALID', `${location} is not a valid sources file`, EXIT_CONFIGURATION, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
