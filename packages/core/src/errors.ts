export class CatalogError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** An entity is missing required keys. Loaders report this as a diagnostic instead of throwing. */
export class ValidationError extends CatalogError {
  readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[], details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, { ...details, missing_keys: missingKeys });
    this.missingKeys = missingKeys;
  }
}

export class ConfigurationError extends CatalogError {
  /** Fatal errors abort the whole update run instead of a single configuration entry. */
  readonly fatal: boolean;

  constructor(message: string, details?: Record<string, unknown>, code = "CONFIGURATION_ERROR", fatal = false) {
    super(code, message, details);
    this.fatal = fatal;
  }
}

export class UnsupportedProviderError extends ConfigurationError {
  constructor(kind: unknown) {
    super(`Provider kind ${JSON.stringify(kind)} is not supported`, { kind }, "UNSUPPORTED_PROVIDER", true);
  }
}

export type AcquisitionErrorCode =
  | "PROVIDER_ACQUISITION_FAILED"
  | "DOCUMENT_NOT_FOUND"
  | "INVALID_RESPONSE"
  | "NETWORK_ERROR"
  | "REPOSITORY_NOT_FOUND"
  | "RATE_LIMITED"
  | "NO_MATCHING_RELEASES"
  | "NO_MATCHING_ASSET";

export class ProviderAcquisitionError extends CatalogError {
  constructor(code: AcquisitionErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class VersionParseError extends CatalogError {
  readonly input: unknown;

  constructor(input: unknown, reason = "not a recognizable version") {
    super("VERSION_PARSE_ERROR", `Invalid version ${JSON.stringify(input)}: ${reason}`, { input });
    this.input = input;
  }
}

export class EnrichmentFailure extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ENRICHMENT_FAILED", message, details);
  }
}

export class PackageInspectionError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PACKAGE_INSPECTION_FAILED", message, details);
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

export function describeError(error: unknown, maxLength = 300): string {
  const name = error instanceof Error ? error.name : "Error";
  const message = error instanceof Error ? error.message : String(error);
  const indented = message.replace(/\n/g, "\n\t");
  const truncated = indented.length > maxLength ? `${indented.slice(0, maxLength)}...` : indented;
  return `${name}: ${truncated}`;
}
