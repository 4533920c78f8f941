import { ConfigurationError, isCatalogError } from "@appsource/core";

export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;
export const EXIT_INVALID_CATALOG = 3;

export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, exitCode = EXIT_FAILURE, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function errorEnvelope(code: string, message: string, details?: Record<string, unknown>) {
  return {
    ok: false as const,
    error: {
      code,
      message,
      details
    }
  };
}

/** Library errors keep their code; configuration problems exit with 2. */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (isCatalogError(error)) {
    const exitCode = error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FAILURE;
    return new CliError(error.code, error.message, exitCode, error.details);
  }

  const message = error instanceof Error ? error.message : "Unknown CLI error";
  return new CliError("UNEXPECTED_ERROR", message);
}
