import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { DEFAULT_RETRIES, DEFAULT_TIMEOUT_MS, type RuntimeOptions } from "@appsource/core";
import { z } from "zod";
import { CliError } from "./errors.js";

export const CliConfigSchema = z.object({
  githubToken: z.string().optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  retries: z.number().int().min(0).optional(),
  userAgent: z.string().optional()
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export interface RuntimeOverrides {
  githubToken?: string;
  timeout?: string;
  retries?: string;
}

type Env = Record<string, string | undefined>;

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseCount(name: string, value: string | undefined, minimum: number) {
  const normalized = normalize(value);
  if (normalized === undefined) {
    return undefined;
  }
  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed < minimum) {
    throw new CliError("VALIDATION_ERROR", `${name} must be an integer of at least ${minimum}`, 1, { value });
  }
  return parsed;
}

export function getConfigPath(env: Env = process.env) {
  return normalize(env.APPSOURCE_CONFIG_PATH) ?? join(homedir(), ".appsource", "config.json");
}

export function readConfig(path = getConfigPath()): CliConfig {
  if (!existsSync(path)) {
    return {};
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new CliError("CONFIG_INVALID", `${path} is not valid JSON`, 1, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  const parsed = CliConfigSchema.safeParse(content);
  if (!parsed.success) {
    throw new CliError("CONFIG_INVALID", `${path} has invalid settings`, 1, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export function writeConfig(config: CliConfig, path = getConfigPath()) {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  writeFileSync(path, JSON.stringify(config, null, 2), { mode: 0o600 });
  chmodSync(path, 0o600);
}

/** Flag, then environment, then the config file, then the built-in default. */
export function resolveRuntimeConfig(
  overrides: RuntimeOverrides,
  env: Env = process.env,
  path = getConfigPath(env)
): RuntimeOptions {
  const fileConfig = readConfig(path);

  const githubToken =
    normalize(overrides.githubToken) ??
    normalize(env.APPSOURCE_GITHUB_TOKEN) ??
    normalize(env.GITHUB_TOKEN) ??
    normalize(fileConfig.githubToken);
  const timeoutMs =
    parseCount("--timeout", overrides.timeout, 1) ??
    parseCount("APPSOURCE_REQUEST_TIMEOUT_MS", env.APPSOURCE_REQUEST_TIMEOUT_MS, 1) ??
    fileConfig.requestTimeoutMs ??
    DEFAULT_TIMEOUT_MS;
  const retries =
    parseCount("--retries", overrides.retries, 0) ??
    parseCount("APPSOURCE_RETRIES", env.APPSOURCE_RETRIES, 0) ??
    fileConfig.retries ??
    DEFAULT_RETRIES;

  return { githubToken, timeoutMs, retries, userAgent: normalize(fileConfig.userAgent) };
}

/** Merges `updates` into the stored config; numeric strings are validated like the runtime flags. */
export function updateConfig(updates: RuntimeOverrides, path = getConfigPath()): CliConfig {
  const current = readConfig(path);
  const next: CliConfig = {
    ...current,
    githubToken: normalize(updates.githubToken) ?? current.githubToken,
    requestTimeoutMs: parseCount("--timeout", updates.timeout, 1) ?? current.requestTimeoutMs,
    retries: parseCount("--retries", updates.retries, 0) ?? current.retries
  };
  writeConfig(next, path);
  return next;
}

export function maskedToken(token: string) {
  if (token.length <= 12) {
    return `${token.slice(0, 4)}...`;
  }

  return `${token.slice(0, 8)}...${token.slice(-4)}`;
}
