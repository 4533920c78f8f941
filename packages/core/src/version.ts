import { VersionParseError } from "./errors.js";

export type PreReleaseLabel = "a" | "b" | "rc";

export interface ParsedVersion {
  epoch: number;
  // Arbitrary-precision so long date-stamped segments keep every digit.
  release: bigint[];
  pre?: { label: PreReleaseLabel; number: number };
  post?: number;
  dev?: number;
  local?: Array<string | bigint>;
}

/** The fields of a catalog version that take part in ordering. */
export interface OrderableVersion {
  version?: string;
  absoluteVersion?: string;
  buildVersion?: string;
}

const VERSION_PATTERN = new RegExp(
  [
    "^v?",
    "(?:(\\d+)!)?",
    "(\\d+(?:\\.\\d+)*)",
    "(?:[-_.]?(a|b|c|rc|alpha|beta|pre|preview)[-_.]?(\\d+)?)?",
    "(?:-(\\d+)|[-_.]?(post|rev|r)[-_.]?(\\d+)?)?",
    "(?:[-_.]?(dev)[-_.]?(\\d+)?)?",
    "(?:\\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$"
  ].join("")
);

const PRE_RELEASE_ALIASES: Record<string, PreReleaseLabel> = {
  a: "a",
  alpha: "a",
  b: "b",
  beta: "b",
  c: "rc",
  rc: "rc",
  pre: "rc",
  preview: "rc"
};

const PRE_RELEASE_RANK: Record<PreReleaseLabel, number> = { a: 0, b: 1, rc: 2 };

function toInt(value: string | undefined, fallback = 0) {
  return value === undefined ? fallback : Number.parseInt(value, 10);
}

export function parseVersion(input: string | undefined | null): ParsedVersion {
  if (typeof input !== "string") {
    throw new VersionParseError(input, "no version given");
  }

  const match = VERSION_PATTERN.exec(input.trim().toLowerCase());
  if (!match) {
    throw new VersionParseError(input);
  }

  const [, epoch, release, preLabel, preNumber, postImplicit, postLabel, postNumber, devLabel, devNumber, local] =
    match;

  const parsed: ParsedVersion = {
    epoch: toInt(epoch),
    release: release.split(".").map((segment) => BigInt(segment))
  };

  if (preLabel) {
    parsed.pre = { label: PRE_RELEASE_ALIASES[preLabel], number: toInt(preNumber) };
  }
  if (postImplicit !== undefined) {
    parsed.post = toInt(postImplicit);
  } else if (postLabel) {
    parsed.post = toInt(postNumber);
  }
  if (devLabel) {
    parsed.dev = toInt(devNumber);
  }
  if (local) {
    parsed.local = local
      .split(/[-_.]/)
      .map((segment) => (/^\d+$/.test(segment) ? BigInt(segment) : segment));
  }

  return parsed;
}

export function isValidVersion(input: string | undefined | null): boolean {
  try {
    parseVersion(input);
    return true;
  } catch {
    return false;
  }
}

function sign(value: number) {
  return value < 0 ? -1 : value > 0 ? 1 : 0;
}

function compareTuples(left: number[], right: number[]) {
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const diff = (left[index] ?? 0) - (right[index] ?? 0);
    if (diff !== 0) {
      return sign(diff);
    }
  }
  return 0;
}

function compareSegments(left: bigint[], right: bigint[]) {
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const a = left[index] ?? 0n;
    const b = right[index] ?? 0n;
    if (a !== b) {
      return a < b ? -1 : 1;
    }
  }
  return 0;
}

// A dev release of a final version sorts before all of its pre-releases.
function preReleaseKey(version: ParsedVersion) {
  if (!version.pre && version.post === undefined && version.dev !== undefined) {
    return [-1, 0];
  }
  if (!version.pre) {
    return [3, 0];
  }
  return [PRE_RELEASE_RANK[version.pre.label], version.pre.number];
}

function compareLocal(left: ParsedVersion["local"], right: ParsedVersion["local"]) {
  if (!left && !right) {
    return 0;
  }
  if (!left) {
    return -1;
  }
  if (!right) {
    return 1;
  }

  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const a = left[index];
    const b = right[index];
    if (a === undefined) {
      return -1;
    }
    if (b === undefined) {
      return 1;
    }
    if (typeof a === "bigint" && typeof b === "bigint") {
      if (a !== b) {
        return a < b ? -1 : 1;
      }
      continue;
    }
    if (typeof a === "bigint") {
      return 1;
    }
    if (typeof b === "bigint") {
      return -1;
    }
    if (a !== b) {
      return a < b ? -1 : 1;
    }
  }
  return 0;
}

export function compareParsedVersions(left: ParsedVersion, right: ParsedVersion): number {
  if (left.epoch !== right.epoch) {
    return sign(left.epoch - right.epoch);
  }

  const release = compareSegments(left.release, right.release);
  if (release !== 0) {
    return release;
  }

  const pre = compareTuples(preReleaseKey(left), preReleaseKey(right));
  if (pre !== 0) {
    return pre;
  }

  const post = compareTuples([left.post ?? -1], [right.post ?? -1]);
  if (post !== 0) {
    return post;
  }

  const dev = compareTuples(
    [left.dev ?? Number.POSITIVE_INFINITY],
    [right.dev ?? Number.POSITIVE_INFINITY]
  );
  if (dev !== 0) {
    return dev;
  }

  return compareLocal(left.local, right.local);
}

/** Compares two version strings, returning -1, 0 or 1. Throws `VersionParseError` on malformed input. */
export function compareVersionStrings(left: string | undefined, right: string | undefined): number {
  return compareParsedVersions(parseVersion(left), parseVersion(right));
}

/**
 * Orders two catalog versions.
 *
 * `absoluteVersion` decides alone when both sides carry it. Otherwise the
 * display `version` is compared, and a tie there falls back to `buildVersion`
 * when both sides have one. Any remaining tie is reported as equal, even when
 * the two entries describe different builds.
 */
export function compareVersions(left: OrderableVersion, right: OrderableVersion): number {
  if (left.absoluteVersion !== undefined && right.absoluteVersion !== undefined) {
    return compareVersionStrings(left.absoluteVersion, right.absoluteVersion);
  }

  const display = compareVersionStrings(left.version, right.version);
  if (display !== 0) {
    return display;
  }

  if (left.buildVersion !== undefined && right.buildVersion !== undefined) {
    return compareVersionStrings(left.buildVersion, right.buildVersion);
  }

  return 0;
}

export function isNewerVersion(candidate: OrderableVersion, current: OrderableVersion): boolean {
  return compareVersions(candidate, current) > 0;
}
