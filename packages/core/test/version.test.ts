import { describe, expect, it } from "vitest";
import { VersionParseError } from "../src/errors.js";
import { compareVersions, compareVersionStrings, isNewerVersion, isValidVersion, parseVersion } from "../src/version.js";

describe("parseVersion", () => {
  it("reads release segments with an optional leading v", () => {
    expect(parseVersion("v1.2.3")).toEqual({ epoch: 0, release: [1n, 2n, 3n] });
  });

  it("normalizes pre-release aliases", () => {
    expect(parseVersion("1.0-beta2").pre).toEqual({ label: "b", number: 2 });
    expect(parseVersion("1.0preview").pre).toEqual({ label: "rc", number: 0 });
  });

  it("reads epochs, post, dev and local parts", () => {
    const parsed = parseVersion("2!1.4.post3.dev1+build.7");
    expect(parsed.epoch).toBe(2);
    expect(parsed.release).toEqual([1n, 4n]);
    expect(parsed.post).toBe(3);
    expect(parsed.dev).toBe(1);
    expect(parsed.local).toEqual(["build", 7n]);
  });

  it("rejects malformed input", () => {
    expect(() => parseVersion("not a version")).toThrow(VersionParseError);
    expect(() => parseVersion(undefined)).toThrow(VersionParseError);
    expect(isValidVersion("1.0.0")).toBe(true);
    expect(isValidVersion("release-candidate")).toBe(false);
  });
});

describe("compareVersionStrings", () => {
  it("ignores trailing zero segments", () => {
    expect(compareVersionStrings("1.0", "1.0.0")).toBe(0);
  });

  it("orders pre-releases, finals and post-releases", () => {
    const ordered = ["1.0.dev1", "1.0a1", "1.0b2", "1.0rc1", "1.0", "1.0.post1", "1.0.1"];
    for (let index = 1; index < ordered.length; index += 1) {
      expect(compareVersionStrings(ordered[index - 1], ordered[index])).toBe(-1);
      expect(compareVersionStrings(ordered[index], ordered[index - 1])).toBe(1);
    }
  });

  it("compares numerically, not lexically", () => {
    expect(compareVersionStrings("1.10", "1.9")).toBe(1);
  });

  it("keeps every digit of long numeric segments", () => {
    expect(compareVersionStrings("1.20240601123456789", "1.20240601123456788")).toBe(1);
    expect(compareVersionStrings("1.0+20240601123456788", "1.0+20240601123456789")).toBe(-1);
  });

  it("lets the epoch win over the release", () => {
    expect(compareVersionStrings("1!1.0", "3.0")).toBe(1);
  });

  it("sorts a local label after the bare version", () => {
    expect(compareVersionStrings("1.0+local", "1.0")).toBe(1);
  });
});

describe("compareVersions", () => {
  it("uses absoluteVersion alone when both sides carry it", () => {
    expect(compareVersions({ absoluteVersion: "2.0", version: "1.0" }, { absoluteVersion: "1.5", version: "9.0" })).toBe(1);
  });

  it("falls back to the display version", () => {
    expect(compareVersions({ absoluteVersion: "2.0", version: "1.0" }, { version: "1.2" })).toBe(-1);
  });

  it("breaks display ties on buildVersion when both have one", () => {
    expect(compareVersions({ version: "1.0", buildVersion: "5" }, { version: "1.0", buildVersion: "4" })).toBe(1);
    expect(compareVersions({ version: "1.0", buildVersion: "5" }, { version: "1.0" })).toBe(0);
  });

  it("is reflexive", () => {
    const version = { version: "3.1.4", buildVersion: "15", absoluteVersion: "3.1.4" };
    expect(compareVersions(version, { ...version })).toBe(0);
    expect(isNewerVersion(version, { ...version })).toBe(false);
  });

  it("reports strictly newer candidates", () => {
    expect(isNewerVersion({ version: "1.2.0" }, { version: "1.0.0" })).toBe(true);
    expect(isNewerVersion({ version: "1.0.0" }, { version: "1.2.0" })).toBe(false);
  });
});
