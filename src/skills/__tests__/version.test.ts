import { describe, expect, it } from "vitest";
import { compareVersions, isVersionNewer, parseVersion } from "../version.ts";

describe("parseVersion", () => {
  it("accepts an optional v prefix and pre-release", () => {
    expect(parseVersion("v1.2.3")).toEqual({ segments: [1, 2, 3], prerelease: [] });
    expect(parseVersion("2.0.0-rc.1")).toEqual({ segments: [2, 0, 0], prerelease: ["rc", "1"] });
    expect(parseVersion("1.0+build.7")).toEqual({ segments: [1, 0], prerelease: [] });
  });

  it("rejects non-versions", () => {
    expect(parseVersion("latest")).toBeNull();
    expect(parseVersion("1..2")).toBeNull();
    expect(parseVersion("")).toBeNull();
  });
});

describe("compareVersions", () => {
  it("orders numerically, not lexically", () => {
    expect(compareVersions("1.10.0", "1.9.0")).toBe(1);
    expect(compareVersions("1.2.0", "1.10.0")).toBe(-1);
  });

  it("treats missing segments as zero", () => {
    expect(compareVersions("1.2", "1.2.0")).toBe(0);
    expect(compareVersions("v1.2.0", "1.2")).toBe(0);
  });

  it("sorts pre-releases before the release", () => {
    expect(compareVersions("1.0.0-beta", "1.0.0")).toBe(-1);
    expect(compareVersions("1.0.0", "1.0.0-beta")).toBe(1);
    expect(compareVersions("1.0.0-alpha", "1.0.0-beta")).toBe(-1);
    expect(compareVersions("1.0.0-rc.2", "1.0.0-rc.10")).toBe(-1);
    expect(compareVersions("1.0.0-rc", "1.0.0-rc.1")).toBe(-1);
  });

  it("returns null for unparseable input", () => {
    expect(compareVersions("next", "1.0.0")).toBeNull();
  });
});

describe("isVersionNewer", () => {
  it("is true only for strictly newer versions", () => {
    expect(isVersionNewer("1.1.0", "1.0.9")).toBe(true);
    expect(isVersionNewer("1.0.0", "1.0.0")).toBe(false);
    expect(isVersionNewer("garbage", "1.0.0")).toBe(false);
  });
});
