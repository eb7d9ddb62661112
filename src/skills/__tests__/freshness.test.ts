import { describe, expect, it, vi } from "vitest";
import type { PhaseContext, PhaseResults } from "../../orchestrator/context.ts";
import { BufferLogger } from "../../observability/logger.ts";
import type { ConnectivityProbe } from "../../probes/connectivity.ts";
import { summarizeRegistry } from "../skill-registry.ts";
import type { SkillRecord } from "../../types/skill.ts";
import {
  checkSkillFreshness,
  createFreshnessPhase,
  HttpVersionSource,
  type VersionSource,
} from "../freshness.ts";

function skill(name: string, declaredVersion: string | null): SkillRecord {
  return {
    name,
    path: `/skills/${name}`,
    hasManifest: true,
    hasEntrypoint: true,
    declaredVersion,
    health: "healthy",
    issue: null,
  };
}

function mapSource(versions: Record<string, string>): VersionSource {
  return {
    latestVersion: async (name) => versions[name] ?? null,
  };
}

const reachable: ConnectivityProbe = {
  check: async () => ({ host: "h", port: 53, reachable: true, latencyMs: 1 }),
};

const unreachable: ConnectivityProbe = {
  check: async () => ({ host: "h", port: 53, reachable: false, latencyMs: null }),
};

function context(results: PhaseResults = {}): PhaseContext {
  return {
    runId: "run-test",
    mode: "normal",
    signal: new AbortController().signal,
    logger: new BufferLogger(),
    now: () => new Date("2026-10-19T10:00:00.000Z"),
    startedAt: new Date("2026-10-19T10:00:00.000Z"),
    previousRun: null,
    results,
  };
}

function registryResults(skills: SkillRecord[]): PhaseResults {
  return {
    registry: {
      phaseId: "registry",
      startedAt: "2026-10-19T10:00:00.000Z",
      durationMs: 3,
      status: "ok",
      payload: summarizeRegistry("/skills", skills),
      details: [],
    },
  };
}

describe("checkSkillFreshness", () => {
  const signal = new AbortController().signal;

  it("classifies newer, equal and older remote versions", async () => {
    const source = mapSource({ a: "1.2.0", b: "1.0.0", c: "0.9.0" });

    expect((await checkSkillFreshness(skill("a", "1.0.0"), source, signal)).state).toBe(
      "update_available",
    );
    expect((await checkSkillFreshness(skill("b", "v1.0"), source, signal)).state).toBe(
      "up_to_date",
    );
    expect((await checkSkillFreshness(skill("c", "1.0.0"), source, signal)).state).toBe(
      "up_to_date",
    );
  });

  it("marks unpublished, unversioned and unparseable skills unknown", async () => {
    const source = mapSource({ odd: "nightly" });

    expect(await checkSkillFreshness(skill("missing", "1.0.0"), source, signal)).toEqual({
      name: "missing",
      declaredVersion: "1.0.0",
      latestVersion: null,
      state: "unknown",
      reason: "not published",
    });
    expect((await checkSkillFreshness(skill("nover", null), source, signal)).reason).toBe(
      "no declared version",
    );
    expect((await checkSkillFreshness(skill("odd", "1.0.0"), source, signal)).reason).toBe(
      "unparseable version",
    );
  });

  it("turns source errors into unknown", async () => {
    const source: VersionSource = {
      latestVersion: async () => {
        throw new Error("socket hang up");
      },
    };
    const result = await checkSkillFreshness(skill("x", "1.0.0"), source, signal);
    expect(result).toMatchObject({ state: "unknown", reason: "socket hang up" });
  });
});

describe("HttpVersionSource", () => {
  it("requests <base>/<name> and reads the version field", async () => {
    const fetchFn = vi.fn(async () => Response.json({ version: "2.0.0" }));
    const source = new HttpVersionSource("https://versions.example.test/skills/", 1_000, fetchFn);

    expect(await source.latestVersion("web search", new AbortController().signal)).toBe("2.0.0");
    expect(fetchFn).toHaveBeenCalledWith(
      "https://versions.example.test/skills/web%20search",
      expect.objectContaining({ headers: { accept: "application/json" } }),
    );
  });

  it("returns null on 404", async () => {
    const fetchFn = vi.fn(async () => new Response("nope", { status: 404 }));
    const source = new HttpVersionSource("https://versions.example.test", 1_000, fetchFn);
    expect(await source.latestVersion("ghost", new AbortController().signal)).toBeNull();
  });

  it("throws on server errors and bad bodies", async () => {
    const signal = new AbortController().signal;
    const failing = new HttpVersionSource(
      "https://versions.example.test",
      1_000,
      vi.fn(async () => new Response("boom", { status: 500 })),
    );
    await expect(failing.latestVersion("a", signal)).rejects.toThrow(
      "HTTP 500 from https://versions.example.test/a",
    );

    const shapeless = new HttpVersionSource(
      "https://versions.example.test",
      1_000,
      vi.fn(async () => Response.json({ tag: "1.0" })),
    );
    await expect(shapeless.latestVersion("a", signal)).rejects.toThrow('has no string "version"');
  });
});

describe("createFreshnessPhase", () => {
  it("skips when no source is configured", async () => {
    const phase = createFreshnessPhase({
      source: null,
      connectivity: reachable,
      skillsRoot: "/skills",
      docOnly: [],
      delayMs: 0,
    });
    expect(await phase(context())).toEqual({
      status: "skipped",
      reason: "not_configured",
      details: ["no version source configured"],
    });
  });

  it("skips when the network is unreachable", async () => {
    const phase = createFreshnessPhase({
      source: mapSource({}),
      connectivity: unreachable,
      skillsRoot: "/skills",
      docOnly: [],
      delayMs: 0,
    });
    const outcome = await phase(context());
    expect(outcome.status).toBe("skipped");
    if (outcome.status === "skipped") expect(outcome.reason).toBe("unavailable");
  });

  it("checks registry skills and warns on available updates", async () => {
    const phase = createFreshnessPhase({
      source: mapSource({ a: "1.1.0", b: "1.0.0" }),
      connectivity: reachable,
      skillsRoot: "/skills",
      docOnly: [],
      delayMs: 0,
    });
    const outcome = await phase(
      context(registryResults([skill("a", "1.0.0"), skill("b", "1.0.0")])),
    );

    expect(outcome.status).toBe("warn");
    if (outcome.status === "warn") {
      expect(outcome.payload).toMatchObject({ checked: 2, upToDate: 1, updateAvailable: 1, unknown: 0 });
      expect(outcome.details).toEqual(["a: 1.0.0 -> 1.1.0"]);
    }
  });

  it("leaves out skills whose manifest is missing or malformed", async () => {
    const latestVersion = vi.fn(async () => "1.0.0");
    const phase = createFreshnessPhase({
      source: { latestVersion },
      connectivity: reachable,
      skillsRoot: "/skills",
      docOnly: [],
      delayMs: 0,
    });
    const broken: SkillRecord = {
      ...skill("bad", null),
      health: "broken",
      issue: "malformed_manifest",
    };
    const outcome = await phase(context(registryResults([broken, skill("ok", "1.0.0")])));

    expect(outcome.status).toBe("ok");
    expect(latestVersion).toHaveBeenCalledTimes(1);
  });
});
