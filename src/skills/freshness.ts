import type { PhaseRunner } from "../orchestrator/context.ts";
import { resultPayload, sleep, throwIfAborted } from "../orchestrator/context.ts";
import type { ConnectivityProbe } from "../probes/connectivity.ts";
import { errorMessage } from "../state/errors.ts";
import type { FreshnessPayload } from "../types/phase.ts";
import { okOrWarn, skipped } from "../types/phase.ts";
import type { SkillFreshness, SkillRecord } from "../types/skill.ts";
import { scanSkills } from "./skill-registry.ts";
import { compareVersions } from "./version.ts";

// ── Version Source ──────────────────────────────────────────────────────────

export interface VersionSource {
  /** @returns the latest published version, or null when the source does not know the skill. */
  latestVersion(name: string, signal: AbortSignal): Promise<string | null>;
}

export class VersionSourceError extends Error {
  override readonly name = "VersionSourceError";

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

/**
 * `GET <baseUrl>/<name>` returning `{ "version": "x.y.z" }`. A 404 means the
 * skill is unknown to the source.
 */
export class HttpVersionSource implements VersionSource {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async latestVersion(name: string, signal: AbortSignal): Promise<string | null> {
    const url = `${this.baseUrl}/${encodeURIComponent(name)}`;
    const response = await this.fetchFn(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)]),
    });

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new VersionSourceError(`HTTP ${response.status} from ${url}`, response.status);
    }

    const body: unknown = await response.json();
    if (
      typeof body === "object" &&
      body !== null &&
      "version" in body &&
      typeof body.version === "string"
    ) {
      return body.version;
    }
    throw new VersionSourceError(`Response from ${url} has no string "version"`);
  }
}

// ── Classification ──────────────────────────────────────────────────────────

export async function checkSkillFreshness(
  skill: SkillRecord,
  source: VersionSource,
  signal: AbortSignal,
): Promise<SkillFreshness> {
  const base = { name: skill.name, declaredVersion: skill.declaredVersion };

  if (skill.declaredVersion === null) {
    return { ...base, latestVersion: null, state: "unknown", reason: "no declared version" };
  }

  let latest: string | null;
  try {
    latest = await source.latestVersion(skill.name, signal);
  } catch (err) {
    throwIfAborted(signal);
    return { ...base, latestVersion: null, state: "unknown", reason: errorMessage(err) };
  }

  if (latest === null) {
    return { ...base, latestVersion: null, state: "unknown", reason: "not published" };
  }

  const order = compareVersions(latest, skill.declaredVersion);
  if (order === null) {
    return { ...base, latestVersion: latest, state: "unknown", reason: "unparseable version" };
  }
  return {
    ...base,
    latestVersion: latest,
    state: order > 0 ? "update_available" : "up_to_date",
  };
}

export function summarizeFreshness(results: readonly SkillFreshness[]): FreshnessPayload {
  const count = (state: SkillFreshness["state"]): number =>
    results.filter((r) => r.state === state).length;

  return {
    checked: results.length,
    upToDate: count("up_to_date"),
    updateAvailable: count("update_available"),
    unknown: count("unknown"),
    results,
  };
}

// ── Phase ───────────────────────────────────────────────────────────────────

export interface FreshnessPhaseOptions {
  readonly source: VersionSource | null;
  readonly connectivity: ConnectivityProbe;
  readonly skillsRoot: string;
  readonly docOnly: readonly string[];
  readonly delayMs: number;
}

export function createFreshnessPhase(options: FreshnessPhaseOptions): PhaseRunner<"freshness"> {
  return async (ctx) => {
    const { source } = options;
    if (source === null) {
      return skipped("not_configured", ["no version source configured"]);
    }

    const health = resultPayload(ctx.results, "health");
    const reachable = health
      ? health.network.reachable
      : (await options.connectivity.check(ctx.signal)).reachable;
    if (!reachable) {
      return skipped("unavailable", ["network unreachable"]);
    }

    const registry = resultPayload(ctx.results, "registry");
    const skills =
      registry?.skills ??
      (await scanSkills(options.skillsRoot, { docOnly: options.docOnly, signal: ctx.signal }));
    const candidates = skills.filter((s) => s.hasManifest && s.issue !== "malformed_manifest");

    const results: SkillFreshness[] = [];
    for (const [i, skill] of candidates.entries()) {
      if (i > 0 && options.delayMs > 0) await sleep(options.delayMs, ctx.signal);
      throwIfAborted(ctx.signal);
      results.push(await checkSkillFreshness(skill, source, ctx.signal));
    }

    const payload = summarizeFreshness(results);
    ctx.logger.info("Freshness check complete", {
      checked: payload.checked,
      updateAvailable: payload.updateAvailable,
      unknown: payload.unknown,
    });

    return okOrWarn(
      payload,
      payload.updateAvailable > 0,
      results
        .filter((r) => r.state === "update_available")
        .map((r) => `${r.name}: ${r.declaredVersion ?? "?"} -> ${r.latestVersion ?? "?"}`),
    );
  };
}
