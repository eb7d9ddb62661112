import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import type { PhaseRunner } from "../orchestrator/context.ts";
import { throwIfAborted } from "../orchestrator/context.ts";
import { isErrnoException } from "../state/errors.ts";
import type { RegistryPayload } from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";
import type { SkillRecord } from "../types/skill.ts";
import { loadManifest, ManifestError, type SkillManifest } from "./manifest.ts";

// ── Entry Points ────────────────────────────────────────────────────────────

export const ENTRYPOINT_FILES = [
  "main.py",
  "main.ts",
  "main.js",
  "index.ts",
  "index.js",
  "run.sh",
] as const;

export const ENTRYPOINT_DIRS = ["scripts", "src"] as const;

export const SCRIPT_EXTENSIONS = [".py", ".ts", ".js", ".sh"] as const;

const SCRIPT_EXTENSION_SET: ReadonlySet<string> = new Set(SCRIPT_EXTENSIONS);

export class SkillsRootError extends Error {
  override readonly name = "SkillsRootError";

  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
  }
}

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return [];
    }
    throw err;
  }
}

export async function hasEntrypoint(skillDir: string): Promise<boolean> {
  const topLevel = await listEntries(skillDir);
  const known: readonly string[] = ENTRYPOINT_FILES;
  if (topLevel.some((e) => e.isFile() && known.includes(e.name))) {
    return true;
  }

  for (const sub of ENTRYPOINT_DIRS) {
    const entries = await listEntries(join(skillDir, sub));
    if (entries.some((e) => e.isFile() && SCRIPT_EXTENSION_SET.has(extname(e.name)))) {
      return true;
    }
  }
  return false;
}

// ── Classification ──────────────────────────────────────────────────────────

export interface ScanOptions {
  /** Skills allowed to ship without an entry point. */
  readonly docOnly?: readonly string[];
  readonly signal?: AbortSignal;
}

/**
 * Classify one skill directory. Never throws for a bad manifest; the
 * problem is recorded on the returned record.
 */
export async function inspectSkill(
  name: string,
  skillDir: string,
  docOnly: readonly string[] = [],
): Promise<SkillRecord> {
  let manifest: SkillManifest | null;
  try {
    manifest = await loadManifest(skillDir);
  } catch (err) {
    if (!(err instanceof ManifestError)) throw err;
    return {
      name,
      path: skillDir,
      hasManifest: true,
      hasEntrypoint: await hasEntrypoint(skillDir),
      declaredVersion: null,
      health: "broken",
      issue: "malformed_manifest",
      issueDetail: err.message,
    };
  }

  const entrypoint = await hasEntrypoint(skillDir);

  if (manifest === null) {
    return {
      name,
      path: skillDir,
      hasManifest: false,
      hasEntrypoint: entrypoint,
      declaredVersion: null,
      health: "broken",
      issue: "missing_manifest",
    };
  }

  if (!entrypoint && !docOnly.includes(name)) {
    return {
      name,
      path: skillDir,
      hasManifest: true,
      hasEntrypoint: false,
      declaredVersion: manifest.version,
      health: "degraded",
      issue: "no_entrypoint",
    };
  }

  return {
    name,
    path: skillDir,
    hasManifest: true,
    hasEntrypoint: entrypoint,
    declaredVersion: manifest.version,
    health: "healthy",
    issue: null,
  };
}

/**
 * Walk the immediate subdirectories of `rootDir` (dot-directories
 * excluded) and classify each, sorted by name.
 *
 * @throws SkillsRootError when the root is missing or not a directory.
 */
export async function scanSkills(
  rootDir: string,
  options: ScanOptions = {},
): Promise<SkillRecord[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    const reason =
      isErrnoException(err) && err.code === "ENOENT"
        ? "does not exist"
        : isErrnoException(err) && err.code === "ENOTDIR"
          ? "is not a directory"
          : "cannot be read";
    throw new SkillsRootError(`Skills root ${rootDir} ${reason}`, rootDir);
  }

  const dirs = entries
    .filter((e) => e.isDirectory() && !e.name.startsWith("."))
    .map((e) => e.name)
    .sort();

  const records: SkillRecord[] = [];
  for (const name of dirs) {
    if (options.signal) throwIfAborted(options.signal);
    records.push(await inspectSkill(name, join(rootDir, name), options.docOnly));
  }
  return records;
}

export function summarizeRegistry(
  skillsRoot: string,
  skills: readonly SkillRecord[],
): RegistryPayload {
  const named = (health: SkillRecord["health"]): string[] =>
    skills.filter((s) => s.health === health).map((s) => s.name);

  return {
    skillsRoot,
    total: skills.length,
    healthy: named("healthy").length,
    degraded: named("degraded").length,
    broken: named("broken").length,
    brokenNames: named("broken"),
    degradedNames: named("degraded"),
    malformed: skills.filter((s) => s.issue === "malformed_manifest").map((s) => s.name),
    skills,
  };
}

// ── Phase ───────────────────────────────────────────────────────────────────

export interface RegistryPhaseOptions {
  readonly rootDir: string;
  readonly docOnly: readonly string[];
}

export function createRegistryPhase(options: RegistryPhaseOptions): PhaseRunner<"registry"> {
  return async (ctx) => {
    const skills = await scanSkills(options.rootDir, {
      docOnly: options.docOnly,
      signal: ctx.signal,
    });
    const payload = summarizeRegistry(options.rootDir, skills);

    ctx.logger.info("Skill registry scanned", {
      total: payload.total,
      healthy: payload.healthy,
      degraded: payload.degraded,
      broken: payload.broken,
    });

    const details = [
      `${payload.healthy}/${payload.total} healthy, ${payload.degraded} degraded, ${payload.broken} broken`,
      ...skills
        .filter((s) => s.health === "broken")
        .map((s) => `broken: ${s.name} (${s.issueDetail ?? s.issue ?? "unknown"})`),
    ];
    return okOrWarn(payload, payload.broken > 0, details);
  };
}
