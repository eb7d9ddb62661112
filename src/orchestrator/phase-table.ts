import type { PhaseId, SkipReason } from "../types/phase.ts";
import type { RunMode } from "../types/run.ts";

// ── Phase Table ─────────────────────────────────────────────────────────────

export interface PhaseSpec {
  readonly id: PhaseId;
  /** Phases whose results this one reads. Skipped dependencies never block. */
  readonly dependsOn: readonly PhaseId[];
  /** Runs in quick mode. */
  readonly quick: boolean;
  /** Touches the network (always through a bounded probe). */
  readonly network: boolean;
}

/** Table order is a topological order of `dependsOn`. */
export const PHASE_TABLE: readonly PhaseSpec[] = [
  { id: "health", dependsOn: [], quick: true, network: true },
  { id: "security", dependsOn: [], quick: false, network: false },
  { id: "registry", dependsOn: [], quick: false, network: false },
  { id: "freshness", dependsOn: ["registry"], quick: false, network: true },
  { id: "backup", dependsOn: [], quick: true, network: false },
  { id: "memory", dependsOn: [], quick: true, network: false },
  { id: "sync", dependsOn: ["backup"], quick: false, network: false },
  { id: "bus", dependsOn: [], quick: false, network: false },
  { id: "tasks", dependsOn: [], quick: false, network: false },
  {
    id: "summary",
    dependsOn: ["health", "security", "registry", "freshness", "backup", "memory", "sync", "bus", "tasks"],
    quick: true,
    network: false,
  },
];

export const SKIPPABLE_PHASES: readonly PhaseId[] = PHASE_TABLE
  .map((spec) => spec.id)
  .filter((id) => id !== "summary");

export function isSkippablePhase(value: string): value is Exclude<PhaseId, "summary"> {
  return SKIPPABLE_PHASES.some((id) => id === value);
}

// ── Selection ───────────────────────────────────────────────────────────────

export interface PhaseSelection {
  /** Phases to execute, in table order. The summary is never included. */
  readonly run: readonly PhaseSpec[];
  readonly skipped: ReadonlyArray<{ readonly id: PhaseId; readonly reason: SkipReason }>;
}

/**
 * Split the table into phases to run and phases recorded as skipped.
 * An explicit skip flag takes precedence over quick mode; the summary
 * always runs and is left to the caller.
 */
export function selectPhases(mode: RunMode, skip: ReadonlySet<PhaseId>): PhaseSelection {
  const run: PhaseSpec[] = [];
  const skipped: { id: PhaseId; reason: SkipReason }[] = [];

  for (const spec of PHASE_TABLE) {
    if (spec.id === "summary") continue;
    if (skip.has(spec.id)) {
      skipped.push({ id: spec.id, reason: "skip_flag" });
    } else if (mode === "quick" && !spec.quick) {
      skipped.push({ id: spec.id, reason: "quick_mode" });
    } else {
      run.push(spec);
    }
  }

  return { run, skipped };
}
