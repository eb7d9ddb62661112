import type { AnyPhaseResult, SummaryPayload } from "./phase.ts";
import type { RunMode, RunRecord } from "./run.ts";

// ── Run Report ───────────────────────────────────────────────────────────────

export interface RunReport {
  readonly runId: string;
  readonly version: string;
  readonly mode: RunMode;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly previousRun: RunRecord | null;
  readonly phases: readonly AnyPhaseResult[];
  readonly summary: SummaryPayload;
  readonly cancelled: boolean;
}
