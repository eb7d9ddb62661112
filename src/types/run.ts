// ── Run Mode ─────────────────────────────────────────────────────────────────

export const RUN_MODES = ["normal", "quick"] as const;

export type RunMode = (typeof RUN_MODES)[number];

// ── Run Record ───────────────────────────────────────────────────────────────

/**
 * The single persisted "last run" slot. Overwritten on every invocation.
 */
export interface RunRecord {
  readonly runId: string;
  readonly startTime: string;
  readonly mode: RunMode;
  readonly durationSeconds: number;
  readonly version: string;
  /** Start time of the record this one replaced, null on the first run. */
  readonly previousStartTime: string | null;
}
