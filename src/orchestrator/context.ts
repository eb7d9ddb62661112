import type { Logger } from "../observability/logger.ts";
import type {
  PhaseId,
  PhaseOutcome,
  PhasePayloads,
  PhaseResult,
} from "../types/phase.ts";
import type { RunMode, RunRecord } from "../types/run.ts";

// ── Phase Context ────────────────────────────────────────────────────────────

/** Results recorded so far in the current run, keyed by phase. */
export type PhaseResults = { [P in PhaseId]?: PhaseResult<P> };

export interface PhaseContext {
  readonly runId: string;
  readonly mode: RunMode;
  /** Fires when the phase timeout or the quick-mode budget runs out. */
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly now: () => Date;
  readonly startedAt: Date;
  readonly previousRun: RunRecord | null;
  readonly results: PhaseResults;
}

export type PhaseRunner<P extends PhaseId> = (
  ctx: PhaseContext,
) => Promise<PhaseOutcome<PhasePayloads[P]>>;

export type PhaseRunners = { readonly [P in PhaseId]: PhaseRunner<P> };

// ── Result Lookup ────────────────────────────────────────────────────────────

export function resultPayload<P extends PhaseId>(
  results: PhaseResults,
  id: P,
): PhasePayloads[P] | null {
  const result = results[id];
  if (result === undefined || result.status === "skipped") return null;
  return result.payload;
}

// ── Cancellation ─────────────────────────────────────────────────────────────

export class PhaseAbortedError extends Error {
  override readonly name = "PhaseAbortedError";
}

/** Checkpoint for long-running loops inside a phase. */
export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new PhaseAbortedError("Phase aborted");
  }
}

export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new PhaseAbortedError("Phase aborted"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new PhaseAbortedError("Phase aborted"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function recordResult<P extends PhaseId>(
  results: PhaseResults,
  result: PhaseResult<P>,
): void {
  const slots: { [K in P]?: PhaseResult<K> } = results;
  slots[result.phaseId] = result;
}
