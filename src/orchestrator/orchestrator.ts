import type { Logger } from "../observability/logger.ts";
import { buildSummary } from "../report/summary.ts";
import { writeJsonAtomic } from "../state/atomic.ts";
import { errorMessage } from "../state/errors.ts";
import { generateRunId } from "../state/id.ts";
import type { StatePaths } from "../state/paths.ts";
import type { RunRecordStore } from "../state/run-record-store.ts";
import { ensureStateRoot } from "../state/state-root.ts";
import type {
  AnyPhaseResult,
  PhaseId,
  PhaseOutcome,
  PhasePayloads,
  PhaseResult,
  SkipReason,
} from "../types/phase.ts";
import { PHASE_IDS, fail, skipped, toPhaseResult } from "../types/phase.ts";
import type { RunReport } from "../types/report.ts";
import type { RunMode, RunRecord } from "../types/run.ts";
import { runWithConcurrency } from "./concurrency.ts";
import type { PhaseContext, PhaseResults, PhaseRunner, PhaseRunners } from "./context.ts";
import { PhaseAbortedError, recordResult, resultPayload } from "./context.ts";
import { selectPhases } from "./phase-table.ts";

// ── Options ─────────────────────────────────────────────────────────────────

export interface OrchestratorOptions {
  readonly runners: PhaseRunners;
  readonly store: RunRecordStore;
  readonly paths: StatePaths;
  readonly logger: Logger;
  readonly version: string;
  readonly phaseTimeoutMs: number;
  readonly quickBudgetMs: number;
  readonly concurrency: number;
  readonly writeReports: boolean;
  /** Create a missing state root instead of failing. */
  readonly createStateRoot?: boolean;
  readonly now?: () => Date;
}

interface RunScope {
  readonly runId: string;
  readonly mode: RunMode;
  readonly startedAt: Date;
  readonly previousRun: RunRecord | null;
  readonly results: PhaseResults;
  readonly logger: Logger;
  /** Caller cancellation: stops launches, never interrupts a running phase. */
  readonly cancelSignal: AbortSignal | undefined;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Settle with `work`, or reject with PhaseAbortedError once `signal` fires. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new PhaseAbortedError("Phase aborted"));
      return;
    }
    const onAbort = (): void => reject(new PhaseAbortedError("Phase aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

// ── Wake Orchestrator ───────────────────────────────────────────────────────

/**
 * Runs the phase table once per invocation and records the run.
 *
 * Only `FatalSetupError` (state root unusable) escapes `run()`. Every other
 * fault is caught at the phase boundary and recorded as a `fail` result.
 */
export class WakeOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(
    mode: RunMode,
    skip: ReadonlySet<PhaseId> = new Set(),
    signal?: AbortSignal,
  ): Promise<RunReport> {
    const { paths } = this.options;
    await ensureStateRoot(paths.root, { create: this.options.createStateRoot ?? false });

    const startedAt = this.now();
    const runId = generateRunId(startedAt);
    const logger = this.options.logger.child({ runId, mode });
    const previousRun = await this.loadPreviousRun(logger);

    logger.info("Wake check started", {
      previousStart: previousRun?.startTime ?? null,
      skip: [...skip],
    });

    const scope: RunScope = {
      runId,
      mode,
      startedAt,
      previousRun,
      results: {},
      logger,
      cancelSignal: signal,
    };

    // ── Run-wide signals ──
    // The quick-mode budget interrupts running phases. Caller cancellation
    // only stops new phases from starting; a running phase finishes.
    const budget = new AbortController();
    const budgetTimer =
      mode === "quick"
        ? setTimeout(() => {
            logger.warn("Quick-mode budget exhausted", {
              budgetMs: this.options.quickBudgetMs,
            });
            budget.abort();
          }, this.options.quickBudgetMs)
        : null;
    const launchSignal =
      signal === undefined ? budget.signal : AbortSignal.any([signal, budget.signal]);

    try {
      const selection = selectPhases(mode, skip);
      for (const { id, reason } of selection.skipped) {
        recordResult(scope.results, toPhaseResult(id, startedAt.toISOString(), 0, skipped(reason)));
        logger.debug("Phase skipped", { phase: id, reason });
      }

      const outcome = await runWithConcurrency<PhaseId, void>({
        tasks: selection.run.map((spec) => ({
          id: spec.id,
          dependsOn: spec.dependsOn,
          run: () => this.execute(spec.id, scope, budget.signal),
        })),
        maxConcurrency: this.options.concurrency,
        signal: launchSignal,
        onError: (id, err) => {
          // execute() converts every fault; reaching here is a bug in it
          logger.error("Phase runner escaped its boundary", { phase: id, error: errorMessage(err) });
        },
      });

      const notStartedReason: SkipReason = signal?.aborted ? "cancelled" : "timeout";
      for (const id of outcome.notStarted) {
        recordResult(
          scope.results,
          toPhaseResult(id, this.now().toISOString(), 0, skipped(notStartedReason)),
        );
      }
      if (outcome.notStarted.length > 0) {
        logger.warn("Phases not started", {
          phases: outcome.notStarted,
          reason: notStartedReason,
        });
      }
    } finally {
      if (budgetTimer !== null) clearTimeout(budgetTimer);
    }

    // The summary runs even after cancellation, bounded by its own timeout.
    await this.execute("summary", scope, new AbortController().signal);

    const report = this.buildReport(scope);
    await this.persist(scope, report);

    logger.info("Wake check finished", {
      durationMs: report.durationMs,
      tally: report.summary.tally,
      alerts: report.summary.alerts.length,
    });
    return report;
  }

  // ── Phase Execution ───────────────────────────────────────────────────

  private async execute<P extends PhaseId>(
    id: P,
    scope: RunScope,
    budgetSignal: AbortSignal,
  ): Promise<void> {
    const result = await this.runPhase(id, this.options.runners[id], scope, budgetSignal);
    recordResult(scope.results, result);
  }

  private async runPhase<P extends PhaseId>(
    id: P,
    runner: PhaseRunner<P>,
    scope: RunScope,
    budgetSignal: AbortSignal,
  ): Promise<PhaseResult<P>> {
    const logger = scope.logger.child({ phase: id });
    const startedAt = this.now();

    const controller = new AbortController();
    const forward = (): void => controller.abort();
    budgetSignal.addEventListener("abort", forward, { once: true });
    if (budgetSignal.aborted) controller.abort();
    const timer = setTimeout(() => controller.abort(), this.options.phaseTimeoutMs);

    const ctx: PhaseContext = {
      runId: scope.runId,
      mode: scope.mode,
      signal: controller.signal,
      logger,
      now: this.now,
      startedAt: scope.startedAt,
      previousRun: scope.previousRun,
      results: scope.results,
    };

    logger.debug("Phase started");

    let outcome: PhaseOutcome<PhasePayloads[P]>;
    try {
      outcome = await raceAbort(runner(ctx), controller.signal);
    } catch (err: unknown) {
      if (err instanceof PhaseAbortedError || controller.signal.aborted) {
        // Only the phase timeout or the quick-mode budget fires this signal
        logger.warn("Phase interrupted", { reason: "timeout" });
        outcome = skipped("timeout");
      } else {
        logger.error("Phase failed", { error: errorMessage(err) });
        outcome = fail(errorMessage(err));
      }
    } finally {
      clearTimeout(timer);
      budgetSignal.removeEventListener("abort", forward);
    }

    const durationMs = this.now().getTime() - startedAt.getTime();
    logger.info("Phase finished", { status: outcome.status, durationMs });
    return toPhaseResult(id, startedAt.toISOString(), durationMs, outcome);
  }

  // ── Persistence ───────────────────────────────────────────────────────

  private async loadPreviousRun(logger: Logger): Promise<RunRecord | null> {
    try {
      return await this.options.store.load();
    } catch (err: unknown) {
      logger.warn("Previous run record unreadable, treating as first run", {
        error: errorMessage(err),
      });
      return null;
    }
  }

  private buildReport(scope: RunScope): RunReport {
    const finishedAt = this.now();
    const phases: AnyPhaseResult[] = [];
    for (const id of PHASE_IDS) {
      const result = scope.results[id];
      if (result !== undefined) phases.push(result);
    }

    // A summary runner that failed or timed out still leaves a report behind
    const recorded = resultPayload(scope.results, "summary");
    const summary =
      recorded ??
      buildSummary({
        results: scope.results,
        previousRun: scope.previousRun,
        now: scope.startedAt,
      });

    return {
      runId: scope.runId,
      version: this.options.version,
      mode: scope.mode,
      startedAt: scope.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - scope.startedAt.getTime(),
      previousRun: scope.previousRun,
      phases,
      summary,
      cancelled: scope.cancelSignal?.aborted ?? false,
    };
  }

  /** Failures here are logged; the run itself already completed. */
  private async persist(scope: RunScope, report: RunReport): Promise<void> {
    const { store, paths, writeReports, version } = this.options;

    const record: RunRecord = {
      runId: scope.runId,
      startTime: scope.startedAt.toISOString(),
      mode: scope.mode,
      durationSeconds: Math.round(report.durationMs / 100) / 10,
      version,
      previousStartTime: scope.previousRun?.startTime ?? null,
    };

    try {
      await store.save(record);
    } catch (err: unknown) {
      scope.logger.error("Failed to save run record", { error: errorMessage(err) });
    }

    if (!writeReports) return;
    try {
      for (const result of report.phases) {
        await writeJsonAtomic(paths.phaseReportFile(result.phaseId), result);
      }
      await writeJsonAtomic(paths.lastReportFile, report);
    } catch (err: unknown) {
      scope.logger.error("Failed to write reports", { error: errorMessage(err) });
    }
  }
}
