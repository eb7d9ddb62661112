import type { PhaseRunner, PhaseResults } from "../orchestrator/context.ts";
import { resultPayload } from "../orchestrator/context.ts";
import type {
  Alert,
  AnyPhaseResult,
  HeadlineMetrics,
  HealthPayload,
  PhaseId,
  PhaseStatus,
  SummaryPayload,
} from "../types/phase.ts";
import { PHASE_IDS } from "../types/phase.ts";
import type { RunRecord } from "../types/run.ts";
import { formatUptime } from "./uptime.ts";

export const SECURITY_ALERT_THRESHOLD = 70;

// ── Alerts ──────────────────────────────────────────────────────────────────

/** The probe's own verdict; the GB figures in the payload are rounded. */
function belowFloor(health: HealthPayload, name: "disk" | "memory"): boolean {
  return health.checks.some((check) => check.name === name && check.status === "warn");
}

export function collectAlerts(results: PhaseResults): Alert[] {
  const alerts: Alert[] = [];

  const security = resultPayload(results, "security");
  if (security && security.score < SECURITY_ALERT_THRESHOLD) {
    alerts.push({
      code: "security_score_low",
      message: `Security score ${security.score} is below ${SECURITY_ALERT_THRESHOLD}`,
    });
  }

  const health = resultPayload(results, "health");
  if (health?.diskFreeGb != null && belowFloor(health, "disk")) {
    alerts.push({
      code: "disk_low",
      message: `Disk space low: ${health.diskFreeGb} GB free (floor ${health.diskFloorGb} GB)`,
    });
  }
  if (health?.memoryFreeGb != null && belowFloor(health, "memory")) {
    alerts.push({
      code: "memory_low",
      message: `Memory low: ${health.memoryFreeGb} GB free (floor ${health.memoryFloorGb} GB)`,
    });
  }

  const registry = resultPayload(results, "registry");
  if (registry && registry.broken > 0) {
    alerts.push({
      code: "skills_broken",
      message: `${registry.broken} skill(s) broken: ${registry.brokenNames.join(", ")}`,
    });
  }

  const freshness = resultPayload(results, "freshness");
  if (freshness && freshness.updateAvailable > 0) {
    alerts.push({
      code: "updates_available",
      message: `${freshness.updateAvailable} skill update(s) available`,
    });
  }

  const backup = resultPayload(results, "backup");
  if (backup && backup.descriptor === null) {
    alerts.push({ code: "backup_missing", message: "No backup found" });
  } else if (backup && !backup.valid) {
    alerts.push({
      code: "backup_stale",
      message: `Latest backup is stale or incomplete (${backup.ageHours ?? "?"}h old)`,
    });
  }

  const bus = resultPayload(results, "bus");
  if (bus && bus.malformed.length > 0) {
    alerts.push({
      code: "malformed_notifications",
      message: `${bus.malformed.length} malformed notification file(s)`,
    });
  }

  for (const id of PHASE_IDS) {
    const result = results[id];
    if (result?.status === "fail") {
      alerts.push({ code: "phase_failed", message: `Phase ${id} failed: ${result.error}` });
    }
  }

  return alerts;
}

// ── Headline ────────────────────────────────────────────────────────────────

export function headlineMetrics(results: PhaseResults): HeadlineMetrics {
  const security = resultPayload(results, "security");
  const registry = resultPayload(results, "registry");
  const backup = resultPayload(results, "backup");
  const bus = resultPayload(results, "bus");
  const tasks = resultPayload(results, "tasks");

  return {
    securityScore: security?.score ?? null,
    healthySkillRatio:
      registry && registry.total > 0
        ? Math.round((registry.healthy / registry.total) * 100) / 100
        : null,
    backupFresh: backup?.valid ?? null,
    backupAgeHours: backup?.ageHours ?? null,
    activeNotifications: bus?.activeCount ?? null,
    runningTasks: tasks?.running.length ?? null,
    scheduledTasks: tasks?.upcoming.length ?? null,
  };
}

// ── Status Lines ────────────────────────────────────────────────────────────

export function statusLine(result: AnyPhaseResult): string {
  switch (result.status) {
    case "skipped":
      return `${result.phaseId}: skipped (${result.reason})`;
    case "fail":
      return `${result.phaseId}: fail - ${result.error}`;
    default: {
      const first = result.details[0];
      return first ? `${result.phaseId}: ${result.status} - ${first}` : `${result.phaseId}: ${result.status}`;
    }
  }
}

// ── Summary ─────────────────────────────────────────────────────────────────

export interface SummaryInput {
  readonly results: PhaseResults;
  readonly previousRun: RunRecord | null;
  readonly now: Date;
}

/**
 * Aggregate every recorded phase. The summary counts itself: `warn` when
 * any alert was raised, `ok` otherwise.
 */
export function buildSummary(input: SummaryInput): SummaryPayload {
  const alerts = collectAlerts(input.results);
  const summaryStatus: PhaseStatus = alerts.length > 0 ? "warn" : "ok";

  const statusOf = (id: PhaseId): PhaseStatus => input.results[id]?.status ?? "skipped";
  const perPhase: Record<PhaseId, PhaseStatus> = {
    health: statusOf("health"),
    security: statusOf("security"),
    registry: statusOf("registry"),
    freshness: statusOf("freshness"),
    backup: statusOf("backup"),
    memory: statusOf("memory"),
    sync: statusOf("sync"),
    bus: statusOf("bus"),
    tasks: statusOf("tasks"),
    summary: summaryStatus,
  };

  const tally: Record<PhaseStatus, number> = { ok: 0, warn: 0, fail: 0, skipped: 0 };
  for (const id of PHASE_IDS) {
    tally[perPhase[id]] += 1;
  }

  const statusLines: string[] = [];
  for (const id of PHASE_IDS) {
    if (id === "summary") continue;
    const result = input.results[id];
    statusLines.push(result ? statusLine(result) : `${id}: skipped`);
  }

  return {
    tally,
    perPhase,
    headline: headlineMetrics(input.results),
    uptime: formatUptime(input.previousRun?.startTime ?? null, input.now),
    alerts,
    statusLines,
  };
}

export function createSummaryPhase(): PhaseRunner<"summary"> {
  return async (ctx) => {
    const payload = buildSummary({
      results: ctx.results,
      previousRun: ctx.previousRun,
      now: ctx.startedAt,
    });
    return {
      status: payload.perPhase.summary === "warn" ? "warn" : "ok",
      payload,
      details: [payload.uptime, ...payload.alerts.map((a) => a.message)],
    };
  };
}
