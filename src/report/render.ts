import type { AnyPhaseResult, HeadlineMetrics, PhaseStatus } from "../types/phase.ts";
import type { RunReport } from "../types/report.ts";

// ── Text Report ─────────────────────────────────────────────────────────────

const STATUS_LABELS: Record<PhaseStatus, string> = {
  ok: "OK",
  warn: "WARN",
  fail: "FAIL",
  skipped: "SKIP",
};

const ID_WIDTH = 10;
const LABEL_WIDTH = 6;

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

function phaseLines(result: AnyPhaseResult): string[] {
  const label = `[${STATUS_LABELS[result.status]}]`.padEnd(LABEL_WIDTH);
  const head = `  ${label} ${result.phaseId.padEnd(ID_WIDTH)}`;

  let first: string;
  switch (result.status) {
    case "skipped":
      first = `skipped: ${result.reason}`;
      break;
    case "fail":
      first = result.error;
      break;
    default:
      first = `${formatDuration(result.durationMs)}`;
  }

  const lines = [`${head} ${first}`];
  const indent = " ".repeat(2 + LABEL_WIDTH + 1 + ID_WIDTH + 1);
  for (const detail of result.details) {
    lines.push(`${indent}${detail}`);
  }
  return lines;
}

function headlineLines(headline: HeadlineMetrics): string[] {
  const lines: string[] = [];
  if (headline.securityScore !== null) {
    lines.push(`  Security score:       ${headline.securityScore}/100`);
  }
  if (headline.healthySkillRatio !== null) {
    lines.push(`  Healthy skills:       ${Math.round(headline.healthySkillRatio * 100)}%`);
  }
  if (headline.backupFresh !== null) {
    const age = headline.backupAgeHours === null ? "" : ` (${headline.backupAgeHours}h old)`;
    lines.push(`  Backup:               ${headline.backupFresh ? "fresh" : "needs attention"}${age}`);
  }
  if (headline.activeNotifications !== null) {
    lines.push(`  Active notifications: ${headline.activeNotifications}`);
  }
  if (headline.runningTasks !== null) {
    lines.push(`  Running tasks:        ${headline.runningTasks}`);
  }
  if (headline.scheduledTasks !== null) {
    lines.push(`  Scheduled soon:       ${headline.scheduledTasks}`);
  }
  return lines;
}

/**
 * Render a finished run for the terminal. Alerts get their own section
 * after the per-phase listing.
 */
export function renderReport(report: RunReport): string {
  const { summary } = report;
  const lines: string[] = [
    `=== Wake Check (${report.mode}) ===`,
    `Run:      ${report.runId}`,
    `Started:  ${report.startedAt}`,
    `Duration: ${formatDuration(report.durationMs)}`,
    summary.uptime,
  ];
  if (report.cancelled) {
    lines.push("Run was cancelled before all phases finished.");
  }

  lines.push("", "Phases:");
  for (const result of report.phases) {
    lines.push(...phaseLines(result));
  }

  const headline = headlineLines(summary.headline);
  if (headline.length > 0) {
    lines.push("", "Headline:", ...headline);
  }

  const { tally } = summary;
  lines.push(
    "",
    `Totals: ${tally.ok} ok, ${tally.warn} warn, ${tally.fail} fail, ${tally.skipped} skipped`,
  );

  if (summary.alerts.length > 0) {
    lines.push("", `Alerts (${summary.alerts.length}):`);
    for (const alert of summary.alerts) {
      lines.push(`  ! ${alert.message}`);
    }
  } else {
    lines.push("", "No alerts.");
  }

  return lines.join("\n");
}

export function renderJson(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}
