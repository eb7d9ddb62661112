import { join, resolve } from "node:path";
import type { PhaseId } from "../types/phase.ts";

// ── State Paths ──────────────────────────────────────────────────────────────

export interface StatePaths {
  readonly root: string;
  readonly lastRunFile: string;
  readonly notifications: string;
  readonly notificationArchive: string;
  readonly reports: string;
  readonly phaseReportFile: (phaseId: PhaseId) => string;
  readonly lastReportFile: string;
}

export function createStatePaths(rootDir: string): StatePaths {
  const root = resolve(rootDir);
  const notifications = join(root, "notifications");
  const reports = join(root, "reports");
  return {
    root,
    lastRunFile: join(root, "last-run.json"),
    notifications,
    notificationArchive: join(notifications, "archive"),
    reports,
    phaseReportFile: (phaseId: PhaseId) => join(reports, `${phaseId}.json`),
    lastReportFile: join(reports, "last-report.json"),
  };
}
