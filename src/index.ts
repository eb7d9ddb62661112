export * from "./types/index.ts";
export * from "./state/index.ts";
export * from "./observability/index.ts";

export { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
export {
  createApplication,
  type Application,
  type ApplicationOverrides,
} from "./bootstrap.ts";

// ── Orchestration ────────────────────────────────────────────────────────────
export { WakeOrchestrator, type OrchestratorOptions } from "./orchestrator/orchestrator.ts";
export {
  PHASE_TABLE,
  SKIPPABLE_PHASES,
  selectPhases,
  type PhaseSpec,
  type PhaseSelection,
} from "./orchestrator/phase-table.ts";
export {
  PhaseAbortedError,
  resultPayload,
  throwIfAborted,
  type PhaseContext,
  type PhaseResults,
  type PhaseRunner,
  type PhaseRunners,
} from "./orchestrator/context.ts";

// ── Notification bus ─────────────────────────────────────────────────────────
export {
  FileNotificationBus,
  type NotificationBus,
  type DrainResult,
} from "./events/notification-bus.ts";
export { ORCHESTRATOR_SENDER } from "./events/bus-phase.ts";

// ── Reporting ────────────────────────────────────────────────────────────────
export { buildSummary, collectAlerts } from "./report/summary.ts";
export { formatUptime } from "./report/uptime.ts";
export { renderReport, renderJson } from "./report/render.ts";

// ── Cron ─────────────────────────────────────────────────────────────────────
export { parseCron, nextCronMatch, CronParseError, type CronFields } from "./tasks/cron.ts";

export { VERSION } from "./version.ts";
