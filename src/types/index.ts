// ── Type re-exports ──────────────────────────────────────────────────────────
export type { RunMode, RunRecord } from "./run.ts";

export type {
  SkillHealth,
  SkillIssue,
  SkillRecord,
  FreshnessState,
  SkillFreshness,
} from "./skill.ts";

export type {
  KnownNotificationType,
  NotificationMessage,
  NotificationInput,
} from "./notification.ts";

export type { BackupDescriptor, BackupTriggerResult } from "./backup.ts";

export type {
  PhaseId,
  PhaseStatus,
  SkipReason,
  CheckStatus,
  HealthCheck,
  HealthPayload,
  SensitiveFileFinding,
  SecretFinding,
  SecurityPayload,
  RegistryPayload,
  FreshnessPayload,
  BackupPayload,
  MemoryCheck,
  MemoryPayload,
  SyncPayload,
  BusPayload,
  RunningProcess,
  UpcomingJob,
  TasksPayload,
  StatusTally,
  Alert,
  HeadlineMetrics,
  SummaryPayload,
  PhasePayloads,
  PhaseOutcome,
  PhaseResult,
  AnyPhaseResult,
} from "./phase.ts";

export type { RunReport } from "./report.ts";

// ── Value re-exports (const arrays and outcome constructors) ─────────────────
export { RUN_MODES } from "./run.ts";
export { KNOWN_NOTIFICATION_TYPES } from "./notification.ts";
export {
  PHASE_IDS,
  PHASE_STATUSES,
  SKIP_REASONS,
  ok,
  warn,
  fail,
  skipped,
  okOrWarn,
  payloadOf,
  toPhaseResult,
} from "./phase.ts";
