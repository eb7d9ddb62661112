import type { BackupDescriptor, BackupTriggerResult } from "./backup.ts";
import type { NotificationMessage } from "./notification.ts";
import type { SkillFreshness, SkillRecord } from "./skill.ts";

// ── Phase Identifiers ────────────────────────────────────────────────────────

export const PHASE_IDS = [
  "health",
  "security",
  "registry",
  "freshness",
  "backup",
  "memory",
  "sync",
  "bus",
  "tasks",
  "summary",
] as const;

export type PhaseId = (typeof PHASE_IDS)[number];

export const PHASE_STATUSES = ["ok", "warn", "fail", "skipped"] as const;
export type PhaseStatus = (typeof PHASE_STATUSES)[number];

export const SKIP_REASONS = [
  "skip_flag",
  "quick_mode",
  "unavailable",
  "not_configured",
  "cancelled",
  "timeout",
] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export type CheckStatus = "ok" | "warn";

// ── Health ───────────────────────────────────────────────────────────────────

export interface HealthCheck {
  readonly name: "disk" | "memory" | "network";
  readonly status: CheckStatus;
  readonly detail: string;
}

export interface HealthPayload {
  readonly checks: readonly HealthCheck[];
  readonly diskFreeGb: number | null;
  readonly diskFloorGb: number;
  readonly memoryFreeGb: number | null;
  readonly memoryFloorGb: number;
  readonly network: {
    readonly host: string;
    readonly port: number;
    readonly reachable: boolean;
    readonly latencyMs: number | null;
  };
}

// ── Security ─────────────────────────────────────────────────────────────────

export interface SensitiveFileFinding {
  readonly pattern: string;
  readonly path: string;
}

export interface SecretFinding {
  readonly pattern: string;
  readonly path: string;
  readonly line: number;
}

export interface SecurityPayload {
  readonly score: number;
  readonly filesScanned: number;
  readonly sensitiveFiles: readonly SensitiveFileFinding[];
  readonly exposedSecrets: readonly SecretFinding[];
  readonly warnings: readonly string[];
}

// ── Registry / Freshness ─────────────────────────────────────────────────────

export interface RegistryPayload {
  readonly skillsRoot: string;
  readonly total: number;
  readonly healthy: number;
  readonly degraded: number;
  readonly broken: number;
  readonly brokenNames: readonly string[];
  readonly degradedNames: readonly string[];
  readonly malformed: readonly string[];
  readonly skills: readonly SkillRecord[];
}

export interface FreshnessPayload {
  readonly checked: number;
  readonly upToDate: number;
  readonly updateAvailable: number;
  readonly unknown: number;
  readonly results: readonly SkillFreshness[];
}

// ── Backup ───────────────────────────────────────────────────────────────────

export interface BackupPayload {
  readonly backupRoot: string;
  readonly needsBackup: boolean;
  readonly valid: boolean;
  readonly ageHours: number | null;
  readonly descriptor: BackupDescriptor | null;
  readonly trigger: BackupTriggerResult | null;
}

// ── Memory ───────────────────────────────────────────────────────────────────

export interface MemoryCheck {
  readonly name: "primary" | "identity" | "session" | "knowledge";
  readonly status: CheckStatus;
  readonly path: string;
  readonly detail: string;
}

export interface MemoryPayload {
  readonly checks: readonly MemoryCheck[];
  readonly knowledgeBlocks: number;
}

// ── Sync ─────────────────────────────────────────────────────────────────────

export interface SyncPayload {
  readonly repoDir: string;
  readonly branch: string | null;
  readonly upstream: string | null;
  readonly ahead: number;
  readonly behind: number;
  readonly dirtyFiles: number;
}

// ── Bus ──────────────────────────────────────────────────────────────────────

export interface BusPayload {
  readonly activeCount: number;
  readonly recent: readonly NotificationMessage[];
  readonly malformed: readonly string[];
  readonly readyMessageId: string | null;
}

// ── Tasks ────────────────────────────────────────────────────────────────────

export interface RunningProcess {
  readonly pid: number;
  readonly uptimeSeconds: number;
  readonly command: string;
  readonly activity: string | null;
}

export interface UpcomingJob {
  readonly name: string;
  readonly schedule: string;
  readonly command: string;
  readonly nextRunAt: string;
}

export interface TasksPayload {
  readonly running: readonly RunningProcess[];
  readonly upcoming: readonly UpcomingJob[];
  readonly lookaheadHours: number;
  readonly warnings: readonly string[];
}

// ── Summary ──────────────────────────────────────────────────────────────────

export type StatusTally = Readonly<Record<PhaseStatus, number>>;

export interface Alert {
  readonly code:
    | "security_score_low"
    | "skills_broken"
    | "backup_stale"
    | "backup_missing"
    | "phase_failed"
    | "disk_low"
    | "memory_low"
    | "updates_available"
    | "malformed_notifications";
  readonly message: string;
}

export interface HeadlineMetrics {
  readonly securityScore: number | null;
  readonly healthySkillRatio: number | null;
  readonly backupFresh: boolean | null;
  readonly backupAgeHours: number | null;
  readonly activeNotifications: number | null;
  readonly runningTasks: number | null;
  readonly scheduledTasks: number | null;
}

export interface SummaryPayload {
  readonly tally: StatusTally;
  readonly perPhase: Readonly<Record<PhaseId, PhaseStatus>>;
  readonly headline: HeadlineMetrics;
  readonly uptime: string;
  readonly alerts: readonly Alert[];
  readonly statusLines: readonly string[];
}

// ── Payload Map ──────────────────────────────────────────────────────────────

export interface PhasePayloads {
  readonly health: HealthPayload;
  readonly security: SecurityPayload;
  readonly registry: RegistryPayload;
  readonly freshness: FreshnessPayload;
  readonly backup: BackupPayload;
  readonly memory: MemoryPayload;
  readonly sync: SyncPayload;
  readonly bus: BusPayload;
  readonly tasks: TasksPayload;
  readonly summary: SummaryPayload;
}

// ── Phase Outcome (tagged by status) ─────────────────────────────────────────

export type PhaseOutcome<T> =
  | { readonly status: "ok"; readonly payload: T; readonly details: readonly string[] }
  | { readonly status: "warn"; readonly payload: T; readonly details: readonly string[] }
  | {
      readonly status: "fail";
      readonly payload: T | null;
      readonly details: readonly string[];
      readonly error: string;
    }
  | {
      readonly status: "skipped";
      readonly reason: SkipReason;
      readonly details: readonly string[];
    };

export type PhaseResult<P extends PhaseId = PhaseId> = {
  readonly phaseId: P;
  readonly startedAt: string;
  readonly durationMs: number;
} & PhaseOutcome<PhasePayloads[P]>;

/** Union of every concrete phase result, discriminated by `phaseId`. */
export type AnyPhaseResult = { [P in PhaseId]: PhaseResult<P> }[PhaseId];

// ── Outcome Constructors ─────────────────────────────────────────────────────

export function ok<T>(payload: T, details: readonly string[] = []): PhaseOutcome<T> {
  return { status: "ok", payload, details };
}

export function warn<T>(payload: T, details: readonly string[] = []): PhaseOutcome<T> {
  return { status: "warn", payload, details };
}

export function fail<T>(
  error: string,
  payload: T | null = null,
  details: readonly string[] = [],
): PhaseOutcome<T> {
  return { status: "fail", payload, details, error };
}

export function skipped<T>(
  reason: SkipReason,
  details: readonly string[] = [],
): PhaseOutcome<T> {
  return { status: "skipped", reason, details };
}

/** ok when every check passed, warn otherwise. */
export function okOrWarn<T>(
  payload: T,
  degraded: boolean,
  details: readonly string[] = [],
): PhaseOutcome<T> {
  return degraded ? warn(payload, details) : ok(payload, details);
}

export function payloadOf<T>(outcome: PhaseOutcome<T>): T | null {
  return outcome.status === "skipped" ? null : outcome.payload;
}

export function toPhaseResult<P extends PhaseId>(
  phaseId: P,
  startedAt: string,
  durationMs: number,
  outcome: PhaseOutcome<PhasePayloads[P]>,
): PhaseResult<P> {
  const result: PhaseResult<P> = { ...outcome, phaseId, startedAt, durationMs };
  Object.freeze(result);
  return result;
}
