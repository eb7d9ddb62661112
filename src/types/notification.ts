// ── Notification Types ───────────────────────────────────────────────────────

/**
 * Well-known message types. Producers may publish any other string; the bus
 * does not restrict types.
 */
export const KNOWN_NOTIFICATION_TYPES = [
  "orchestrator_ready",
  "backup_completed",
  "skill_installed",
  "task_finished",
  "alert",
] as const;

export type KnownNotificationType = (typeof KNOWN_NOTIFICATION_TYPES)[number];

// ── Notification Message ─────────────────────────────────────────────────────

export interface NotificationMessage {
  readonly id: string;
  readonly type: string;
  readonly from: string;
  readonly timestamp: string;
  readonly payload: Record<string, unknown>;
}

export interface NotificationInput {
  readonly type: string;
  readonly from: string;
  readonly payload?: Record<string, unknown>;
}
