// ── Backup Descriptor ────────────────────────────────────────────────────────

/**
 * Read-only snapshot of the most recent backup artifact, recomputed every run.
 */
export interface BackupDescriptor {
  readonly path: string;
  readonly createdAt: string;
  readonly sizeBytes: number;
  readonly structurallyComplete: boolean;
  readonly missingDirs: readonly string[];
  readonly unreadable: readonly string[];
}

// ── Trigger Result ───────────────────────────────────────────────────────────

export interface BackupTriggerResult {
  readonly ok: boolean;
  readonly exitCode: number | null;
  readonly durationMs: number;
  readonly error?: string;
}
