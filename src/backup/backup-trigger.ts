import type { Logger } from "../observability/logger.ts";
import { runShell } from "../system/command.ts";
import type { BackupTriggerResult } from "../types/backup.ts";

// ── Backup Trigger ──────────────────────────────────────────────────────────

/** Opaque "create a backup now" action. Only its own timeout stops it. */
export interface BackupTrigger {
  run(): Promise<BackupTriggerResult>;
}

export class CommandBackupTrigger implements BackupTrigger {
  constructor(
    private readonly command: string,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
  ) {}

  async run(): Promise<BackupTriggerResult> {
    this.logger.info("Running backup command", { command: this.command });
    const result = await runShell(this.command, { timeoutMs: this.timeoutMs });

    if (result.spawnError) {
      return {
        ok: false,
        exitCode: null,
        durationMs: result.durationMs,
        error: result.spawnError.message,
      };
    }
    if (result.timedOut) {
      return {
        ok: false,
        exitCode: result.exitCode,
        durationMs: result.durationMs,
        error: `timed out after ${this.timeoutMs}ms`,
      };
    }
    if (result.exitSignal !== null) {
      this.logger.warn("Backup command killed", { signal: result.exitSignal });
      return {
        ok: false,
        exitCode: null,
        durationMs: result.durationMs,
        error: `killed by ${result.exitSignal}`,
      };
    }

    const ok = result.exitCode === 0;
    if (!ok) {
      this.logger.warn("Backup command failed", {
        exitCode: result.exitCode,
        stderr: result.stderr.trim().slice(0, 500),
      });
    }
    return {
      ok,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      ...(ok ? {} : { error: result.stderr.trim() || `exit code ${result.exitCode ?? "unknown"}` }),
    };
  }
}
