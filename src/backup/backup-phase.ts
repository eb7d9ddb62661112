import type { PhaseRunner } from "../orchestrator/context.ts";
import type { BackupPayload } from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";
import type { BackupTrigger } from "./backup-trigger.ts";
import { verifyBackup } from "./backup-verifier.ts";

export interface BackupPhaseOptions {
  readonly rootDir: string;
  readonly maxAgeHours: number;
  readonly requiredDirs: readonly string[];
  readonly trigger: BackupTrigger | null;
}

/**
 * Verify the latest backup. In normal mode a stale, missing or incomplete
 * backup fires the trigger once, then the backup root is verified again.
 */
export function createBackupPhase(options: BackupPhaseOptions): PhaseRunner<"backup"> {
  return async (ctx) => {
    const verifyOptions = {
      rootDir: options.rootDir,
      maxAgeHours: options.maxAgeHours,
      requiredDirs: options.requiredDirs,
    };

    let verification = await verifyBackup({ ...verifyOptions, now: ctx.now() });
    const details = [...verification.problems];
    let trigger: BackupPayload["trigger"] = null;

    if (!verification.valid && options.trigger && ctx.mode === "normal") {
      trigger = await options.trigger.run();
      details.push(
        trigger.ok
          ? `backup command finished in ${trigger.durationMs}ms`
          : `backup command failed: ${trigger.error ?? "unknown error"}`,
      );
      if (trigger.ok) {
        verification = await verifyBackup({ ...verifyOptions, now: ctx.now() });
        details.push(...verification.problems.map((p) => `after backup: ${p}`));
      }
    } else if (!verification.valid && options.trigger) {
      details.push("backup command not run in quick mode");
    }

    const payload: BackupPayload = {
      backupRoot: options.rootDir,
      needsBackup: verification.needsBackup,
      valid: verification.valid,
      ageHours: verification.ageHours,
      descriptor: verification.descriptor,
      trigger,
    };

    ctx.logger.info("Backup verified", {
      valid: payload.valid,
      ageHours: payload.ageHours,
      triggered: trigger !== null,
    });

    if (verification.valid && verification.descriptor) {
      details.unshift(`latest backup ${verification.descriptor.path} (${payload.ageHours ?? 0}h old)`);
    }
    return okOrWarn(payload, !payload.valid, details);
  };
}
