import type { PhaseRunner } from "../orchestrator/context.ts";
import { errorMessage } from "../state/errors.ts";
import type { RunningProcess, TasksPayload, UpcomingJob } from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";
import { nextCronMatch } from "./cron.ts";
import {
  describeActivity,
  matchWorkers,
  type ProcessLister,
} from "./process-lister.ts";
import { parseCrontab, type ScheduleSource, type ScheduledJob } from "./schedule-source.ts";

const HOUR_MS = 60 * 60 * 1000;

/** Jobs whose next run falls inside the window, soonest first. */
export function upcomingJobs(
  jobs: readonly ScheduledJob[],
  now: Date,
  lookaheadHours: number,
): UpcomingJob[] {
  const upcoming: UpcomingJob[] = [];
  for (const job of jobs) {
    const next = nextCronMatch(job.fields, now, lookaheadHours * HOUR_MS);
    if (next) {
      upcoming.push({
        name: job.name,
        schedule: job.schedule,
        command: job.command,
        nextRunAt: next.toISOString(),
      });
    }
  }
  return upcoming.sort((a, b) => a.nextRunAt.localeCompare(b.nextRunAt));
}

export interface TasksPhaseOptions {
  readonly processes: ProcessLister;
  readonly schedule: ScheduleSource;
  readonly patterns: readonly string[];
  readonly lookaheadHours: number;
  readonly selfPid?: number;
}

/** Observational only: lists matching workers and upcoming cron jobs. */
export function createTasksPhase(options: TasksPhaseOptions): PhaseRunner<"tasks"> {
  return async (ctx) => {
    const warnings: string[] = [];
    let running: RunningProcess[] = [];
    let upcoming: UpcomingJob[] = [];

    try {
      const processes = await options.processes.list(ctx.signal);
      running = matchWorkers(processes, options.patterns, [options.selfPid ?? process.pid]).map(
        (p) => ({
          pid: p.pid,
          uptimeSeconds: p.elapsedSeconds,
          command: p.command,
          activity: describeActivity(p.command),
        }),
      );
    } catch (err) {
      warnings.push(`process listing failed: ${errorMessage(err)}`);
    }

    try {
      const crontab = parseCrontab(await options.schedule.read(ctx.signal));
      warnings.push(...crontab.warnings);
      upcoming = upcomingJobs(crontab.jobs, ctx.now(), options.lookaheadHours);
    } catch (err) {
      warnings.push(`schedule read failed: ${errorMessage(err)}`);
    }

    const payload: TasksPayload = {
      running,
      upcoming,
      lookaheadHours: options.lookaheadHours,
      warnings,
    };

    ctx.logger.info("Tasks reported", {
      running: running.length,
      upcoming: upcoming.length,
      warnings: warnings.length,
    });

    const details = [
      ...running.map((p) => `running pid ${p.pid} (${p.activity ?? p.command})`),
      ...upcoming.map((j) => `next ${j.name} at ${j.nextRunAt}`),
      ...warnings,
    ];
    return okOrWarn(payload, warnings.length > 0, details);
  };
}
