import { basename } from "node:path";
import { runCommand } from "../system/command.ts";
import { CronParseError, parseCron, type CronFields } from "./cron.ts";

// ── Schedule Source ─────────────────────────────────────────────────────────

export interface ScheduleSource {
  /** Raw crontab text; an empty string when the user has none. */
  read(signal: AbortSignal): Promise<string>;
}

export class ScheduleReadError extends Error {
  override readonly name = "ScheduleReadError";
}

export class CrontabScheduleSource implements ScheduleSource {
  constructor(private readonly timeoutMs: number = 10_000) {}

  async read(signal: AbortSignal): Promise<string> {
    const result = await runCommand("crontab", ["-l"], { timeoutMs: this.timeoutMs, signal });

    if (result.spawnError) {
      if (result.spawnError.code === "ENOENT") return "";
      throw new ScheduleReadError(`crontab unavailable: ${result.spawnError.message}`);
    }
    if (result.exitCode !== 0) {
      if (/no crontab/i.test(result.stderr)) return "";
      throw new ScheduleReadError(
        `crontab -l exited with ${result.exitCode ?? "a signal"}: ${result.stderr.trim()}`,
      );
    }
    return result.stdout;
  }
}

// ── Crontab Parsing ─────────────────────────────────────────────────────────

export interface ScheduledJob {
  readonly name: string;
  readonly schedule: string;
  readonly command: string;
  readonly fields: CronFields;
}

export interface ParsedCrontab {
  readonly jobs: readonly ScheduledJob[];
  readonly warnings: readonly string[];
}

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*\s*=/;

/** Short label for a job: the script it runs, else the first word. */
export function jobName(command: string): string {
  const words = command.split(/\s+/).filter((w) => w.length > 0 && !w.includes("="));
  const script = words.find((w) => /\.(?:py|ts|js|mjs|sh)$/.test(w));
  return basename(script ?? words[0] ?? command);
}

export function parseCrontab(text: string): ParsedCrontab {
  const jobs: ScheduledJob[] = [];
  const warnings: string[] = [];

  text.split("\n").forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith("#") || ENV_ASSIGNMENT.test(line)) return;
    if (/^@reboot\s/i.test(line)) return;

    const parts = line.split(/\s+/);
    const fieldCount = line.startsWith("@") ? 1 : 5;
    const schedule = parts.slice(0, fieldCount).join(" ");
    const command = parts.slice(fieldCount).join(" ");

    if (!command) {
      warnings.push(`crontab line ${index + 1}: missing command`);
      return;
    }

    try {
      jobs.push({ name: jobName(command), schedule, command, fields: parseCron(schedule) });
    } catch (err) {
      if (!(err instanceof CronParseError)) throw err;
      warnings.push(`crontab line ${index + 1}: ${err.message}`);
    }
  });

  return { jobs, warnings };
}
