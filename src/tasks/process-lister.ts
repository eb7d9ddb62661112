import { basename } from "node:path";
import { runCommand } from "../system/command.ts";

// ── Process Listing ─────────────────────────────────────────────────────────

export interface ProcessInfo {
  readonly pid: number;
  readonly elapsedSeconds: number;
  readonly command: string;
}

export interface ProcessLister {
  list(signal: AbortSignal): Promise<ProcessInfo[]>;
}

export class ProcessListError extends Error {
  override readonly name = "ProcessListError";
}

/** Parse `ps` elapsed time: `[[dd-]hh:]mm:ss`. */
export function parseElapsed(raw: string): number | null {
  const match = raw.trim().match(/^(?:(?:(\d+)-)?(\d+):)?(\d+):(\d+)$/);
  if (!match) return null;
  const [, days = "0", hours = "0", minutes = "0", seconds = "0"] = match;
  return (
    Number.parseInt(days, 10) * 86_400 +
    Number.parseInt(hours, 10) * 3_600 +
    Number.parseInt(minutes, 10) * 60 +
    Number.parseInt(seconds, 10)
  );
}

export function parsePsOutput(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split("\n")) {
    const match = line.trim().match(/^(\d+)\s+(\S+)\s+(.+)$/);
    if (!match) continue;
    const [, pid = "", elapsed = "", command = ""] = match;
    const elapsedSeconds = parseElapsed(elapsed);
    if (elapsedSeconds === null) continue;
    processes.push({ pid: Number.parseInt(pid, 10), elapsedSeconds, command });
  }
  return processes;
}

/** `ps -eo pid=,etime=,args=`; `etime` is understood by both procps and BSD ps. */
export class PsProcessLister implements ProcessLister {
  constructor(private readonly timeoutMs: number = 10_000) {}

  async list(signal: AbortSignal): Promise<ProcessInfo[]> {
    const result = await runCommand("ps", ["-eo", "pid=,etime=,args="], {
      timeoutMs: this.timeoutMs,
      signal,
    });
    if (result.spawnError) {
      throw new ProcessListError(`ps unavailable: ${result.spawnError.message}`);
    }
    if (result.exitCode !== 0) {
      throw new ProcessListError(
        `ps exited with ${result.exitCode ?? "a signal"}: ${result.stderr.trim()}`,
      );
    }
    return parsePsOutput(result.stdout);
  }
}

// ── Matching ────────────────────────────────────────────────────────────────

const SCRIPT_ARG = /\.(?:py|ts|js|mjs|sh)$/;

/** Best-effort description: the script a runtime is executing, if any. */
export function describeActivity(command: string): string | null {
  const script = command.split(/\s+/).slice(1).find((arg) => SCRIPT_ARG.test(arg));
  return script ? basename(script) : null;
}

export function matchWorkers(
  processes: readonly ProcessInfo[],
  patterns: readonly string[],
  excludePids: readonly number[] = [],
): ProcessInfo[] {
  const needles = patterns.map((p) => p.toLowerCase()).filter((p) => p.length > 0);
  return processes.filter(
    (p) =>
      !excludePids.includes(p.pid) &&
      needles.some((needle) => p.command.toLowerCase().includes(needle)),
  );
}
