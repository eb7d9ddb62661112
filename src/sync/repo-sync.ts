import { stat } from "node:fs/promises";
import type { PhaseRunner } from "../orchestrator/context.ts";
import { errorMessage } from "../state/errors.ts";
import { runCommand } from "../system/command.ts";
import type { SyncPayload } from "../types/phase.ts";
import { okOrWarn, skipped } from "../types/phase.ts";

// ── Git Client ──────────────────────────────────────────────────────────────

export type GitStatusResult =
  | { readonly kind: "ok"; readonly output: string }
  | { readonly kind: "unavailable"; readonly reason: string };

export interface GitClient {
  /** `git status --porcelain=v1 --branch` for `repoDir`. Never fetches. */
  status(repoDir: string, signal: AbortSignal): Promise<GitStatusResult>;
}

export class CliGitClient implements GitClient {
  constructor(private readonly timeoutMs: number = 10_000) {}

  async status(repoDir: string, signal: AbortSignal): Promise<GitStatusResult> {
    // spawn reports a missing cwd as a missing executable, so check it first
    try {
      if (!(await stat(repoDir)).isDirectory()) {
        return { kind: "unavailable", reason: `${repoDir} is not a directory` };
      }
    } catch (err) {
      return { kind: "unavailable", reason: `cannot access ${repoDir}: ${errorMessage(err)}` };
    }

    const result = await runCommand("git", ["status", "--porcelain=v1", "--branch"], {
      cwd: repoDir,
      timeoutMs: this.timeoutMs,
      signal,
    });

    if (result.spawnError) {
      return {
        kind: "unavailable",
        reason:
          result.spawnError.code === "ENOENT" && result.spawnError.path === "git"
            ? "git is not installed"
            : result.spawnError.message,
      };
    }
    if (result.exitCode !== 0) {
      return {
        kind: "unavailable",
        reason: result.stderr.trim() || `git exited with ${result.exitCode ?? "a signal"}`,
      };
    }
    return { kind: "ok", output: result.stdout };
  }
}

// ── Porcelain Parsing ───────────────────────────────────────────────────────

export interface RepoStatus {
  readonly branch: string | null;
  readonly upstream: string | null;
  readonly ahead: number;
  readonly behind: number;
  readonly dirtyFiles: number;
}

const BRANCH_LINE =
  /^## (?:No commits yet on |Initial commit on )?(.+?)(?:\.\.\.(\S+))?(?: \[(.+)\])?$/;

function parseDivergence(bracket: string | undefined): { ahead: number; behind: number } {
  const ahead = bracket?.match(/ahead (\d+)/)?.[1];
  const behind = bracket?.match(/behind (\d+)/)?.[1];
  return {
    ahead: ahead ? Number.parseInt(ahead, 10) : 0,
    behind: behind ? Number.parseInt(behind, 10) : 0,
  };
}

export function parsePorcelainStatus(output: string): RepoStatus {
  const lines = output.split("\n").filter((line) => line.length > 0);
  const header = lines[0]?.startsWith("## ") ? lines[0] : undefined;
  const dirtyFiles = lines.filter((line) => !line.startsWith("## ")).length;

  if (header === undefined) {
    return { branch: null, upstream: null, ahead: 0, behind: 0, dirtyFiles };
  }

  const match = header.match(BRANCH_LINE);
  const name = match?.[1] ?? null;
  const detached = name === null || name.startsWith("HEAD (");

  return {
    branch: detached ? null : name,
    upstream: match?.[2] ?? null,
    ...parseDivergence(match?.[3]),
    dirtyFiles,
  };
}

// ── Phase ───────────────────────────────────────────────────────────────────

export interface SyncPhaseOptions {
  readonly repoDir: string | null;
  readonly git: GitClient;
}

export function createSyncPhase(options: SyncPhaseOptions): PhaseRunner<"sync"> {
  return async (ctx) => {
    const { repoDir } = options;
    if (repoDir === null) {
      return skipped("not_configured", ["no repository configured"]);
    }

    const status = await options.git.status(repoDir, ctx.signal);
    if (status.kind === "unavailable") {
      ctx.logger.debug("Repository status unavailable", { repoDir, reason: status.reason });
      return skipped("unavailable", [status.reason]);
    }

    const parsed = parsePorcelainStatus(status.output);
    const payload: SyncPayload = { repoDir, ...parsed };

    const details: string[] = [
      `branch ${payload.branch ?? "(detached)"}${payload.upstream ? ` tracking ${payload.upstream}` : ""}`,
    ];
    if (payload.ahead > 0) details.push(`${payload.ahead} commit(s) not pushed`);
    if (payload.behind > 0) details.push(`${payload.behind} commit(s) not pulled`);
    if (payload.dirtyFiles > 0) details.push(`${payload.dirtyFiles} uncommitted file(s)`);

    ctx.logger.info("Repository status read", {
      branch: payload.branch,
      ahead: payload.ahead,
      behind: payload.behind,
      dirtyFiles: payload.dirtyFiles,
    });

    return okOrWarn(
      payload,
      payload.dirtyFiles > 0 || payload.ahead > 0 || payload.behind > 0,
      details,
    );
  };
}
