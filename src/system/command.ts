import { spawn } from "node:child_process";

// ── Command Runner ──────────────────────────────────────────────────────────

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  /** null when the process never started or was killed by a signal. */
  readonly exitCode: number | null;
  /** Signal that terminated the process, if any. */
  readonly exitSignal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  readonly durationMs: number;
  /** Set when the executable could not be spawned (e.g. ENOENT). */
  readonly spawnError?: NodeJS.ErrnoException;
}

export interface CommandOptions {
  readonly timeoutMs: number;
  readonly cwd?: string;
  readonly signal?: AbortSignal;
}

const MAX_OUTPUT = 1024 * 1024;

function append(buffer: string, chunk: Buffer): string {
  return buffer.length >= MAX_OUTPUT ? buffer : (buffer + chunk.toString()).slice(0, MAX_OUTPUT);
}

/**
 * Run an executable without a shell and collect its output. Never rejects:
 * spawn failures, timeouts and aborts are reported on the result.
 */
export function runCommand(
  file: string,
  args: readonly string[],
  options: CommandOptions,
): Promise<CommandResult> {
  const started = performance.now();

  return new Promise<CommandResult>((resolve) => {
    const child = spawn(file, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const kill = (): void => {
      child.kill("SIGTERM");
      setTimeout(() => {
        if (child.exitCode === null) child.kill("SIGKILL");
      }, 3_000).unref();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, options.timeoutMs);

    const onAbort = (): void => kill();
    if (options.signal?.aborted) {
      kill();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const settle = (
      exitCode: number | null,
      exitSignal: NodeJS.Signals | null,
      spawnError?: NodeJS.ErrnoException,
    ): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve({
        stdout,
        stderr,
        exitCode,
        exitSignal,
        timedOut,
        durationMs: Math.round(performance.now() - started),
        ...(spawnError ? { spawnError } : {}),
      });
    };

    child.stdout.on("data", (chunk: Buffer) => {
      stdout = append(stdout, chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = append(stderr, chunk);
    });

    child.on("error", (err: NodeJS.ErrnoException) => settle(null, null, err));
    child.on("close", (code, exitSignal) => settle(code, exitSignal));
  });
}

/** Run a command line through `/bin/sh -c`. */
export function runShell(commandLine: string, options: CommandOptions): Promise<CommandResult> {
  return runCommand("/bin/sh", ["-c", commandLine], options);
}
