import { describe, expect, it } from "vitest";
import { runCommand, runShell } from "../command.ts";

describe("runCommand", () => {
  it("collects stdout and the exit code", async () => {
    const result = await runShell("printf 'hello'; exit 3", { timeoutMs: 5_000 });
    expect(result.stdout).toBe("hello");
    expect(result.exitCode).toBe(3);
    expect(result.exitSignal).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.spawnError).toBeUndefined();
  });

  it("collects stderr", async () => {
    const result = await runShell("echo oops >&2", { timeoutMs: 5_000 });
    expect(result.stderr).toBe("oops\n");
    expect(result.exitCode).toBe(0);
  });

  it("reports a missing executable as a spawn error", async () => {
    const result = await runCommand("wake-check-no-such-binary", [], { timeoutMs: 5_000 });
    expect(result.exitCode).toBeNull();
    expect(result.spawnError?.code).toBe("ENOENT");
  });

  it("kills a command that outlives its timeout", async () => {
    const result = await runCommand("sleep", ["5"], { timeoutMs: 100 });
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.exitSignal).toBe("SIGTERM");
  });

  it("reports the signal that terminated a command", async () => {
    const result = await runShell("kill -TERM $$", { timeoutMs: 5_000 });
    expect(result.timedOut).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.exitSignal).toBe("SIGTERM");
  });

  it("runs in the given working directory", async () => {
    const result = await runCommand("pwd", [], { timeoutMs: 5_000, cwd: "/" });
    expect(result.stdout).toBe("/\n");
  });
});
