import { homedir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, ConfigError } from "../config.ts";

function baseEnv(
  overrides?: Record<string, string | undefined>,
): Record<string, string | undefined> {
  return {
    WAKE_STATE_DIR: "/tmp/wake-state",
    ...overrides,
  };
}

function configErrorField(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.field;
    throw err;
  }
  return null;
}

describe("loadConfig", () => {
  // ── Defaults ───────────────────────────────────────────────────────────

  it("derives directory defaults from the state root", () => {
    const config = loadConfig(baseEnv());

    expect(config.stateDir).toBe("/tmp/wake-state");
    expect(config.skills.rootDir).toBe("/tmp/wake-state/skills");
    expect(config.memoryDir).toBe("/tmp/wake-state/memory");
    expect(config.backup.rootDir).toBe("/tmp/wake-state/backups");
    expect(config.security.scanRoots).toEqual([
      "/tmp/wake-state/skills",
      "/tmp/wake-state/memory",
    ]);
  });

  it("applies numeric and list defaults", () => {
    const config = loadConfig(baseEnv());

    expect(config.health).toEqual({
      diskFloorGb: 10,
      memoryFloorGb: 2,
      probeHost: "1.1.1.1",
      probePort: 53,
      probeTimeoutMs: 3000,
    });
    expect(config.backup.maxAgeHours).toBe(24);
    expect(config.backup.requiredDirs).toEqual(["memories", "configs"]);
    expect(config.backup.command).toBeNull();
    expect(config.tasks.patterns).toEqual(["agent", "worker", "skill"]);
    expect(config.tasks.lookaheadHours).toBe(24);
    expect(config.notificationLimit).toBe(10);
    expect(config.writeReports).toBe(true);
    expect(config.phaseTimeoutMs).toBe(120_000);
    expect(config.quickBudgetMs).toBe(15_000);
    expect(config.concurrency).toBe(1);
    expect(config.skills.versionSourceUrl).toBeNull();
    expect(config.syncRepoDir).toBeNull();
    expect(config.logging).toEqual({ level: "info", format: "pretty" });
  });

  it("defaults the state root to ~/.wake-check and allows creating it", () => {
    const config = loadConfig({ WAKE_STATE_DIR: "" });
    expect(config.stateDir).toBe(join(homedir(), ".wake-check"));
    expect(config.createStateDir).toBe(true);
  });

  it("never creates an explicitly configured state root", () => {
    expect(loadConfig(baseEnv()).createStateDir).toBe(false);
  });

  it("expands a leading tilde in path variables", () => {
    const config = loadConfig(baseEnv({ WAKE_SKILLS_DIR: "~/agent/skills" }));
    expect(config.skills.rootDir).toBe(join(homedir(), "agent/skills"));
  });

  // ── Explicit values ────────────────────────────────────────────────────

  it("reads every explicit override", () => {
    const config = loadConfig(
      baseEnv({
        WAKE_SCAN_ROOTS: "/srv/a, /srv/b",
        WAKE_DOC_ONLY_SKILLS: "guide,handbook",
        WAKE_VERSION_SOURCE_URL: "https://versions.example.test/skills",
        WAKE_BACKUP_COMMAND: "make-backup --now",
        WAKE_BACKUP_REQUIRED_DIRS: "memories",
        WAKE_SYNC_REPO_DIR: "/srv/repo",
        WAKE_DISK_FLOOR_GB: "2.5",
        WAKE_WRITE_REPORTS: "false",
        WAKE_CONCURRENCY: "4",
        LOG_LEVEL: "debug",
        LOG_FORMAT: "json",
      }),
    );

    expect(config.security.scanRoots).toEqual(["/srv/a", "/srv/b"]);
    expect(config.skills.docOnly).toEqual(["guide", "handbook"]);
    expect(config.skills.versionSourceUrl).toBe("https://versions.example.test/skills");
    expect(config.backup.command).toBe("make-backup --now");
    expect(config.backup.requiredDirs).toEqual(["memories"]);
    expect(config.syncRepoDir).toBe("/srv/repo");
    expect(config.health.diskFloorGb).toBe(2.5);
    expect(config.writeReports).toBe(false);
    expect(config.concurrency).toBe(4);
    expect(config.logging).toEqual({ level: "debug", format: "json" });
  });

  // ── Validation ─────────────────────────────────────────────────────────

  it("rejects a non-integer probe port", () => {
    expect(configErrorField(() => loadConfig(baseEnv({ WAKE_PROBE_PORT: "dns" })))).toBe(
      "WAKE_PROBE_PORT",
    );
  });

  it("rejects a concurrency below one", () => {
    expect(() => loadConfig(baseEnv({ WAKE_CONCURRENCY: "0" }))).toThrow(ConfigError);
  });

  it("rejects a negative disk floor", () => {
    expect(configErrorField(() => loadConfig(baseEnv({ WAKE_DISK_FLOOR_GB: "-1" })))).toBe(
      "WAKE_DISK_FLOOR_GB",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig(baseEnv({ LOG_LEVEL: "verbose" }))).toThrow(
      'LOG_LEVEL must be one of: trace, debug, info, warn, error, fatal, silent. Got "verbose".',
    );
  });

  it("rejects an unparseable boolean", () => {
    expect(configErrorField(() => loadConfig(baseEnv({ WAKE_WRITE_REPORTS: "maybe" })))).toBe(
      "WAKE_WRITE_REPORTS",
    );
  });

  it("rejects a relative version source URL", () => {
    expect(
      configErrorField(() => loadConfig(baseEnv({ WAKE_VERSION_SOURCE_URL: "versions/skills" }))),
    ).toBe("WAKE_VERSION_SOURCE_URL");
  });

  // ── Immutability ───────────────────────────────────────────────────────

  it("returns a deeply frozen object", () => {
    const config = loadConfig(baseEnv());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.backup)).toBe(true);
    expect(Object.isFrozen(config.backup.requiredDirs)).toBe(true);
    expect(Object.isFrozen(config.logging)).toBe(true);
  });
});
