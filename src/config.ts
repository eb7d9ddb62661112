import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  readonly stateDir: string;
  /** True when WAKE_STATE_DIR is unset and the default root may be created. */
  readonly createStateDir: boolean;
  readonly skills: {
    readonly rootDir: string;
    readonly docOnly: readonly string[];
    readonly versionSourceUrl: string | null;
    readonly freshnessDelayMs: number;
    readonly freshnessTimeoutMs: number;
  };
  readonly health: {
    readonly diskFloorGb: number;
    readonly memoryFloorGb: number;
    readonly probeHost: string;
    readonly probePort: number;
    readonly probeTimeoutMs: number;
  };
  readonly security: {
    readonly scanRoots: readonly string[];
    readonly patternsFile: string | null;
  };
  readonly backup: {
    readonly rootDir: string;
    readonly maxAgeHours: number;
    readonly requiredDirs: readonly string[];
    readonly command: string | null;
    readonly commandTimeoutMs: number;
  };
  readonly memoryDir: string;
  readonly syncRepoDir: string | null;
  readonly tasks: {
    readonly patterns: readonly string[];
    readonly lookaheadHours: number;
  };
  readonly notificationLimit: number;
  readonly writeReports: boolean;
  readonly phaseTimeoutMs: number;
  readonly quickBudgetMs: number;
  readonly concurrency: number;
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Parsing Helpers ────────────────────────────────────────────────────────

type EnvReader = (key: string) => string | undefined;

function expandHome(value: string): string {
  if (value === "~") return homedir();
  if (value.startsWith("~/")) return join(homedir(), value.slice(2));
  return value;
}

function pathVar(env: EnvReader, key: string): string | null {
  const raw = env(key)?.trim();
  return raw ? resolve(process.cwd(), expandHome(raw)) : null;
}

function listVar(env: EnvReader, key: string): string[] | null {
  const raw = env(key);
  if (raw === undefined || raw.trim() === "") return null;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function stringVar(env: EnvReader, key: string): string | null {
  const raw = env(key)?.trim();
  return raw ? raw : null;
}

function numberVar(
  env: EnvReader,
  key: string,
  fallback: number,
  opts: { integer: boolean; min: number },
): number {
  const raw = env(key);
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = opts.integer ? Number.parseInt(raw, 10) : Number.parseFloat(raw);
  const wellFormed = opts.integer ? /^\s*\d+\s*$/.test(raw) : Number.isFinite(Number(raw));
  if (!wellFormed || !Number.isFinite(value) || value < opts.min) {
    const kind = opts.integer ? "an integer" : "a number";
    throw new ConfigError(
      `${key} must be ${kind} >= ${opts.min}, got "${raw}".`,
      key,
    );
  }
  return value;
}

function booleanVar(env: EnvReader, key: string, fallback: boolean): boolean {
  const raw = env(key)?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be true or false, got "${raw}".`, key);
}

function enumVar<T extends string>(
  env: EnvReader,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const raw = (env(key) || fallback).trim();
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new ConfigError(
      `${key} must be one of: ${allowed.join(", ")}. Got "${raw}".`,
      key,
    );
  }
  return match;
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Optional env-var-style overrides for testing.
 *   Keys are env var names (e.g. "WAKE_STATE_DIR"), values are strings.
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError if a value is present but invalid.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env: EnvReader = (key) =>
    envOverrides && key in envOverrides ? envOverrides[key] : process.env[key];

  // ── State root ─────────────────────────────────────────────────────────
  const configuredStateDir = pathVar(env, "WAKE_STATE_DIR");
  const stateDir = configuredStateDir ?? join(homedir(), ".wake-check");

  // ── Skills ─────────────────────────────────────────────────────────────
  const skillsDir = pathVar(env, "WAKE_SKILLS_DIR") ?? join(stateDir, "skills");
  const versionSourceUrl = stringVar(env, "WAKE_VERSION_SOURCE_URL");
  if (versionSourceUrl !== null && !URL.canParse(versionSourceUrl)) {
    throw new ConfigError(
      `WAKE_VERSION_SOURCE_URL must be an absolute URL, got "${versionSourceUrl}".`,
      "WAKE_VERSION_SOURCE_URL",
    );
  }

  // ── Memory / backup ────────────────────────────────────────────────────
  const memoryDir = pathVar(env, "WAKE_MEMORY_DIR") ?? join(stateDir, "memory");
  const backupDir = pathVar(env, "WAKE_BACKUP_DIR") ?? join(stateDir, "backups");

  // ── Security ───────────────────────────────────────────────────────────
  const scanRoots = (listVar(env, "WAKE_SCAN_ROOTS") ?? [skillsDir, memoryDir]).map(
    (root) => resolve(process.cwd(), expandHome(root)),
  );

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevel = enumVar(env, "LOG_LEVEL", LOG_LEVELS, "info");
  const logFormat = enumVar(env, "LOG_FORMAT", LOG_FORMATS, "pretty");

  // ── Build and freeze ──────────────────────────────────────────────────
  const config: RuntimeConfig = {
    stateDir,
    createStateDir: configuredStateDir === null,
    skills: {
      rootDir: skillsDir,
      docOnly: listVar(env, "WAKE_DOC_ONLY_SKILLS") ?? [],
      versionSourceUrl,
      freshnessDelayMs: numberVar(env, "WAKE_FRESHNESS_DELAY_MS", 250, { integer: true, min: 0 }),
      freshnessTimeoutMs: numberVar(env, "WAKE_FRESHNESS_TIMEOUT_MS", 5_000, { integer: true, min: 1 }),
    },
    health: {
      diskFloorGb: numberVar(env, "WAKE_DISK_FLOOR_GB", 10, { integer: false, min: 0 }),
      memoryFloorGb: numberVar(env, "WAKE_MEMORY_FLOOR_GB", 2, { integer: false, min: 0 }),
      probeHost: stringVar(env, "WAKE_PROBE_HOST") ?? "1.1.1.1",
      probePort: numberVar(env, "WAKE_PROBE_PORT", 53, { integer: true, min: 1 }),
      probeTimeoutMs: numberVar(env, "WAKE_PROBE_TIMEOUT_MS", 3_000, { integer: true, min: 1 }),
    },
    security: {
      scanRoots,
      patternsFile: pathVar(env, "WAKE_SECURITY_PATTERNS_FILE"),
    },
    backup: {
      rootDir: backupDir,
      maxAgeHours: numberVar(env, "WAKE_BACKUP_MAX_AGE_HOURS", 24, { integer: false, min: 0 }),
      requiredDirs: listVar(env, "WAKE_BACKUP_REQUIRED_DIRS") ?? ["memories", "configs"],
      command: stringVar(env, "WAKE_BACKUP_COMMAND"),
      commandTimeoutMs: numberVar(env, "WAKE_BACKUP_COMMAND_TIMEOUT_MS", 300_000, { integer: true, min: 1 }),
    },
    memoryDir,
    syncRepoDir: pathVar(env, "WAKE_SYNC_REPO_DIR"),
    tasks: {
      patterns: listVar(env, "WAKE_TASK_PATTERNS") ?? ["agent", "worker", "skill"],
      lookaheadHours: numberVar(env, "WAKE_TASK_LOOKAHEAD_HOURS", 24, { integer: false, min: 0 }),
    },
    notificationLimit: numberVar(env, "WAKE_NOTIFICATION_LIMIT", 10, { integer: true, min: 0 }),
    writeReports: booleanVar(env, "WAKE_WRITE_REPORTS", true),
    phaseTimeoutMs: numberVar(env, "WAKE_PHASE_TIMEOUT_MS", 120_000, { integer: true, min: 1 }),
    quickBudgetMs: numberVar(env, "WAKE_QUICK_BUDGET_MS", 15_000, { integer: true, min: 1 }),
    concurrency: numberVar(env, "WAKE_CONCURRENCY", 1, { integer: true, min: 1 }),
    logging: {
      level: logLevel,
      format: logFormat,
    },
  };

  return Object.freeze({
    ...config,
    skills: Object.freeze({ ...config.skills, docOnly: Object.freeze([...config.skills.docOnly]) }),
    health: Object.freeze(config.health),
    security: Object.freeze({ ...config.security, scanRoots: Object.freeze([...config.security.scanRoots]) }),
    backup: Object.freeze({ ...config.backup, requiredDirs: Object.freeze([...config.backup.requiredDirs]) }),
    tasks: Object.freeze({ ...config.tasks, patterns: Object.freeze([...config.tasks.patterns]) }),
    logging: Object.freeze(config.logging),
  });
}
