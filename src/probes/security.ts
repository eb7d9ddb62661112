import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import type { PhaseRunner } from "../orchestrator/context.ts";
import { throwIfAborted } from "../orchestrator/context.ts";
import { errorMessage, isErrnoException } from "../state/errors.ts";
import type {
  SecretFinding,
  SecurityPayload,
  SensitiveFileFinding,
} from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";
import { matchesGlob } from "./glob.ts";

// ── Pattern Set ─────────────────────────────────────────────────────────────

export interface SecretPattern {
  readonly name: string;
  readonly regex: RegExp;
}

export interface SecurityPatterns {
  readonly maxDepth: number;
  readonly maxMatchesPerPattern: number;
  readonly maxFileBytes: number;
  readonly sensitiveFiles: readonly string[];
  readonly secretPatterns: readonly SecretPattern[];
  readonly configExtensions: readonly string[];
  readonly ignoreDirs: readonly string[];
}

export const DEFAULT_PATTERNS_FILE = fileURLToPath(
  new URL("../../config/security-patterns.yaml", import.meta.url),
);

export const SENSITIVE_FILE_PENALTY = 10;
export const SECRET_PATTERN_PENALTY = 15;

// ── Errors ──────────────────────────────────────────────────────────────────

export class SecurityPatternError extends Error {
  constructor(
    message: string,
    public readonly errors: readonly string[],
  ) {
    super(message);
    this.name = "SecurityPatternError";
  }
}

// ── Loading ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(raw: unknown, key: string, errors: string[]): string[] {
  if (raw === undefined) return [];
  const items: unknown[] = Array.isArray(raw) ? raw : [];
  const strings = items.filter((item): item is string => typeof item === "string");
  if (!Array.isArray(raw) || strings.length !== items.length) {
    errors.push(`'${key}' must be a list of strings`);
    return [];
  }
  return strings;
}

function positiveInt(raw: unknown, key: string, fallback: number, errors: string[]): number {
  if (raw === undefined) return fallback;
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 1) {
    errors.push(`'${key}' must be a positive integer`);
    return fallback;
  }
  return raw;
}

/**
 * Validate a parsed pattern document. Regexes are compiled here so a bad
 * expression is reported once instead of on every file.
 */
export function parseSecurityPatterns(raw: unknown): SecurityPatterns {
  if (!isRecord(raw)) {
    throw new SecurityPatternError("Invalid pattern file: expected an object at root", [
      "Root must be an object",
    ]);
  }

  const errors: string[] = [];
  const secretPatterns: SecretPattern[] = [];

  const rawSecrets = raw["secretPatterns"] ?? [];
  if (!Array.isArray(rawSecrets)) {
    errors.push("'secretPatterns' must be a list");
  } else {
    rawSecrets.forEach((entry: unknown, i) => {
      if (!isRecord(entry) || typeof entry["name"] !== "string" || typeof entry["regex"] !== "string") {
        errors.push(`secretPatterns[${i}] needs string 'name' and 'regex'`);
        return;
      }
      const flags = typeof entry["flags"] === "string" ? entry["flags"].replace(/[gy]/g, "") : "";
      try {
        secretPatterns.push({ name: entry["name"], regex: new RegExp(entry["regex"], flags) });
      } catch (err) {
        errors.push(`secretPatterns[${i}] (${entry["name"]}): ${errorMessage(err)}`);
      }
    });
  }

  const patterns: SecurityPatterns = {
    maxDepth: positiveInt(raw["maxDepth"], "maxDepth", 4, errors),
    maxMatchesPerPattern: positiveInt(raw["maxMatchesPerPattern"], "maxMatchesPerPattern", 5, errors),
    maxFileBytes: positiveInt(raw["maxFileBytes"], "maxFileBytes", 256 * 1024, errors),
    sensitiveFiles: stringList(raw["sensitiveFiles"], "sensitiveFiles", errors),
    secretPatterns,
    configExtensions: stringList(raw["configExtensions"], "configExtensions", errors),
    ignoreDirs: stringList(raw["ignoreDirs"], "ignoreDirs", errors),
  };

  if (errors.length > 0) {
    throw new SecurityPatternError(
      `Invalid pattern file: ${errors.length} error(s)`,
      errors,
    );
  }
  return patterns;
}

export async function loadSecurityPatterns(
  filePath: string = DEFAULT_PATTERNS_FILE,
): Promise<SecurityPatterns> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    throw new SecurityPatternError(`Failed to read pattern file: ${filePath}`, [
      errorMessage(err),
    ]);
  }
  const raw: unknown = parseYaml(content);
  return parseSecurityPatterns(raw);
}

// ── Scoring ─────────────────────────────────────────────────────────────────

/** 100 minus a fixed penalty per pattern with at least one hit, floored at 0. */
export function securityScore(
  sensitivePatternsHit: number,
  secretPatternsHit: number,
): number {
  const score =
    100 -
    sensitivePatternsHit * SENSITIVE_FILE_PENALTY -
    secretPatternsHit * SECRET_PATTERN_PENALTY;
  return Math.max(0, score);
}

// ── Scan ────────────────────────────────────────────────────────────────────

interface ScanState {
  readonly patterns: SecurityPatterns;
  readonly signal: AbortSignal;
  readonly sensitive: Map<string, SensitiveFileFinding[]>;
  readonly secrets: Map<string, SecretFinding[]>;
  readonly warnings: string[];
  filesScanned: number;
}

function isConfigLike(fileName: string, extensions: readonly string[]): boolean {
  return extensions.includes(extname(fileName)) || extensions.includes(fileName);
}

function record<T>(bucket: Map<string, T[]>, key: string, item: T, limit: number): void {
  const list = bucket.get(key) ?? [];
  if (list.length < limit) {
    list.push(item);
    bucket.set(key, list);
  }
}

async function scanFileContents(state: ScanState, filePath: string): Promise<void> {
  const { patterns } = state;
  const info = await stat(filePath);
  if (info.size > patterns.maxFileBytes) return;

  const content = await readFile(filePath, "utf-8");
  state.filesScanned += 1;

  const lines = content.split(/\r?\n/);
  for (const pattern of patterns.secretPatterns) {
    for (let i = 0; i < lines.length; i++) {
      if ((state.secrets.get(pattern.name)?.length ?? 0) >= patterns.maxMatchesPerPattern) break;
      if (pattern.regex.test(lines[i] ?? "")) {
        record(
          state.secrets,
          pattern.name,
          { pattern: pattern.name, path: filePath, line: i + 1 },
          patterns.maxMatchesPerPattern,
        );
      }
    }
  }
}

async function walk(state: ScanState, dir: string, depth: number): Promise<void> {
  throwIfAborted(state.signal);

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    state.warnings.push(`Cannot read directory ${dir}: ${errorMessage(err)}`);
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (depth < state.patterns.maxDepth && !state.patterns.ignoreDirs.includes(entry.name)) {
        await walk(state, fullPath, depth + 1);
      }
      continue;
    }
    if (!entry.isFile()) continue;

    for (const glob of state.patterns.sensitiveFiles) {
      if (matchesGlob(entry.name, glob)) {
        record(
          state.sensitive,
          glob,
          { pattern: glob, path: fullPath },
          state.patterns.maxMatchesPerPattern,
        );
      }
    }

    if (isConfigLike(entry.name, state.patterns.configExtensions)) {
      try {
        await scanFileContents(state, fullPath);
      } catch (err) {
        state.warnings.push(`Cannot read file ${fullPath}: ${errorMessage(err)}`);
      }
    }
  }
}

/**
 * Walk every root looking for sensitive file names and secret markers in
 * small config-like files. Detection only; nothing is modified.
 */
export async function scanSecurity(
  roots: readonly string[],
  patterns: SecurityPatterns,
  signal: AbortSignal = new AbortController().signal,
): Promise<SecurityPayload> {
  const state: ScanState = {
    patterns,
    signal,
    sensitive: new Map(),
    secrets: new Map(),
    warnings: [],
    filesScanned: 0,
  };

  for (const root of roots) {
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        state.warnings.push(`Scan root is not a directory: ${root}`);
        continue;
      }
    } catch (err) {
      state.warnings.push(
        isErrnoException(err) && err.code === "ENOENT"
          ? `Scan root not found: ${root}`
          : `Cannot access scan root ${root}: ${errorMessage(err)}`,
      );
      continue;
    }
    await walk(state, root, 0);
  }

  const sensitiveFiles = [...state.sensitive.values()].flat();
  const exposedSecrets = [...state.secrets.values()].flat();

  return {
    score: securityScore(state.sensitive.size, state.secrets.size),
    filesScanned: state.filesScanned,
    sensitiveFiles,
    exposedSecrets,
    warnings: state.warnings,
  };
}

// ── Phase ───────────────────────────────────────────────────────────────────

export interface SecurityPhaseOptions {
  readonly roots: readonly string[];
  readonly patternsFile: string | null;
}

export function createSecurityPhase(options: SecurityPhaseOptions): PhaseRunner<"security"> {
  return async (ctx) => {
    const patterns = await loadSecurityPatterns(options.patternsFile ?? DEFAULT_PATTERNS_FILE);
    const payload = await scanSecurity(options.roots, patterns, ctx.signal);

    ctx.logger.info("Security scan complete", {
      score: payload.score,
      filesScanned: payload.filesScanned,
      sensitiveFiles: payload.sensitiveFiles.length,
      exposedSecrets: payload.exposedSecrets.length,
    });

    const details = [
      `score ${payload.score}/100`,
      ...payload.sensitiveFiles.map((f) => `sensitive file (${f.pattern}): ${basename(f.path)}`),
      ...payload.exposedSecrets.map((s) => `possible ${s.pattern} in ${s.path}:${s.line}`),
      ...payload.warnings,
    ];
    return okOrWarn(payload, payload.score < 100, details);
  };
}
