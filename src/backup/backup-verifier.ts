import type { Dirent, Stats } from "node:fs";
import { lstat, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { isErrnoException } from "../state/errors.ts";
import type { BackupDescriptor } from "../types/backup.ts";

const HOUR_MS = 60 * 60 * 1000;

// ── Discovery ───────────────────────────────────────────────────────────────

export interface BackupCandidate {
  readonly path: string;
  readonly createdAt: Date;
}

/** Birth time where the filesystem records one, modification time otherwise. */
export function creationTime(info: Stats): Date {
  return info.birthtimeMs > 0 ? info.birthtime : info.mtime;
}

/**
 * Most recently created directory directly under `rootDir`. Dot entries and
 * the conventional `latest` pointer are ignored.
 *
 * @returns null when the root is missing or holds no backups.
 */
export async function findLatestBackup(rootDir: string): Promise<BackupCandidate | null> {
  let entries: Dirent[];
  try {
    entries = await readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }

  let latest: BackupCandidate | null = null;
  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name.startsWith(".") || entry.name === "latest") {
      continue;
    }
    const path = join(rootDir, entry.name);
    const createdAt = creationTime(await stat(path));
    if (latest === null || createdAt > latest.createdAt) {
      latest = { path, createdAt };
    }
  }
  return latest;
}

// ── Inspection ──────────────────────────────────────────────────────────────

export interface SizeScan {
  readonly sizeBytes: number;
  /** Paths below the directory that could not be read. */
  readonly unreadable: readonly string[];
}

/**
 * Total size of regular files below `dir`. Symlinks are not followed. An
 * entry that cannot be read is listed instead of failing the whole walk.
 */
export async function scanDirectorySize(dir: string): Promise<SizeScan> {
  const unreadable: string[] = [];

  const walk = async (current: string): Promise<number> => {
    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return 0;
      unreadable.push(current);
      return 0;
    }

    let total = 0;
    for (const entry of entries) {
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        total += await walk(full);
      } else if (entry.isFile()) {
        try {
          total += (await lstat(full)).size;
        } catch {
          unreadable.push(full);
        }
      }
    }
    return total;
  };

  const sizeBytes = await walk(dir);
  return { sizeBytes, unreadable };
}

async function missingDirectories(
  backupDir: string,
  requiredDirs: readonly string[],
): Promise<string[]> {
  const missing: string[] = [];
  for (const name of requiredDirs) {
    try {
      const info = await stat(join(backupDir, name));
      if (!info.isDirectory()) missing.push(name);
    } catch {
      missing.push(name);
    }
  }
  return missing;
}

export async function describeBackup(
  candidate: BackupCandidate,
  requiredDirs: readonly string[],
): Promise<BackupDescriptor> {
  const missingDirs = await missingDirectories(candidate.path, requiredDirs);
  const size = await scanDirectorySize(candidate.path);
  return {
    path: candidate.path,
    createdAt: candidate.createdAt.toISOString(),
    sizeBytes: size.sizeBytes,
    structurallyComplete: missingDirs.length === 0,
    missingDirs,
    unreadable: size.unreadable,
  };
}

// ── Verification ────────────────────────────────────────────────────────────

export interface BackupVerification {
  readonly descriptor: BackupDescriptor | null;
  readonly ageHours: number | null;
  readonly valid: boolean;
  readonly needsBackup: boolean;
  readonly problems: readonly string[];
}

export interface VerifyOptions {
  readonly rootDir: string;
  readonly maxAgeHours: number;
  readonly requiredDirs: readonly string[];
  readonly now: Date;
}

/**
 * Valid means younger than the age threshold, non-empty and structurally
 * complete. A missing backup is reported, not thrown.
 */
export async function verifyBackup(options: VerifyOptions): Promise<BackupVerification> {
  const candidate = await findLatestBackup(options.rootDir);
  if (candidate === null) {
    return {
      descriptor: null,
      ageHours: null,
      valid: false,
      needsBackup: true,
      problems: [`no backup found in ${options.rootDir}`],
    };
  }

  const descriptor = await describeBackup(candidate, options.requiredDirs);
  const rawAgeHours = (options.now.getTime() - candidate.createdAt.getTime()) / HOUR_MS;
  const ageHours = Math.round(rawAgeHours * 10) / 10;

  const problems: string[] = [];
  if (rawAgeHours >= options.maxAgeHours) {
    problems.push(`latest backup is ${ageHours}h old (limit ${options.maxAgeHours}h)`);
  }
  if (descriptor.sizeBytes === 0) {
    problems.push("latest backup is empty");
  }
  if (!descriptor.structurallyComplete) {
    problems.push(`latest backup is missing: ${descriptor.missingDirs.join(", ")}`);
  }
  if (descriptor.unreadable.length > 0) {
    problems.push(`latest backup has unreadable entries: ${descriptor.unreadable.join(", ")}`);
  }

  const valid = problems.length === 0;
  return { descriptor, ageHours, valid, needsBackup: !valid, problems };
}
