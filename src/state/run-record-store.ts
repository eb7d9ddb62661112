import type { RunRecord } from "../types/run.ts";
import { readJsonFile, writeJsonAtomic } from "./atomic.ts";
import { StateStoreError } from "./errors.ts";
import { validateRunRecord } from "./validation.ts";

// ── RunRecordStore Interface ─────────────────────────────────────────────────

/**
 * Single-slot persisted value holding the last run. Last write wins.
 */
export interface RunRecordStore {
  load(): Promise<RunRecord | null>;
  save(record: RunRecord): Promise<void>;
}

// ── FileSystem Implementation ────────────────────────────────────────────────

export class FileRunRecordStore implements RunRecordStore {
  constructor(private readonly filePath: string) {}

  /**
   * Returns null when no run has been recorded yet.
   * Throws StateStoreError if the slot exists but cannot be read or parsed.
   */
  async load(): Promise<RunRecord | null> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (err) {
      if (err instanceof StateStoreError && err.code === "NOT_FOUND") return null;
      throw err;
    }
    validateRunRecord(raw);
    return raw;
  }

  async save(record: RunRecord): Promise<void> {
    validateRunRecord(record);
    await writeJsonAtomic(this.filePath, record);
  }
}

// ── In-Memory Implementation ─────────────────────────────────────────────────

export class InMemoryRunRecordStore implements RunRecordStore {
  private record: RunRecord | null;

  constructor(initial: RunRecord | null = null) {
    this.record = initial;
  }

  async load(): Promise<RunRecord | null> {
    return this.record;
  }

  async save(record: RunRecord): Promise<void> {
    validateRunRecord(record);
    this.record = record;
  }
}
