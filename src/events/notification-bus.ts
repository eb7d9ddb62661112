import { mkdir, readdir, rename, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import { TEMP_PREFIX, readJsonFile, writeJsonAtomic } from "../state/atomic.ts";
import { StateStoreError, errorMessage, isErrnoException } from "../state/errors.ts";
import { generateMessageId } from "../state/id.ts";
import { validateNotificationMessage } from "../state/validation.ts";
import type { NotificationInput, NotificationMessage } from "../types/notification.ts";

// ── Bus Interface ───────────────────────────────────────────────────────────

export interface DrainResult {
  /** Most recent messages first, at most `limit`. */
  readonly messages: readonly NotificationMessage[];
  /** Every well-formed message currently in the inbox. */
  readonly totalCount: number;
  /** File names that could not be parsed or validated. */
  readonly malformed: readonly string[];
}

/**
 * Append-only inbox shared between local agents. Draining never consumes:
 * only `archive` moves messages out.
 */
export interface NotificationBus {
  publish(input: NotificationInput): Promise<string>;
  /** `exclude` drops messages before they are counted or limited. */
  drain(limit: number, exclude?: (message: NotificationMessage) => boolean): Promise<DrainResult>;
  archive(olderThan: Date): Promise<number>;
}

export interface FileNotificationBusDeps {
  readonly logger?: Logger;
  readonly now?: () => Date;
}

// ── File-backed Bus ─────────────────────────────────────────────────────────

interface InboxEntry {
  readonly fileName: string;
  readonly message: NotificationMessage | null;
}

export class FileNotificationBus implements NotificationBus {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly inboxDir: string,
    private readonly archiveDir: string,
    deps: FileNotificationBusDeps = {},
  ) {
    this.logger = deps.logger ?? NULL_LOGGER;
    this.now = deps.now ?? (() => new Date());
  }

  async publish(input: NotificationInput): Promise<string> {
    if (!input.type.trim()) {
      throw new StateStoreError("Notification type must be a non-empty string", "VALIDATION_ERROR");
    }
    if (!input.from.trim()) {
      throw new StateStoreError("Notification sender must be a non-empty string", "VALIDATION_ERROR");
    }

    const timestamp = this.now();
    const message: NotificationMessage = {
      id: generateMessageId(timestamp),
      type: input.type,
      from: input.from,
      timestamp: timestamp.toISOString(),
      payload: input.payload ?? {},
    };

    await writeJsonAtomic(join(this.inboxDir, `${message.id}.json`), message);
    this.logger.debug("Notification published", { id: message.id, type: message.type });
    return message.id;
  }

  async drain(
    limit: number,
    exclude: (message: NotificationMessage) => boolean = () => false,
  ): Promise<DrainResult> {
    const entries = await this.readInbox();
    const valid: NotificationMessage[] = [];
    const malformed: string[] = [];

    for (const entry of entries) {
      if (entry.message === null) malformed.push(entry.fileName);
      else if (!exclude(entry.message)) valid.push(entry.message);
    }

    return {
      messages: valid.slice(0, Math.max(0, limit)),
      totalCount: valid.length,
      malformed,
    };
  }

  async archive(olderThan: Date): Promise<number> {
    const entries = await this.readInbox();
    let moved = 0;

    for (const entry of entries) {
      const source = join(this.inboxDir, entry.fileName);
      const createdAt = entry.message
        ? new Date(entry.message.timestamp)
        : (await stat(source)).mtime;
      if (createdAt >= olderThan) continue;

      await mkdir(this.archiveDir, { recursive: true });
      await rename(source, join(this.archiveDir, entry.fileName));
      moved += 1;
    }

    if (moved > 0) {
      this.logger.info("Notifications archived", { count: moved, olderThan: olderThan.toISOString() });
    }
    return moved;
  }

  /** Message files, newest first by ID. A missing inbox is empty. */
  private async readInbox(): Promise<InboxEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.inboxDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw new StateStoreError(
        `Failed to list notifications: ${errorMessage(err)}`,
        "READ_FAILED",
        this.inboxDir,
      );
    }

    const files = names
      .filter((name) => name.endsWith(".json") && !name.startsWith(TEMP_PREFIX))
      .sort()
      .reverse();

    const entries: InboxEntry[] = [];
    for (const fileName of files) {
      const entry = await this.readEntry(fileName);
      if (entry !== null) entries.push(entry);
    }
    return entries;
  }

  /** null when the file was archived between listing and reading. */
  private async readEntry(fileName: string): Promise<InboxEntry | null> {
    try {
      const raw = await readJsonFile(join(this.inboxDir, fileName));
      validateNotificationMessage(raw);
      return { fileName, message: raw };
    } catch (err) {
      if (err instanceof StateStoreError && err.code === "NOT_FOUND") return null;
      this.logger.warn("Malformed notification", { file: fileName, error: errorMessage(err) });
      return { fileName, message: null };
    }
  }
}
