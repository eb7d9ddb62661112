import { randomBytes } from "node:crypto";

function compactTimestamp(date: Date): string {
  // 2026-10-19T10:21:05.123Z -> 20261019T102105123Z
  return date.toISOString().replace(/[-:.]/g, "");
}

function randomHex(): string {
  return randomBytes(3).toString("hex");
}

/**
 * Generate a notification message ID: "{YYYYMMDDTHHMMSSmmmZ}-{6-char-hex}".
 * Lexicographic order follows creation time.
 * Example: "20261019T102105123Z-a1b2c3"
 */
export function generateMessageId(now: Date = new Date()): string {
  return `${compactTimestamp(now)}-${randomHex()}`;
}

/**
 * Generate a run ID: "run-{YYYYMMDDTHHMMSSmmmZ}-{6-char-hex}"
 */
export function generateRunId(now: Date = new Date()): string {
  return `run-${compactTimestamp(now)}-${randomHex()}`;
}
