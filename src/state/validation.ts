import type { RunRecord } from "../types/run.ts";
import { RUN_MODES } from "../types/run.ts";
import type { NotificationMessage } from "../types/notification.ts";
import { StateStoreError } from "./errors.ts";

// ── Run Record Validation ────────────────────────────────────────────────────

export function validateRunRecord(record: unknown): asserts record is RunRecord {
  const r = assertRecord(record, "RunRecord");

  assertString(r, "runId");
  assertTimestamp(r, "startTime");
  assertOneOf(r, "mode", RUN_MODES);
  if (assertNumber(r, "durationSeconds") < 0) {
    throw validationError(`"durationSeconds" must be non-negative`);
  }
  assertString(r, "version");
  if (r["previousStartTime"] !== null) {
    assertTimestamp(r, "previousStartTime");
  }
}

// ── Notification Validation ──────────────────────────────────────────────────

export function validateNotificationMessage(
  message: unknown,
): asserts message is NotificationMessage {
  const m = assertRecord(message, "NotificationMessage");

  assertString(m, "id");
  assertString(m, "type");
  assertString(m, "from");
  assertTimestamp(m, "timestamp");
  if (!isRecord(m["payload"])) {
    throw validationError(`"payload" must be an object`);
  }
}

// ── Assertion Helpers ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw validationError(`${label} must be a non-null object`);
  }
  return value;
}

function assertString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field];
  if (typeof value !== "string" || value.length === 0) {
    throw validationError(`"${field}" must be a non-empty string`);
  }
  return value;
}

function assertNumber(obj: Record<string, unknown>, field: string): number {
  const value = obj[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw validationError(`"${field}" must be a finite number`);
  }
  return value;
}

function assertTimestamp(obj: Record<string, unknown>, field: string): void {
  if (Number.isNaN(Date.parse(assertString(obj, field)))) {
    throw validationError(`"${field}" must be an ISO timestamp`);
  }
}

function assertOneOf(
  obj: Record<string, unknown>,
  field: string,
  allowed: readonly string[],
): void {
  const value = obj[field];
  if (typeof value !== "string" || !allowed.includes(value)) {
    throw validationError(
      `"${field}" must be one of: ${allowed.join(", ")}`,
    );
  }
}

function validationError(message: string): StateStoreError {
  return new StateStoreError(message, "VALIDATION_ERROR");
}
