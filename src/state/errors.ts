// ── State Store Error Codes ──────────────────────────────────────────────────

export type StateStoreErrorCode =
  | "NOT_FOUND"
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "PARSE_ERROR"
  | "VALIDATION_ERROR";

// ── State Store Error ────────────────────────────────────────────────────────

export class StateStoreError extends Error {
  constructor(
    message: string,
    public readonly code: StateStoreErrorCode,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "StateStoreError";
  }
}

// ── Fatal Setup Error ────────────────────────────────────────────────────────

/**
 * The state-store root is missing and cannot be created, or is not writable.
 * The only error that aborts a run.
 */
export class FatalSetupError extends Error {
  override readonly name = "FatalSetupError";

  constructor(
    message: string,
    readonly path: string,
    override readonly cause?: Error,
  ) {
    super(message);
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
