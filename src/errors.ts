// ── Error Taxonomy ───────────────────────────────────────
// StorageUnavailable, ModelUnavailable and the timeout/lock errors end a turn.
// Tool failures never surface as errors; they become ToolOutcome values.

export type SupportErrorCode =
  | "STORAGE_UNAVAILABLE"
  | "MODEL_UNAVAILABLE"
  | "MALFORMED_MODEL_OUTPUT"
  | "CONFIG_INVALID"
  | "LOCK_TIMEOUT"
  | "ORCHESTRATION_TIMEOUT"
  | "TURN_FAILED";

export abstract class SupportError extends Error {
  abstract readonly code: SupportErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StorageUnavailableError extends SupportError {
  readonly code = "STORAGE_UNAVAILABLE";

  constructor(operation: string, cause?: unknown) {
    super(`Durable store unavailable during ${operation}: ${describeError(cause)}`, {
      cause,
    });
  }
}

export class ModelUnavailableError extends SupportError {
  readonly code = "MODEL_UNAVAILABLE";
  readonly status: number | undefined;

  constructor(label: string, cause?: unknown, status?: number) {
    super(`Language model call failed (${label}): ${describeError(cause)}`, {
      cause,
    });
    this.status = status;
  }
}

export class MalformedModelOutputError extends SupportError {
  readonly code = "MALFORMED_MODEL_OUTPUT";

  constructor(
    reason: string,
    readonly raw: string,
  ) {
    super(`Malformed model output: ${reason}`);
  }
}

export class ConfigError extends SupportError {
  readonly code = "CONFIG_INVALID";
}

export class LockTimeoutError extends SupportError {
  readonly code = "LOCK_TIMEOUT";

  constructor(
    readonly key: string,
    waitMs: number,
  ) {
    super(`Could not acquire lock "${key}" within ${waitMs}ms`);
  }
}

export class OrchestrationTimeoutError extends SupportError {
  readonly code = "ORCHESTRATION_TIMEOUT";

  constructor(timeoutMs: number) {
    super(`Specialist dispatch timed out after ${timeoutMs / 1000}s`);
  }
}

/** A turn that ended in `failed`; carries the code of the error that ended it. */
export class TurnFailedError extends SupportError {
  readonly code = "TURN_FAILED";

  constructor(
    readonly reasonCode: string,
    message: string,
  ) {
    super(message);
  }
}

// ── Helpers ──────────────────────────────────────────────

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return "unknown error";
  return String(error);
}
