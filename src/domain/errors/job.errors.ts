export type JobFailureCode =
  | "TOOL_UNAVAILABLE"
  | "ENCODE_FAILURE"
  | "AUTH_UNAVAILABLE"
  | "UPLOAD_TRANSPORT_FAILURE"
  | "SCHEDULER_TICK_ERROR"
  | "ILLEGAL_TRANSITION";

export class JobFailure extends Error {
  constructor(
    readonly code: JobFailureCode,
    message: string,
    readonly detail?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The encoder binary could not be found; nothing was spawned. */
export class ToolUnavailableError extends JobFailure {
  constructor(message: string) {
    super("TOOL_UNAVAILABLE", message);
  }
}

/** The encoder exited non-zero. `detail` holds the tail of its diagnostic output. */
export class EncodeFailureError extends JobFailure {
  constructor(message: string, diagnosticTail?: string) {
    super("ENCODE_FAILURE", message, diagnosticTail);
  }
}

export class AuthUnavailableError extends JobFailure {
  constructor(message: string) {
    super("AUTH_UNAVAILABLE", message);
  }
}

export class UploadTransportFailureError extends JobFailure {
  constructor(message: string) {
    super("UPLOAD_TRANSPORT_FAILURE", message);
  }
}

export class SchedulerTickError extends JobFailure {
  constructor(message: string) {
    super("SCHEDULER_TICK_ERROR", message);
  }
}

export class IllegalTransitionError extends JobFailure {
  constructor(message: string) {
    super("ILLEGAL_TRANSITION", message);
  }
}

export type Result<T, E = JobFailure> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error ?? "Unknown error");
}
