export type CoordinatorErrorCode =
  | "INVALID_TASK"
  | "UNKNOWN_DEPENDENCY"
  | "DEPENDENCY_CYCLE"
  | "DUPLICATE_TASK"
  | "DUPLICATE_AGENT"
  | "INVALID_AGENT"
  | "TASK_NOT_FOUND"
  | "AGENT_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "TASK_IN_USE"
  | "INVALID_TIMEOUT"
  | "INVALID_CONFIG";

export class CoordinatorError extends Error {
  readonly code: CoordinatorErrorCode;
  readonly details: Record<string, unknown> | null;

  constructor(code: CoordinatorErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details ?? null;
  }
}

/** Rejected input. The caller must correct it before submitting again. */
export class SubmissionError extends CoordinatorError {}

export class NotFoundError extends CoordinatorError {}

/** A registry contract was broken; only the current operation is abandoned. */
export class InvariantError extends CoordinatorError {}

export class ConfigError extends CoordinatorError {}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object") {
    try {
      return JSON.stringify(error);
    } catch {
      return "unknown error";
    }
  }
  return String(error);
}
