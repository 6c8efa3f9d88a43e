/**
 * Error taxonomy for task orchestration and job dispatch.
 * Every error carries a stable `code` so callers can branch without
 * relying on class identity across module boundaries.
 */

export type StepwiseErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "HANDLER_FAILED"
  | "UNKNOWN_JOB_TYPE"
  | "UNKNOWN_ACTION"
  | "STORE_UNAVAILABLE"
  | "JOB_DEFERRED";

export class StepwiseError extends Error {
  readonly code: StepwiseErrorCode;

  constructor(code: StepwiseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StepwiseError";
    this.code = code;
    Object.setPrototypeOf(this, StepwiseError.prototype);
  }
}

/** Malformed task spec or request body. Never retried. */
export class ValidationError extends StepwiseError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("VALIDATION", `Invalid input: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends StepwiseError {
  readonly entity: "task" | "substep" | "job" | "meeting" | "notification";
  readonly entityId: string;

  constructor(entity: NotFoundError["entity"], entityId: string) {
    super("NOT_FOUND", `${entity} not found: ${entityId}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.entityId = entityId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** The requested mutation is not allowed from the current state. */
export class InvalidTransitionError extends StepwiseError {
  constructor(message: string) {
    super("INVALID_TRANSITION", message);
    this.name = "InvalidTransitionError";
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/** A job handler or action failed, threw, or timed out. Drives job retry. */
export class HandlerError extends StepwiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("HANDLER_FAILED", message, options);
    this.name = "HandlerError";
    Object.setPrototypeOf(this, HandlerError.prototype);
  }
}

export class UnknownJobTypeError extends StepwiseError {
  readonly jobType: string;

  constructor(jobType: string) {
    super("UNKNOWN_JOB_TYPE", `No handler registered for job type: ${jobType}`);
    this.name = "UnknownJobTypeError";
    this.jobType = jobType;
    Object.setPrototypeOf(this, UnknownJobTypeError.prototype);
  }
}

export class UnknownActionError extends StepwiseError {
  readonly actionType: string;

  constructor(actionType: string) {
    super("UNKNOWN_ACTION", `No action handler registered for: ${actionType}`);
    this.name = "UnknownActionError";
    this.actionType = actionType;
    Object.setPrototypeOf(this, UnknownActionError.prototype);
  }
}

export class StoreUnavailableError extends StepwiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_UNAVAILABLE", message, options);
    this.name = "StoreUnavailableError";
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * Thrown by a job handler whose work cannot start yet. The job is put back
 * without using up an attempt.
 */
export class JobDeferredError extends StepwiseError {
  constructor(reason: string) {
    super("JOB_DEFERRED", reason);
    this.name = "JobDeferredError";
    Object.setPrototypeOf(this, JobDeferredError.prototype);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}

const HTTP_STATUS: Record<StepwiseErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  HANDLER_FAILED: 502,
  UNKNOWN_JOB_TYPE: 400,
  UNKNOWN_ACTION: 400,
  STORE_UNAVAILABLE: 503,
  JOB_DEFERRED: 409,
};

/** Map an error to the HTTP status and body the REST API returns. */
export function toHttpError(err: unknown): {
  statusCode: number;
  body: { error: string; code: string; details?: string[] };
} {
  if (err instanceof ValidationError) {
    return {
      statusCode: 400,
      body: { error: err.message, code: err.code, details: err.issues },
    };
  }
  if (err instanceof StepwiseError) {
    return {
      statusCode: HTTP_STATUS[err.code],
      body: { error: err.message, code: err.code },
    };
  }
  return {
    statusCode: 500,
    body: { error: "Internal server error", code: "INTERNAL" },
  };
}
