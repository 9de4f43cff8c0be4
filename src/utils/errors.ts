// Error taxonomy for task submission and execution

import type { TaskError, TaskErrorKind } from "../types/index.js";

export interface ValidationIssue {
  path: string[];
  message: string;
}

/**
 * Base class for every error the engine raises or records.
 */
export class ParleyError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Malformed event or payload. Raised synchronously from submit(); never enqueued.
 */
export class ValidationError extends ParleyError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message, "VALIDATION_ERROR", false);
    this.issues = issues;
  }
}

/**
 * Network, rate-limit or other recoverable executor failure.
 */
export class TransientError extends ParleyError {
  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.code ?? "TRANSIENT_ERROR", true, options);
  }
}

/**
 * Non-retryable executor failure; the task is dead-lettered immediately.
 */
export class PermanentError extends ParleyError {
  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.code ?? "PERMANENT_ERROR", false, options);
  }
}

/**
 * Another task holds the conversation lease. Internal to the worker pool.
 */
export class LockContentionError extends ParleyError {
  readonly conversationKey: string;
  readonly holderTaskId: string | undefined;

  constructor(conversationKey: string, holderTaskId: string | undefined) {
    super(`Conversation ${conversationKey} is locked by ${holderTaskId ?? "an expired lease"}`, "LOCK_CONTENTION", true);
    this.conversationKey = conversationKey;
    this.holderTaskId = holderTaskId;
  }
}

/**
 * Hard execution limit exceeded. Retried like a transient error, recorded as a timeout.
 */
export class TaskTimeoutError extends ParleyError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Execution exceeded hard timeout of ${timeoutMs}ms`, "TIMEOUT", true);
    this.timeoutMs = timeoutMs;
  }
}

function kindOf(error: ParleyError): TaskErrorKind {
  if (error instanceof TaskTimeoutError) {
    return "timeout";
  }
  return error.retryable ? "transient" : "permanent";
}

/**
 * Convert anything thrown by an executor into the error record stored on a task.
 * Errors outside the taxonomy are treated as transient.
 */
export function classifyError(error: unknown): TaskError {
  if (error instanceof ParleyError) {
    return {
      code: error.code,
      message: error.message,
      kind: kindOf(error),
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      code: "UNKNOWN_ERROR",
      message: error.message,
      kind: "transient",
      stack: error.stack,
    };
  }

  return {
    code: "UNKNOWN_ERROR",
    message: String(error),
    kind: "transient",
  };
}

export function isRetryable(error: TaskError): boolean {
  return error.kind !== "permanent";
}
