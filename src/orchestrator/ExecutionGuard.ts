/**
 * ExecutionGuard
 *
 * Runs one executor call under a soft and a hard time limit.
 * The soft limit only logs. The hard limit aborts the call's signal and
 * rejects with TaskTimeoutError; the worker loop itself keeps running.
 */

import type { ExecutionContext, ExecutionResult, Executor, TaskPayload, TimeoutConfig } from "../types/index.js";
import { TaskTimeoutError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";

export interface GuardedCall {
  taskId: string;
  attempt: number;
  queue: ExecutionContext["queue"];
  payload: TaskPayload;
}

export async function runGuarded(
  executor: Executor,
  call: GuardedCall,
  limits: TimeoutConfig,
  logger?: LayerLogger
): Promise<ExecutionResult> {
  const controller = new AbortController();
  const startTime = Date.now();

  const softTimer = setTimeout(() => {
    logger?.warn("Task exceeded soft time limit", {
      taskId: call.taskId,
      attempt: call.attempt,
      softTimeoutMs: limits.softTimeoutMs,
      elapsedMs: Date.now() - startTime,
    });
  }, limits.softTimeoutMs);

  let hardTimer: ReturnType<typeof setTimeout> | undefined;
  const hardLimit = new Promise<never>((_, reject) => {
    hardTimer = setTimeout(() => {
      const error = new TaskTimeoutError(limits.hardTimeoutMs);
      controller.abort(error);
      reject(error);
    }, limits.hardTimeoutMs);
  });

  const execution = (async () =>
    executor(call.payload, {
      taskId: call.taskId,
      attempt: call.attempt,
      queue: call.queue,
      signal: controller.signal,
    }))();
  // The executor may settle after the hard limit already won; its late rejection is irrelevant.
  execution.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger?.debug("Executor settled after hard timeout", {
        taskId: call.taskId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  try {
    return await Promise.race([execution, hardLimit]);
  } finally {
    clearTimeout(softTimer);
    clearTimeout(hardTimer);
  }
}
