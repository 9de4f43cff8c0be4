/**
 * WorkerPool
 *
 * Fixed number of concurrent loops pulling task ids from the dispatch queue.
 * Each loop acquires the conversation lease, runs the executor under the
 * execution guard, and finalizes the task: Succeeded, Retrying (re-enqueued
 * after backoff) or Failed → DeadLettered.
 */

import type { Executor, QueueBackend, RetryConfig, TaskError, TaskRecord, TimeoutConfig } from "../types/index.js";
import type { TaskStore } from "./TaskStore.js";
import type { ConversationLock } from "./ConversationLock.js";
import { runGuarded } from "./ExecutionGuard.js";
import { computeBackoffDelay } from "./Backoff.js";
import { classifyError, isRetryable, LockContentionError } from "../utils/errors.js";
import { runWithTraceAsync, type LayerLogger, type Logger } from "../utils/logger.js";

export interface WorkerPoolConfig {
  concurrency: number;
  leaseMs: number;
  contentionDelayMs: number;
  watchdogIntervalMs: number;
  retry: RetryConfig;
  timeouts: TimeoutConfig;
}

export interface WorkerPoolDeps {
  store: TaskStore;
  queue: QueueBackend<string>;
  lock: ConversationLock;
  executor: Executor;
  logger: Logger;
  /** Called once per task when it reaches Succeeded or DeadLettered */
  onSettled: (task: TaskRecord) => Promise<void> | void;
  now?: () => number;
  random?: () => number;
}

export class WorkerPool {
  private config: WorkerPoolConfig;
  private deps: WorkerPoolDeps;
  private logger: LayerLogger;
  private now: () => number;
  private random: () => number;
  private loops: Promise<void>[] = [];
  private abortController: AbortController | null = null;
  private timers: Set<ReturnType<typeof setTimeout>> = new Set();
  private watchdog: ReturnType<typeof setInterval> | null = null;
  private active = 0;

  constructor(config: WorkerPoolConfig, deps: WorkerPoolDeps) {
    if (config.concurrency < 1) {
      throw new Error("WorkerPool concurrency must be at least 1");
    }
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.forLayer("worker");
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
  }

  get size(): number {
    return this.config.concurrency;
  }

  get activeCount(): number {
    return this.active;
  }

  isRunning(): boolean {
    return this.abortController !== null;
  }

  start(): void {
    if (this.abortController) {
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    for (let i = 0; i < this.config.concurrency; i++) {
      this.loops.push(this.runLoop(i, controller.signal));
    }

    this.watchdog = setInterval(() => {
      this.sweep().catch((error: unknown) => this.logger.logError("sweep", error));
    }, this.config.watchdogIntervalMs);
    this.watchdog.unref();

    this.logger.info("Worker pool started", { concurrency: this.config.concurrency });
  }

  /**
   * Stop pulling new work and wait for in-flight executions to finish.
   * Pending retry timers are cleared; those tasks stay in Retrying.
   */
  async stop(): Promise<void> {
    if (!this.abortController) {
      return;
    }

    this.abortController.abort();
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }

    await Promise.all(this.loops);
    this.loops = [];
    this.abortController = null;

    if (this.timers.size > 0) {
      this.logger.warn("Dropping scheduled re-enqueues on stop", { pending: this.timers.size });
    }
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();

    this.logger.info("Worker pool stopped");
  }

  private async runLoop(workerId: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const taskId = await this.deps.queue.dequeue(signal);
      if (taskId === undefined) {
        break;
      }

      this.active++;
      try {
        await this.processTask(taskId, workerId);
      } catch (error) {
        this.logger.logError("processTask", error);
      } finally {
        this.active--;
      }
    }
  }

  /**
   * Run one dequeued task through a single attempt.
   */
  async processTask(taskId: string, workerId = 0): Promise<void> {
    const { store, lock, queue } = this.deps;

    const task = store.get(taskId);
    if (!task) {
      this.logger.warn("Dequeued unknown task", { taskId });
      return;
    }

    // Cancelled (or otherwise finalized) while waiting in the queue
    if (task.state !== "Queued" && task.state !== "Retrying") {
      this.logger.debug("Skipping task not ready to run", { taskId, state: task.state });
      return;
    }

    const key = task.conversationKey;
    if (key !== null && !lock.tryAcquire(key, taskId, this.config.leaseMs)) {
      const contention = new LockContentionError(key, lock.holder(key));
      this.logger.debug("Lock contention, re-enqueueing", { taskId, reason: contention.message });
      this.schedule(() => queue.enqueue(taskId, task.lane), this.config.contentionDelayMs);
      return;
    }

    const running = store.transition(taskId, "Running", {
      expect: ["Queued", "Retrying"],
      patch: { attempt: task.attempt + 1, startedAt: this.now() },
    });
    if (!running) {
      if (key !== null) {
        lock.release(key, taskId);
      }
      return;
    }

    const startTime = Date.now();
    this.logger.logInput("execute", { taskId, workerId, attempt: running.attempt, queue: running.queue });

    try {
      const result = await runWithTraceAsync(
        "executor",
        () =>
          runGuarded(
            this.deps.executor,
            { taskId, attempt: running.attempt, queue: running.queue, payload: running.payload },
            this.config.timeouts,
            this.logger
          ),
        taskId
      );

      const succeeded = store.transition(taskId, "Succeeded", {
        expect: ["Running"],
        patch: { result: { text: result.text, outcome: result.outcome, data: result.data }, completedAt: this.now() },
      });
      if (!succeeded) {
        this.logger.warn("Discarding result: task left Running state", { taskId, state: store.getState(taskId) });
        return;
      }

      this.logger.logOutput("execute", { taskId, state: "Succeeded" }, startTime);
      await this.settle(succeeded);
    } catch (error) {
      this.logger.logError("execute", error, startTime);
      await this.handleFailure(running, classifyError(error));
    }
  }

  /**
   * Retry transient failures with backoff; dead-letter everything else.
   */
  private async handleFailure(task: TaskRecord, error: TaskError): Promise<void> {
    const { store, lock, queue } = this.deps;

    if (isRetryable(error) && task.attempt < task.maxAttempts) {
      const delay = computeBackoffDelay(task.attempt, this.config.retry, this.random);
      const retrying = store.transition(task.id, "Retrying", {
        expect: ["Running"],
        patch: { error, retryDelaysMs: [...task.retryDelaysMs, delay] },
      });
      if (!retrying) {
        return;
      }

      // Keep the conversation through the backoff window
      if (task.conversationKey !== null) {
        lock.tryAcquire(task.conversationKey, task.id, delay + this.config.leaseMs);
      }

      this.logger.warn("Task failed, retry scheduled", {
        taskId: task.id,
        attempt: task.attempt,
        maxAttempts: task.maxAttempts,
        code: error.code,
        delayMs: delay,
      });

      this.schedule(() => {
        if (store.getState(task.id) === "Retrying") {
          queue.enqueue(task.id, task.lane);
        }
      }, delay);
      return;
    }

    const failed = store.transition(task.id, "Failed", { expect: ["Running"], patch: { error } });
    if (!failed) {
      return;
    }
    const deadLettered = store.transition(task.id, "DeadLettered", { expect: ["Failed"] });
    if (!deadLettered) {
      return;
    }

    this.logger.error("Task dead-lettered", {
      taskId: task.id,
      attempt: task.attempt,
      code: error.code,
      kind: error.kind,
      message: error.message,
    });
    await this.settle(deadLettered);
  }

  private async settle(task: TaskRecord): Promise<void> {
    try {
      await this.deps.onSettled(task);
    } catch (error) {
      this.logger.error("Completion handler failed", {
        taskId: task.id,
        state: task.state,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Recover from lost executions: expired leases are dropped and Running
   * tasks older than twice the hard timeout are failed as timeouts.
   */
  async sweep(): Promise<number> {
    const expired = this.deps.lock.sweepExpired();
    const cutoff = this.now() - 2 * this.config.timeouts.hardTimeoutMs;
    const stale = this.deps.store.findStaleRunning(cutoff);

    for (const task of stale) {
      this.logger.warn("Watchdog failing stale task", { taskId: task.id, startedAt: task.startedAt });
      await this.handleFailure(task, {
        code: "TIMEOUT",
        message: `No result within ${2 * this.config.timeouts.hardTimeoutMs}ms; execution presumed lost`,
        kind: "timeout",
      });
    }

    if (expired > 0 || stale.length > 0) {
      this.logger.info("Watchdog sweep", { expiredLeases: expired, staleTasks: stale.length });
    }
    return stale.length;
  }

  private schedule(fn: () => void, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      try {
        fn();
      } catch (error) {
        this.logger.error("Scheduled re-enqueue failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }, delayMs);
    this.timers.add(timer);
  }
}
