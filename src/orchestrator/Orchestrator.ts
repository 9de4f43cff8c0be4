/**
 * Orchestrator
 *
 * Facade over the task store, dispatch queue, conversation lock and worker
 * pool. Accepts conversation events, turns them into tasks, and on task
 * completion advances the conversation's phase and admits the next task
 * waiting on that conversation.
 */

import { randomUUID } from "node:crypto";
import type {
  Branch,
  Conversation,
  ExecutionContext,
  ExecutionResult,
  Executor,
  QueueBackend,
  SystemConfig,
  TaskPayload,
  TaskRecord,
  TaskStatus,
} from "../types/index.js";
import { QUEUE_LANES, isTerminalState } from "../types/index.js";
import { TaskStore } from "./TaskStore.js";
import { PriorityQueue } from "./PriorityQueue.js";
import { ConversationLock } from "./ConversationLock.js";
import { ConversationBacklog } from "./ConversationBacklog.js";
import { WorkerPool } from "./WorkerPool.js";
import {
  CATEGORY_QUEUES,
  ConversationEventSchema,
  type ConversationEvent,
  type ConversationMetrics,
  type OrchestratorStats,
  type WaitOptions,
} from "./types.js";
import type { ConversationRepository } from "../conversations/ConversationRepository.js";
import { InMemoryConversationRepository } from "../conversations/ConversationRepository.js";
import { initialActions, isTerminalPhase, transition as advancePhase } from "../conversations/ConversationStateMachine.js";
import { classifyOutcome } from "../conversations/OutcomeClassifier.js";
import { ParleyError, ValidationError } from "../utils/errors.js";
import { createLogger, runWithTraceAsync, type LayerLogger, type Logger } from "../utils/logger.js";

export interface OrchestratorDeps {
  executor: Executor;
  repository?: ConversationRepository;
  queue?: QueueBackend<string>;
  logger?: Logger;
  now?: () => number;
  random?: () => number;
}

type SettledCallback = (status: TaskStatus) => void;

const PRODUCT_CONTEXT_KEYS = ["productId", "adId"];

function pairKeyOf(businessId: string, customerId: string): string {
  return `${businessId}:${customerId}`;
}

function stoppedError(): ParleyError {
  return new ParleyError("Orchestrator has been shut down", "ORCHESTRATOR_STOPPED", false);
}

function toStatus(task: TaskRecord): TaskStatus {
  return {
    taskId: task.id,
    queue: task.queue,
    conversationKey: task.conversationKey,
    state: task.state,
    attempt: task.attempt,
    maxAttempts: task.maxAttempts,
    result: task.result,
    error: task.error,
    createdAt: task.createdAt,
    startedAt: task.startedAt,
    completedAt: task.completedAt,
  };
}

/**
 * Product-led context (an ad or a product) starts the Manipulator branch.
 */
function inferBranch(context: Record<string, unknown>): Branch {
  return PRODUCT_CONTEXT_KEYS.some((key) => context[key] !== undefined) ? "Manipulator" : "Convincer";
}

export class Orchestrator {
  private config: SystemConfig;
  private store: TaskStore;
  private queue: QueueBackend<string>;
  private lock: ConversationLock;
  private backlog: ConversationBacklog;
  private pool: WorkerPool;
  private repository: ConversationRepository;
  private executor: Executor;
  private logger: Logger;
  private layerLogger: LayerLogger;
  private now: () => number;

  /** Open conversation per business/customer pair */
  private currentConversations: Map<string, string> = new Map();
  /** Last concluded conversation per pair, kept for the retention window to link its successor */
  private concludedConversations: Map<string, { conversationId: string; concludedAt: number }> = new Map();
  private settledCallbacks: Map<string, Set<SettledCallback>> = new Map();
  private submitChain: Promise<unknown> = Promise.resolve();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private metrics = { started: 0, closed: 0, abandoned: 0, messagesAtConclusion: 0 };
  private stopped = false;

  constructor(config: SystemConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger(config);
    this.layerLogger = this.logger.forLayer("orchestrator");
    this.executor = deps.executor;
    this.repository = deps.repository ?? new InMemoryConversationRepository();
    this.queue = deps.queue ?? new PriorityQueue<string>();
    this.store = new TaskStore({ now: this.now, logger: this.logger.forLayer("store") });
    this.lock = new ConversationLock({ now: this.now, logger: this.logger.forLayer("lock") });
    this.backlog = new ConversationBacklog();

    this.pool = new WorkerPool(
      {
        ...config.workers,
        retry: config.retry,
        timeouts: config.timeouts,
      },
      {
        store: this.store,
        queue: this.queue,
        lock: this.lock,
        executor: (payload, context) => this.execute(payload, context),
        logger: this.logger,
        onSettled: (task) => this.handleSettled(task),
        now: this.now,
        random: deps.random,
      }
    );

    this.store.onTaskEvent((event) => {
      this.layerLogger.debug("Task state changed", {
        taskId: event.taskId,
        from: event.previousState,
        to: event.newState,
      });
    });
  }

  start(): void {
    if (this.stopped) {
      throw stoppedError();
    }
    this.pool.start();

    if (!this.cleanupTimer) {
      this.cleanupTimer = setInterval(() => this.cleanup(), Math.min(this.config.taskRetentionMs, 60000));
      this.cleanupTimer.unref();
    }
  }

  /**
   * Stop the workers after their current attempts and close the queue.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }

    await this.pool.stop();
    this.queue.close();
    this.layerLogger.info("Orchestrator shut down", { tasks: this.store.getStats().total });
  }

  /**
   * Accept an event (see ConversationEventInput) and return its task id once
   * the task is recorded. Malformed events throw ValidationError synchronously
   * and create nothing. A conversation id owned by another customer rejects
   * with ValidationError; a shut-down orchestrator rejects with
   * ORCHESTRATOR_STOPPED.
   */
  submit(input: unknown): Promise<string> {
    const parsed = ConversationEventSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.map(String),
        message: issue.message,
      }));
      throw new ValidationError(
        `Invalid event: ${issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`,
        issues
      );
    }

    if (this.stopped) {
      return Promise.reject(stoppedError());
    }

    const event = parsed.data;
    // Serialized so conversation resolution and admission follow submission order
    const accepted = this.submitChain.then(() =>
      runWithTraceAsync("orchestrator", () => this.accept(event))
    );
    this.submitChain = accepted.then(
      () => undefined,
      (error: unknown) => {
        if (error instanceof ValidationError || (error instanceof ParleyError && error.code === "ORCHESTRATOR_STOPPED")) {
          this.layerLogger.warn("Event rejected", { reason: error.message });
          return;
        }
        this.layerLogger.logError("submit", error);
      }
    );
    return accepted;
  }

  private async accept(event: ConversationEvent): Promise<string> {
    const queue = CATEGORY_QUEUES[event.category];
    const maxAttempts = event.maxAttempts ?? this.config.retry.maxAttempts;

    if (event.category === "analytics") {
      this.assertRunning();
      const task = this.store.create({
        queue,
        lane: QUEUE_LANES[queue],
        conversationKey: null,
        payload: { text: event.text, context: { ...event.context, businessId: event.businessId } },
        maxAttempts,
      });
      this.queue.enqueue(task.id, task.lane);
      this.layerLogger.info("Task submitted", { taskId: task.id, queue });
      return task.id;
    }

    const conversation = await this.resolveConversation(event);
    this.assertRunning();
    const payload: TaskPayload = {
      text: event.text,
      context: event.context,
      conversation: {
        id: conversation.id,
        branch: conversation.branch,
        phase: conversation.phase,
        messageCount: conversation.messageCount,
        actions: conversation.lastActions,
      },
    };

    const task = this.store.create({
      queue,
      lane: QUEUE_LANES[queue],
      conversationKey: conversation.id,
      payload,
      maxAttempts,
    });
    this.admit(task);

    this.layerLogger.info("Task submitted", {
      taskId: task.id,
      queue,
      conversationId: conversation.id,
      phase: conversation.phase,
      waiting: this.backlog.size(conversation.id),
    });
    return task.id;
  }

  /**
   * Load the referenced or current conversation, creating a new one when
   * none exists or the existing one has reached a terminal phase.
   */
  private async resolveConversation(event: Exclude<ConversationEvent, { category: "analytics" }>): Promise<Conversation> {
    const pairKey = pairKeyOf(event.businessId, event.customerId);
    const conversationId =
      event.conversationId ??
      this.currentConversations.get(pairKey) ??
      this.concludedConversations.get(pairKey)?.conversationId;

    const existing = conversationId !== undefined ? await this.repository.load(conversationId) : undefined;
    if (existing && (existing.customerId !== event.customerId || existing.businessId !== event.businessId)) {
      const issue = { path: ["conversationId"], message: "Conversation belongs to another customer" };
      throw new ValidationError(`Invalid event: conversationId: ${issue.message}`, [issue]);
    }
    if (existing && !isTerminalPhase(existing.phase)) {
      this.currentConversations.set(pairKey, existing.id);
      return existing;
    }

    const branch = existing?.branch ?? event.branch ?? inferBranch(event.context);
    const now = this.now();
    const conversation: Conversation = {
      // A new id is minted when replacing a terminal conversation
      id: existing ? randomUUID() : (conversationId ?? randomUUID()),
      customerId: event.customerId,
      businessId: event.businessId,
      branch,
      phase: "Welcome",
      messageCount: 0,
      disengagedStreak: 0,
      lastActions: initialActions(branch),
      createdAt: now,
      lastActivityAt: now,
      previousConversationId: existing?.id,
    };

    await this.repository.save(conversation);
    this.currentConversations.set(pairKey, conversation.id);
    this.concludedConversations.delete(pairKey);
    this.metrics.started++;

    this.layerLogger.info("Conversation started", {
      conversationId: conversation.id,
      branch,
      previousConversationId: conversation.previousConversationId,
    });
    return conversation;
  }

  private assertRunning(): void {
    if (this.stopped) {
      throw stoppedError();
    }
  }

  private admit(task: TaskRecord): void {
    if (task.conversationKey === null || this.backlog.admit(task.conversationKey, task.id)) {
      this.queue.enqueue(task.id, task.lane);
    }
  }

  /**
   * Admit the next task parked behind a finished one.
   */
  private admitNext(conversationKey: string, finishedTaskId: string): void {
    let previous = finishedTaskId;
    let next = this.backlog.release(conversationKey, previous);

    while (next !== undefined) {
      const task = this.store.get(next);
      if (task && task.state === "Queued") {
        if (this.stopped) {
          // Holds the conversation slot; nothing dispatches after shutdown
          this.layerLogger.debug("Not admitting waiting task after shutdown", { conversationKey, taskId: task.id });
          return;
        }
        this.queue.enqueue(task.id, task.lane);
        this.layerLogger.debug("Admitted waiting task", { conversationKey, taskId: task.id });
        return;
      }
      previous = next;
      next = this.backlog.release(conversationKey, previous);
    }
  }

  /**
   * Hand the executor the conversation as it is now, not as it was at submission.
   */
  private async execute(payload: TaskPayload, context: ExecutionContext): Promise<ExecutionResult> {
    if (!payload.conversation) {
      return this.executor(payload, context);
    }

    const current = await this.repository.load(payload.conversation.id);
    if (!current) {
      return this.executor(payload, context);
    }

    return this.executor(
      {
        ...payload,
        conversation: {
          id: current.id,
          branch: current.branch,
          phase: current.phase,
          messageCount: current.messageCount,
          actions: current.lastActions,
        },
      },
      context
    );
  }

  private async handleSettled(task: TaskRecord): Promise<void> {
    const key = task.conversationKey;

    try {
      if (key !== null) {
        this.lock.release(key, task.id);
        if (task.state === "Succeeded") {
          await this.advanceConversation(key, task);
        }
      }
    } finally {
      if (key !== null) {
        this.admitNext(key, task.id);
      }
      this.notifySettled(task.id);
    }

    this.layerLogger.info("Task settled", {
      taskId: task.id,
      state: task.state,
      attempt: task.attempt,
      errorCode: task.error?.code,
    });
  }

  private async advanceConversation(conversationId: string, task: TaskRecord): Promise<void> {
    const conversation = await this.repository.load(conversationId);
    if (!conversation) {
      this.layerLogger.warn("Completed task references unknown conversation", { taskId: task.id, conversationId });
      return;
    }

    // Replies queued behind the concluding message leave the conversation as it ended
    if (isTerminalPhase(conversation.phase)) {
      this.logger.forLayer("state").info("Reply after conversation concluded", {
        conversationId,
        taskId: task.id,
        phase: conversation.phase,
      });
      return;
    }

    const messageCount = conversation.messageCount + 1;
    const outcome = task.result?.outcome ?? classifyOutcome(task.payload.text);
    const next = advancePhase(
      {
        branch: conversation.branch,
        phase: conversation.phase,
        outcome,
        messageCount,
        disengagedStreak: conversation.disengagedStreak,
      },
      this.config.conversation
    );

    const updated: Conversation = {
      ...conversation,
      phase: next.phase,
      messageCount,
      disengagedStreak: next.disengagedStreak,
      lastActions: next.terminal && !next.changed ? conversation.lastActions : next.actions,
      lastActivityAt: this.now(),
    };
    await this.repository.save(updated);

    if (next.changed && next.terminal) {
      if (next.phase === "Closing") {
        this.metrics.closed++;
      } else {
        this.metrics.abandoned++;
      }
      this.metrics.messagesAtConclusion += messageCount;

      const pairKey = pairKeyOf(conversation.businessId, conversation.customerId);
      if (this.currentConversations.get(pairKey) === conversationId) {
        this.currentConversations.delete(pairKey);
        this.concludedConversations.set(pairKey, { conversationId, concludedAt: this.now() });
      }
    }

    this.logger.forLayer("state").info("Conversation advanced", {
      conversationId,
      outcome,
      from: conversation.phase,
      to: next.phase,
      messageCount,
      actions: updated.lastActions,
    });
  }

  getStatus(taskId: string): TaskStatus | undefined {
    const task = this.store.get(taskId);
    return task ? toStatus(task) : undefined;
  }

  /**
   * Cancel a task that is not executing. Effective in Queued and Retrying only.
   */
  cancel(taskId: string): boolean {
    const task = this.store.get(taskId);
    if (!task) {
      return false;
    }

    const cancelled = this.store.transition(taskId, "Cancelled", { expect: ["Queued", "Retrying"] });
    if (!cancelled) {
      return false;
    }

    const key = cancelled.conversationKey;
    if (key !== null && this.backlog.isWaiting(key, taskId)) {
      this.backlog.remove(key, taskId);
    } else {
      this.queue.remove(taskId);
      if (key !== null) {
        this.lock.release(key, taskId);
        this.admitNext(key, taskId);
      }
    }

    this.notifySettled(taskId);
    this.layerLogger.info("Task cancelled", { taskId, from: task.state });
    return true;
  }

  /**
   * Resolve once the task is terminal and its completion handling has run.
   */
  waitFor(taskId: string, options: WaitOptions = {}): Promise<TaskStatus> {
    const task = this.store.get(taskId);
    if (!task) {
      return Promise.reject(new ParleyError(`Task not found: ${taskId}`, "TASK_NOT_FOUND", false));
    }
    if (isTerminalState(task.state) && !this.isSettling(task)) {
      return Promise.resolve(toStatus(task));
    }

    return new Promise<TaskStatus>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const callback: SettledCallback = (status) => {
        clearTimeout(timer);
        resolve(status);
      };

      let callbacks = this.settledCallbacks.get(taskId);
      if (!callbacks) {
        callbacks = new Set();
        this.settledCallbacks.set(taskId, callbacks);
      }
      callbacks.add(callback);

      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const pending = this.settledCallbacks.get(taskId);
          pending?.delete(callback);
          if (pending?.size === 0) {
            this.settledCallbacks.delete(taskId);
          }
          reject(new ParleyError(`Timed out after ${options.timeoutMs}ms waiting for task ${taskId}`, "WAIT_TIMEOUT", false));
        }, options.timeoutMs);
      }
    });
  }

  /**
   * A terminal task whose conversation slot is still held has not finished
   * its completion handling yet.
   */
  private isSettling(task: TaskRecord): boolean {
    return task.conversationKey !== null && this.backlog.getInFlight(task.conversationKey) === task.id;
  }

  private notifySettled(taskId: string): void {
    const callbacks = this.settledCallbacks.get(taskId);
    if (!callbacks) {
      return;
    }
    this.settledCallbacks.delete(taskId);

    const task = this.store.get(taskId);
    if (!task) {
      return;
    }
    const status = toStatus(task);
    for (const callback of callbacks) {
      callback(status);
    }
  }

  /**
   * Re-run a dead-lettered task as a new task with the same payload.
   */
  reprocessDeadLetter(taskId: string): string {
    this.assertRunning();
    const task = this.store.get(taskId);
    if (!task) {
      throw new ParleyError(`Task not found: ${taskId}`, "TASK_NOT_FOUND", false);
    }
    if (task.state !== "DeadLettered") {
      throw new ParleyError(`Task ${taskId} is ${task.state}, not DeadLettered`, "NOT_DEAD_LETTERED", false);
    }

    const replacement = this.store.create({
      queue: task.queue,
      lane: task.lane,
      conversationKey: task.conversationKey,
      payload: task.payload,
      maxAttempts: task.maxAttempts,
      reprocessedFrom: task.id,
    });
    this.admit(replacement);

    this.layerLogger.info("Dead-lettered task reprocessed", { taskId, replacementId: replacement.id });
    return replacement.id;
  }

  async getConversation(conversationId: string): Promise<Conversation | undefined> {
    return this.repository.load(conversationId);
  }

  listTasks(): TaskStatus[] {
    return this.store
      .list()
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(toStatus);
  }

  getStats(): OrchestratorStats {
    const queue = this.queue.getStats();
    const concluded = this.metrics.closed + this.metrics.abandoned;
    const conversations: ConversationMetrics = {
      started: this.metrics.started,
      closed: this.metrics.closed,
      abandoned: this.metrics.abandoned,
      averageMessagesAtConclusion: concluded === 0 ? 0 : this.metrics.messagesAtConclusion / concluded,
      active: this.currentConversations.size,
    };

    return {
      tasks: this.store.getStats(),
      queue,
      lanes: queue.lanes,
      backlog: this.backlog.getStats(),
      workers: { size: this.pool.size, active: this.pool.activeCount },
      locks: this.lock.size(),
      conversations,
      pendingWaits: this.settledCallbacks.size,
    };
  }

  /**
   * Drop terminal tasks older than the retention window, and forget concluded
   * conversations past it. Returns the number of tasks removed.
   */
  cleanup(): number {
    const cutoff = this.now() - this.config.taskRetentionMs;
    for (const [pairKey, concluded] of this.concludedConversations) {
      if (concluded.concludedAt < cutoff) {
        this.concludedConversations.delete(pairKey);
      }
    }
    return this.store.cleanup(this.config.taskRetentionMs);
  }
}
