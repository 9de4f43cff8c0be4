/**
 * TaskStore
 *
 * In-memory storage for task records.
 * Every state change goes through transition(), which checks the expected
 * current state and the transition graph before applying anything.
 */

import { randomUUID } from "node:crypto";
import type { Lane, QueueName, TaskEvent, TaskPayload, TaskRecord, TaskState } from "../types/index.js";
import { ACTIVE_TASK_STATES, isTerminalState } from "../types/index.js";
import type { LayerLogger } from "../utils/logger.js";

type TaskEventListener = (event: TaskEvent) => void;

export interface CreateTaskInput {
  queue: QueueName;
  lane: Lane;
  conversationKey: string | null;
  payload: TaskPayload;
  maxAttempts: number;
  reprocessedFrom?: string;
}

export type TaskPatch = Partial<
  Pick<TaskRecord, "attempt" | "startedAt" | "completedAt" | "result" | "error" | "retryDelaysMs">
>;

export interface TransitionOptions {
  /** Apply only when the current state is one of these */
  expect?: readonly TaskState[];
  patch?: TaskPatch;
}

export interface TaskFilter {
  state?: TaskState;
  conversationKey?: string;
  queue?: QueueName;
}

const VALID_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  Queued: ["Running", "Cancelled"],
  Running: ["Succeeded", "Retrying", "Failed"],
  Retrying: ["Running", "Cancelled"],
  Failed: ["DeadLettered"],
  Succeeded: [],
  Cancelled: [],
  DeadLettered: [],
};

export function isValidTransition(from: TaskState, to: TaskState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

function snapshot(task: TaskRecord): TaskRecord {
  return structuredClone(task);
}

export class TaskStore {
  private tasks: Map<string, TaskRecord> = new Map();
  private listeners: Set<TaskEventListener> = new Set();
  private now: () => number;
  private logger?: LayerLogger;

  constructor(options?: { now?: () => number; logger?: LayerLogger }) {
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger;
  }

  /**
   * Create a new task in the Queued state.
   */
  create(input: CreateTaskInput): TaskRecord {
    const now = this.now();
    const task: TaskRecord = {
      id: randomUUID(),
      queue: input.queue,
      lane: input.lane,
      conversationKey: input.conversationKey,
      payload: structuredClone(input.payload),
      state: "Queued",
      attempt: 0,
      maxAttempts: input.maxAttempts,
      createdAt: now,
      updatedAt: now,
      history: [{ state: "Queued", at: now }],
      retryDelaysMs: [],
      reprocessedFrom: input.reprocessedFrom,
    };

    this.tasks.set(task.id, task);
    this.emitEvent({
      taskId: task.id,
      conversationKey: task.conversationKey,
      previousState: null,
      newState: "Queued",
      timestamp: now,
    });

    return snapshot(task);
  }

  /**
   * Get a copy of a task by ID.
   */
  get(taskId: string): TaskRecord | undefined {
    const task = this.tasks.get(taskId);
    return task ? snapshot(task) : undefined;
  }

  getState(taskId: string): TaskState | undefined {
    return this.tasks.get(taskId)?.state;
  }

  /**
   * Compare-and-swap a task into a new state.
   * Returns the updated snapshot, or undefined when the task is missing,
   * its current state is not expected, or the edge is not in the graph.
   */
  transition(taskId: string, to: TaskState, options: TransitionOptions = {}): TaskRecord | undefined {
    const task = this.tasks.get(taskId);
    if (!task) {
      return undefined;
    }

    const previousState = task.state;
    if (options.expect && !options.expect.includes(previousState)) {
      this.logger?.debug("Transition rejected: unexpected state", { taskId, from: previousState, to, expect: options.expect });
      return undefined;
    }
    if (!isValidTransition(previousState, to)) {
      this.logger?.warn("Transition rejected: invalid edge", { taskId, from: previousState, to });
      return undefined;
    }

    const now = this.now();
    if (options.patch) {
      Object.assign(task, structuredClone(options.patch));
    }
    task.state = to;
    task.updatedAt = now;
    task.history.push({ state: to, at: now });

    if (isTerminalState(to)) {
      task.completedAt = task.completedAt ?? now;
      if (to === "Succeeded") {
        delete task.error;
      } else {
        delete task.result;
      }
    }

    this.emitEvent({
      taskId,
      conversationKey: task.conversationKey,
      previousState,
      newState: to,
      timestamp: now,
    });

    return snapshot(task);
  }

  list(filter: TaskFilter = {}): TaskRecord[] {
    return Array.from(this.tasks.values())
      .filter((task) => filter.state === undefined || task.state === filter.state)
      .filter((task) => filter.conversationKey === undefined || task.conversationKey === filter.conversationKey)
      .filter((task) => filter.queue === undefined || task.queue === filter.queue)
      .map(snapshot);
  }

  /**
   * Tasks of a conversation that are not yet terminal, oldest first.
   */
  findActiveByConversation(conversationKey: string): TaskRecord[] {
    return Array.from(this.tasks.values())
      .filter((task) => task.conversationKey === conversationKey && ACTIVE_TASK_STATES.includes(task.state))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(snapshot);
  }

  /**
   * Running tasks whose current attempt started before the cutoff.
   */
  findStaleRunning(startedBefore: number): TaskRecord[] {
    return Array.from(this.tasks.values())
      .filter((task) => task.state === "Running" && (task.startedAt ?? task.updatedAt) < startedBefore)
      .map(snapshot);
  }

  /**
   * Drop terminal tasks completed before the retention window.
   */
  cleanup(retentionMs: number): number {
    const cutoff = this.now() - retentionMs;
    let cleaned = 0;

    for (const [id, task] of this.tasks.entries()) {
      if (isTerminalState(task.state) && (task.completedAt ?? task.updatedAt) < cutoff) {
        this.tasks.delete(id);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger?.info("Cleaned up terminal tasks", { cleaned });
    }
    return cleaned;
  }

  /**
   * Subscribe to task state change events.
   */
  onTaskEvent(listener: TaskEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emitEvent(event: TaskEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger?.error("Task event listener error", {
          taskId: event.taskId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  getStats(): { total: number; byState: Record<TaskState, number> } {
    const byState: Record<TaskState, number> = {
      Queued: 0,
      Running: 0,
      Succeeded: 0,
      Failed: 0,
      Retrying: 0,
      Cancelled: 0,
      DeadLettered: 0,
    };

    for (const task of this.tasks.values()) {
      byState[task.state]++;
    }

    return {
      total: this.tasks.size,
      byState,
    };
  }
}
