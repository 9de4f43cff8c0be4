/**
 * Orchestrator Module
 *
 * Task lifecycle, priority dispatch, per-conversation serialization and the
 * worker pool that executes tasks.
 */

export { Orchestrator, type OrchestratorDeps } from "./Orchestrator.js";
export { TaskStore, isValidTransition, type CreateTaskInput, type TaskFilter, type TaskPatch } from "./TaskStore.js";
export { PriorityQueue } from "./PriorityQueue.js";
export { ConversationBacklog } from "./ConversationBacklog.js";
export { ConversationLock, type Lease } from "./ConversationLock.js";
export { WorkerPool, type WorkerPoolConfig, type WorkerPoolDeps } from "./WorkerPool.js";
export { runGuarded, type GuardedCall } from "./ExecutionGuard.js";
export { computeBackoffDelay } from "./Backoff.js";
export {
  ConversationEventSchema,
  CATEGORY_QUEUES,
  type ConversationEvent,
  type ConversationEventInput,
  type EventCategory,
  type OrchestratorStats,
  type ConversationMetrics,
  type WaitOptions,
} from "./types.js";
