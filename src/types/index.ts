// Core Types for the Parley orchestration engine

/**
 * Priority lane inside the dispatch queue. Lanes are drained high → medium → low.
 */
export type Lane = "high" | "medium" | "low";

export const LANES: readonly Lane[] = ["high", "medium", "low"] as const;

/**
 * Named work queues. Each maps to exactly one lane.
 */
export type QueueName = "conversations" | "webhooks" | "analytics";

export const QUEUE_LANES: Record<QueueName, Lane> = {
  conversations: "high",
  webhooks: "medium",
  analytics: "low",
};

/**
 * Task states for the orchestrator state machine.
 */
export type TaskState =
  | "Queued"
  | "Running"
  | "Succeeded"
  | "Failed"
  | "Retrying"
  | "Cancelled"
  | "DeadLettered";

export const TERMINAL_TASK_STATES: readonly TaskState[] = ["Succeeded", "Cancelled", "DeadLettered"] as const;

/** States in which a task still owns its conversation slot. */
export const ACTIVE_TASK_STATES: readonly TaskState[] = ["Queued", "Running", "Retrying"] as const;

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}

/**
 * Fixed conversational strategy chosen when a conversation is created.
 * Manipulator is product-led (ad or product context), Convincer is discovery-led.
 */
export type Branch = "Manipulator" | "Convincer";

export type Phase = "Welcome" | "Discovery" | "Negotiation" | "Closing" | "Abandoned";

/**
 * Classified result of one executor call, as seen by the state machine.
 */
export type Outcome = "engaged" | "neutral" | "disengaged" | "ready-to-close";

/**
 * Dialogue strategies the state machine can recommend to the next executor call.
 */
export type RecommendedAction =
  | "send-welcome"
  | "assess-needs"
  | "present-products"
  | "handle-objection"
  | "recover-interest"
  | "recommend-alternatives"
  | "close-sale"
  | "handoff"
  | "end-conversation";

/**
 * A logical dialogue with one customer on one business.
 */
export interface Conversation {
  id: string;
  customerId: string;
  businessId: string;
  /** Fixed at creation */
  branch: Branch;
  phase: Phase;
  /** Monotonically increasing count of handled customer messages */
  messageCount: number;
  /** Consecutive disengaged outcomes */
  disengagedStreak: number;
  /** Actions recommended by the latest transition */
  lastActions: RecommendedAction[];
  createdAt: number;
  lastActivityAt: number;
  /** Set when this conversation replaced a terminal one */
  previousConversationId?: string;
}

/**
 * Data handed to the executor. Opaque to the scheduling core.
 */
export interface TaskPayload {
  /** Customer message text, webhook body summary, or report name */
  text: string;
  /** Free-form context (product ids, platform, report range, ...) */
  context: Record<string, unknown>;
  /** Conversation snapshot at submission time, when the task belongs to one */
  conversation?: {
    id: string;
    branch: Branch;
    phase: Phase;
    messageCount: number;
    actions: RecommendedAction[];
  };
}

/**
 * Successful executor output stored on the task.
 */
export interface TaskResult {
  text: string;
  outcome?: Outcome;
  data?: Record<string, unknown>;
}

export type TaskErrorKind = "transient" | "permanent" | "timeout";

/**
 * Error information for failed or retried tasks.
 */
export interface TaskError {
  /** Machine-readable error code */
  code: string;
  message: string;
  kind: TaskErrorKind;
  /** Stack trace for debugging */
  stack?: string;
}

export interface TaskTransition {
  state: TaskState;
  at: number;
}

/**
 * Task entity managed by the TaskStore.
 */
export interface TaskRecord {
  /** Unique task identifier (UUID) */
  id: string;
  queue: QueueName;
  lane: Lane;
  /** Conversation this task serializes against; null for queue-independent work */
  conversationKey: string | null;
  payload: TaskPayload;
  state: TaskState;
  /** Executions started so far */
  attempt: number;
  maxAttempts: number;
  createdAt: number;
  /** Start of the latest attempt */
  startedAt?: number;
  completedAt?: number;
  updatedAt: number;
  result?: TaskResult;
  /** Latest error; final error once dead-lettered */
  error?: TaskError;
  history: TaskTransition[];
  retryDelaysMs: number[];
  /** Id of the dead-lettered task this one re-runs */
  reprocessedFrom?: string;
}

/**
 * Event emitted when task state changes.
 */
export interface TaskEvent {
  taskId: string;
  conversationKey: string | null;
  previousState: TaskState | null;
  newState: TaskState;
  timestamp: number;
}

/**
 * Read-only status snapshot returned to pollers.
 */
export interface TaskStatus {
  taskId: string;
  queue: QueueName;
  conversationKey: string | null;
  state: TaskState;
  attempt: number;
  maxAttempts: number;
  result?: TaskResult;
  error?: TaskError;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

/**
 * Context passed to every executor invocation.
 */
export interface ExecutionContext {
  taskId: string;
  attempt: number;
  queue: QueueName;
  /** Fired when the hard timeout elapses */
  signal: AbortSignal;
}

export interface ExecutionResult {
  text: string;
  outcome?: Outcome;
  data?: Record<string, unknown>;
}

/**
 * The opaque unit of work: wraps the AI call and any lookups around it.
 * Must be safe to retry. Thrown errors are classified by classifyError().
 */
export type Executor = (payload: TaskPayload, context: ExecutionContext) => Promise<ExecutionResult>;

/**
 * Pluggable dispatch queue with lane semantics.
 */
export interface QueueBackend<T> {
  enqueue(item: T, lane: Lane): void;
  dequeue(signal?: AbortSignal): Promise<T | undefined>;
  tryDequeue(): T | undefined;
  remove(item: T): boolean;
  size(lane?: Lane): number;
  getStats(): QueueStats;
  close(): void;
}

export interface QueueStats {
  lanes: Record<Lane, number>;
  totalItems: number;
  waiters: number;
}

// ─── Configuration ─────────────────────────────────────────────────────────────

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface TimeoutConfig {
  /** Exceeding this is logged; the call continues */
  softTimeoutMs: number;
  /** Exceeding this fails the attempt as a transient TIMEOUT */
  hardTimeoutMs: number;
}

export interface WorkerConfig {
  concurrency: number;
  leaseMs: number;
  contentionDelayMs: number;
  watchdogIntervalMs: number;
}

export interface ConversationRulesConfig {
  abandonAfterDisengaged: number;
  discoveryMessageLimit: number;
  maxMessages: number;
}

export interface StorageConfig {
  conversationsPath: string;
  logsPath: string;
}

export interface LLMConfig {
  /** OpenAI API key (overrides OPENAI_API_KEY env var) */
  apiKey?: string;
  /** Model used by the OpenAI executor (default: gpt-4o-mini) */
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface SystemConfig {
  logLevel: LogEntry["level"];
  retry: RetryConfig;
  timeouts: TimeoutConfig;
  workers: WorkerConfig;
  conversation: ConversationRulesConfig;
  /** Terminal tasks older than this are dropped by cleanup() */
  taskRetentionMs: number;
  storage?: StorageConfig;
  llm?: LLMConfig;
}

// ─── Logging ───────────────────────────────────────────────────────────────────

export type ServiceLayer =
  | "orchestrator"
  | "queue"
  | "worker"
  | "lock"
  | "state"
  | "store"
  | "executor"
  | "config"
  | "cli";

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  layer: ServiceLayer;
  startTime: number;
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  layer?: ServiceLayer;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
}
