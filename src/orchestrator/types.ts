/**
 * Orchestrator Types
 */

import { z } from "zod";
import type { Lane, QueueName, QueueStats, TaskState } from "../types/index.js";

/** Conversation ids double as file names in file-backed storage */
export const CONVERSATION_ID_PATTERN = /^[A-Za-z0-9_.:-]+$/;

const ConversationEventFields = {
  customerId: z.string().min(1),
  businessId: z.string().min(1),
  /** Continue this conversation; omitted to use the customer's current one */
  conversationId: z.string().regex(CONVERSATION_ID_PATTERN).optional(),
  /** Branch for a newly created conversation; inferred from context when omitted */
  branch: z.enum(["Manipulator", "Convincer"]).optional(),
  text: z.string().min(1),
  context: z.record(z.unknown()).default({}),
  maxAttempts: z.number().int().min(1).max(20).optional(),
};

/**
 * Inbound unit of work. Message and webhook events belong to a conversation;
 * analytics events never do.
 */
export const ConversationEventSchema = z.discriminatedUnion("category", [
  z.object({ category: z.literal("message"), ...ConversationEventFields }),
  z.object({ category: z.literal("webhook"), ...ConversationEventFields }),
  z.object({
    category: z.literal("analytics"),
    businessId: z.string().min(1).optional(),
    text: z.string().min(1),
    context: z.record(z.unknown()).default({}),
    maxAttempts: z.number().int().min(1).max(20).optional(),
  }),
]);

export type ConversationEventInput = z.input<typeof ConversationEventSchema>;
export type ConversationEvent = z.output<typeof ConversationEventSchema>;
export type EventCategory = ConversationEvent["category"];

export const CATEGORY_QUEUES: Record<EventCategory, QueueName> = {
  message: "conversations",
  webhook: "webhooks",
  analytics: "analytics",
};

export interface WaitOptions {
  /** Reject when the task is still not settled after this long */
  timeoutMs?: number;
}

export interface ConversationMetrics {
  started: number;
  closed: number;
  abandoned: number;
  /** Mean messageCount of conversations that reached Closing or Abandoned */
  averageMessagesAtConclusion: number;
  /** Conversations currently open, one per business/customer pair */
  active: number;
}

export interface OrchestratorStats {
  tasks: { total: number; byState: Record<TaskState, number> };
  queue: QueueStats;
  lanes: Record<Lane, number>;
  backlog: { conversations: number; waiting: number; inFlight: number };
  workers: { size: number; active: number };
  locks: number;
  conversations: ConversationMetrics;
  /** Tasks with a pending waitFor() caller */
  pendingWaits: number;
}
