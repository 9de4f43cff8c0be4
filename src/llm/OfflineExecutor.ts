// Deterministic executor with canned replies, used by the CLI and in tests

import type { ExecutionContext, ExecutionResult, Executor, RecommendedAction, TaskPayload } from "../types/index.js";
import { classifyOutcome } from "../conversations/OutcomeClassifier.js";
import { PermanentError, TransientError } from "../utils/errors.js";

const REPLIES: Record<RecommendedAction, string> = {
  "send-welcome": "Hi! Thanks for reaching out. How can I help you today?",
  "assess-needs": "What are you looking for, and what matters most to you?",
  "present-products": "Here are a few options that match what you described.",
  "handle-objection": "I understand. Let me explain what makes this worth it.",
  "recover-interest": "No pressure at all. Is there anything that would make this a better fit?",
  "recommend-alternatives": "If that one isn't right, these alternatives might suit you better.",
  "close-sale": "Great choice! I'll send you the order details now.",
  handoff: "I'm connecting you with a member of our team who can finish this with you.",
  "end-conversation": "Thanks for your time. Feel free to message us whenever you like.",
};

const ANALYTICS_REPLY = "Report generated.";

function readNumber(context: Record<string, unknown>, key: string): number {
  const value = context[key];
  return typeof value === "number" ? value : 0;
}

/**
 * Replies with the text for the conversation's first recommended action.
 *
 * Failure injection through the payload context:
 * - `failAttempts: n` throws a TransientError on attempts 1..n
 * - `failPermanently: true` throws a PermanentError
 * - `delayMs: n` waits before replying, honouring the abort signal
 */
export function createOfflineExecutor(): Executor {
  return async (payload: TaskPayload, context: ExecutionContext): Promise<ExecutionResult> => {
    const delayMs = readNumber(payload.context, "delayMs");
    if (delayMs > 0) {
      await sleep(delayMs, context.signal);
    }

    if (payload.context.failPermanently === true) {
      throw new PermanentError("Simulated permanent failure");
    }
    if (context.attempt <= readNumber(payload.context, "failAttempts")) {
      throw new TransientError(`Simulated transient failure on attempt ${context.attempt}`);
    }

    const action = payload.conversation?.actions[0];
    return {
      text: action ? REPLIES[action] : ANALYTICS_REPLY,
      outcome: payload.conversation ? classifyOutcome(payload.text) : undefined,
    };
  };
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
