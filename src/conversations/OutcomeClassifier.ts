/**
 * OutcomeClassifier
 *
 * Keyword fallback used when the AI provider returns no outcome of its own.
 * Checks run in order: disengaged, ready-to-close, engaged, then neutral.
 */

import type { Outcome } from "../types/index.js";

const DISENGAGED_PHRASES = [
  "not interested",
  "don't want",
  "do not want",
  "too expensive",
  "stop messaging",
  "leave me alone",
  "no thanks",
  "no thank you",
  "goodbye",
  "bye",
  "no",
];

const READY_TO_CLOSE_PHRASES = [
  "buy",
  "purchase",
  "order it",
  "place an order",
  "checkout",
  "check out",
  "take it",
  "i'll take",
  "sign me up",
  "ready to proceed",
  "how do i pay",
];

const ENGAGED_PHRASES = [
  "yes",
  "interested",
  "tell me more",
  "sounds good",
  "love",
  "great",
  "how much",
  "price",
  "available",
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compile(phrases: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${phrases.map(escapeRegExp).join("|")})\\b`, "i");
}

const DISENGAGED = compile(DISENGAGED_PHRASES);
const READY_TO_CLOSE = compile(READY_TO_CLOSE_PHRASES);
const ENGAGED = compile(ENGAGED_PHRASES);

/**
 * Classify a customer message.
 */
export function classifyOutcome(message: string): Outcome {
  const text = message.trim();
  if (text.length === 0) {
    return "neutral";
  }

  if (DISENGAGED.test(text)) {
    return "disengaged";
  }
  if (READY_TO_CLOSE.test(text)) {
    return "ready-to-close";
  }
  if (ENGAGED.test(text)) {
    return "engaged";
  }
  return "neutral";
}
