/**
 * ConversationStateMachine
 *
 * Pure transition function for conversation phases. No I/O, no clock.
 */

import type { Branch, ConversationRulesConfig, Outcome, Phase, RecommendedAction } from "../types/index.js";

type ActivePhase = Exclude<Phase, "Closing" | "Abandoned">;

export interface TransitionInput {
  branch: Branch;
  phase: Phase;
  outcome: Outcome;
  /** Message count including the message just handled */
  messageCount: number;
  /** Consecutive disengaged outcomes before this one */
  disengagedStreak: number;
}

export interface TransitionResult {
  phase: Phase;
  disengagedStreak: number;
  actions: RecommendedAction[];
  /** Phase differs from the input phase */
  changed: boolean;
  terminal: boolean;
}

export const DEFAULT_CONVERSATION_RULES: ConversationRulesConfig = {
  abandonAfterDisengaged: 3,
  discoveryMessageLimit: 4,
  maxMessages: 15,
};

/**
 * Base transition table: branch × phase × outcome → next phase.
 * Welcome always leaves for the branch's intermediate phase.
 */
const NEXT_PHASE: Record<Branch, Record<ActivePhase, Record<Outcome, ActivePhase | "Closing">>> = {
  Manipulator: {
    Welcome: {
      "engaged": "Negotiation",
      "neutral": "Negotiation",
      "disengaged": "Negotiation",
      "ready-to-close": "Negotiation",
    },
    Discovery: {
      "engaged": "Negotiation",
      "neutral": "Discovery",
      "disengaged": "Discovery",
      "ready-to-close": "Closing",
    },
    Negotiation: {
      "engaged": "Negotiation",
      "neutral": "Negotiation",
      "disengaged": "Negotiation",
      "ready-to-close": "Closing",
    },
  },
  Convincer: {
    Welcome: {
      "engaged": "Discovery",
      "neutral": "Discovery",
      "disengaged": "Discovery",
      "ready-to-close": "Discovery",
    },
    Discovery: {
      "engaged": "Negotiation",
      "neutral": "Discovery",
      "disengaged": "Discovery",
      "ready-to-close": "Closing",
    },
    Negotiation: {
      "engaged": "Negotiation",
      "neutral": "Negotiation",
      "disengaged": "Negotiation",
      "ready-to-close": "Closing",
    },
  },
};

/**
 * Dialogue strategy for the phase a conversation lands in, by the outcome that led there.
 */
const ACTIONS: Record<ActivePhase, Record<Outcome, RecommendedAction[]>> = {
  Welcome: {
    "engaged": ["send-welcome"],
    "neutral": ["send-welcome"],
    "disengaged": ["send-welcome"],
    "ready-to-close": ["send-welcome"],
  },
  Discovery: {
    "engaged": ["assess-needs"],
    "neutral": ["assess-needs"],
    "disengaged": ["recover-interest"],
    "ready-to-close": ["assess-needs"],
  },
  Negotiation: {
    "engaged": ["present-products"],
    "neutral": ["handle-objection"],
    "disengaged": ["recover-interest", "recommend-alternatives"],
    "ready-to-close": ["present-products"],
  },
};

export function isTerminalPhase(phase: Phase): phase is "Closing" | "Abandoned" {
  return phase === "Closing" || phase === "Abandoned";
}

/**
 * Actions for a freshly created conversation sitting in Welcome.
 */
export function initialActions(branch: Branch): RecommendedAction[] {
  return branch === "Manipulator" ? ["send-welcome", "present-products"] : ["send-welcome", "assess-needs"];
}

export function transition(
  input: TransitionInput,
  rules: ConversationRulesConfig = DEFAULT_CONVERSATION_RULES
): TransitionResult {
  const { branch, phase, outcome, messageCount } = input;

  if (isTerminalPhase(phase)) {
    return {
      phase,
      disengagedStreak: input.disengagedStreak,
      actions: [],
      changed: false,
      terminal: true,
    };
  }

  const disengagedStreak = outcome === "disengaged" ? input.disengagedStreak + 1 : 0;

  if (disengagedStreak >= rules.abandonAfterDisengaged) {
    return finish(phase, "Abandoned", disengagedStreak, ["end-conversation"]);
  }

  let next: ActivePhase | "Closing" = NEXT_PHASE[branch][phase][outcome];

  if (next === "Discovery" && phase === "Discovery" && messageCount >= rules.discoveryMessageLimit) {
    next = "Negotiation";
  }

  if (next === "Closing") {
    return finish(phase, next, disengagedStreak, ["close-sale"]);
  }

  if (messageCount >= rules.maxMessages) {
    return finish(phase, "Closing", disengagedStreak, ["handoff"]);
  }

  return finish(phase, next, disengagedStreak, ACTIONS[next][outcome]);
}

function finish(
  from: Phase,
  to: Phase,
  disengagedStreak: number,
  actions: RecommendedAction[]
): TransitionResult {
  return {
    phase: to,
    disengagedStreak,
    actions: [...actions],
    changed: from !== to,
    terminal: isTerminalPhase(to),
  };
}
