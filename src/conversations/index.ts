export {
  transition,
  initialActions,
  isTerminalPhase,
  DEFAULT_CONVERSATION_RULES,
  type TransitionInput,
  type TransitionResult,
} from "./ConversationStateMachine.js";
export { classifyOutcome } from "./OutcomeClassifier.js";
export { InMemoryConversationRepository, type ConversationRepository } from "./ConversationRepository.js";
export { FileConversationRepository } from "./FileConversationRepository.js";
