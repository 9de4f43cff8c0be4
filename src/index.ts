// Main entry point

import type { Executor, SystemConfig } from "./types/index.js";
import { ensureStorageDirectories, loadConfig } from "./config/index.js";
import { Orchestrator } from "./orchestrator/Orchestrator.js";
import type { ConversationRepository } from "./conversations/ConversationRepository.js";
import { FileConversationRepository } from "./conversations/FileConversationRepository.js";
import { createOpenAIExecutorFromConfig } from "./llm/OpenAIExecutor.js";
import { createOfflineExecutor } from "./llm/OfflineExecutor.js";
import { createLogger } from "./utils/logger.js";

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./orchestrator/index.js";
export * from "./conversations/index.js";
export * from "./llm/index.js";
export * from "./utils/errors.js";
export * from "./utils/logger.js";

export interface CreateOrchestratorOptions {
  config?: SystemConfig;
  executor?: Executor;
  repository?: ConversationRepository;
}

/**
 * Wire an orchestrator from configuration. Without an explicit executor the
 * OpenAI executor is used when an API key is configured, the offline one
 * otherwise. Conversations go to file storage when a storage path is set.
 */
export function createOrchestrator(options: CreateOrchestratorOptions = {}): Orchestrator {
  const config = options.config ?? loadConfig();
  ensureStorageDirectories(config);
  const logger = createLogger(config);

  const executor =
    options.executor ??
    createOpenAIExecutorFromConfig(config.llm, logger.forLayer("executor")) ??
    createOfflineExecutor();

  const repository =
    options.repository ??
    (config.storage ? new FileConversationRepository(config.storage.conversationsPath, logger) : undefined);

  return new Orchestrator(config, { executor, repository, logger });
}
