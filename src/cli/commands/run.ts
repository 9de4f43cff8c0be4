/**
 * Run command - push an events file through an in-process orchestrator
 */

import fs from "fs";
import path from "path";
import Table from "cli-table3";
import chalk from "chalk";
import type { RunOptions, RunReport, RejectedEvent } from "../types.js";
import type { Conversation, Executor, SystemConfig } from "../../types/index.js";
import { loadConfig, ensureStorageDirectories } from "../../config/index.js";
import { Orchestrator } from "../../orchestrator/Orchestrator.js";
import { FileConversationRepository } from "../../conversations/FileConversationRepository.js";
import { InMemoryConversationRepository } from "../../conversations/ConversationRepository.js";
import { createOfflineExecutor } from "../../llm/OfflineExecutor.js";
import { createOpenAIExecutorFromConfig } from "../../llm/OpenAIExecutor.js";
import { ValidationError } from "../../utils/errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatState, formatValue, printError, printHeader, printSuccess, printWarning } from "../utils/output.js";

const DEFAULT_WAIT_MS = 60000;

/**
 * Submit every event in order, wait for all accepted tasks to settle, and
 * collect the final task and conversation state.
 */
export async function runEvents(
  events: unknown[],
  config: SystemConfig,
  options: RunOptions = {},
  executor: Executor = createOfflineExecutor()
): Promise<RunReport> {
  const logger = createLogger(config);
  const repository =
    options.persist && config.storage
      ? new FileConversationRepository(config.storage.conversationsPath, logger)
      : new InMemoryConversationRepository();

  const orchestrator = new Orchestrator(config, {
    executor,
    repository,
    logger,
  });

  const rejected: RejectedEvent[] = [];
  const taskIds: string[] = [];

  orchestrator.start();
  try {
    for (const [index, event] of events.entries()) {
      try {
        taskIds.push(await orchestrator.submit(event));
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        rejected.push({ index, message: error.message });
      }
    }

    const timeoutMs = options.timeout ?? DEFAULT_WAIT_MS;
    const tasks = await Promise.all(taskIds.map((id) => orchestrator.waitFor(id, { timeoutMs })));

    const conversationIds = [...new Set(tasks.flatMap((t) => (t.conversationKey === null ? [] : [t.conversationKey])))];
    const conversations: Conversation[] = [];
    for (const id of conversationIds) {
      const conversation = await orchestrator.getConversation(id);
      if (conversation) {
        conversations.push(conversation);
      }
    }

    return { tasks, conversations, rejected, stats: orchestrator.getStats() };
  } finally {
    await orchestrator.shutdown();
  }
}

function readEventsFile(filePath: string): unknown[] {
  const resolvedPath = path.resolve(filePath);
  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`File not found: ${resolvedPath}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(resolvedPath, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error("Events file must contain a JSON array of events");
  }
  return parsed;
}

function printReport(report: RunReport): void {
  printHeader("Tasks");
  const taskTable = new Table({
    head: ["task", "queue", "conversation", "state", "attempts", "result / error"].map((h) => chalk.cyan(h)),
  });
  for (const task of report.tasks) {
    taskTable.push([
      task.taskId.slice(0, 8),
      task.queue,
      task.conversationKey?.slice(0, 8) ?? chalk.gray("-"),
      formatState(task.state),
      `${task.attempt}/${task.maxAttempts}`,
      task.result?.text ?? (task.error ? chalk.red(`${task.error.code}: ${task.error.message}`) : chalk.gray("-")),
    ]);
  }
  console.log(taskTable.toString());

  if (report.conversations.length > 0) {
    printHeader("Conversations");
    const conversationTable = new Table({
      head: ["conversation", "customer", "branch", "phase", "messages", "next actions"].map((h) => chalk.cyan(h)),
    });
    for (const conversation of report.conversations) {
      conversationTable.push([
        conversation.id.slice(0, 8),
        conversation.customerId,
        conversation.branch,
        conversation.phase,
        String(conversation.messageCount),
        formatValue(conversation.lastActions),
      ]);
    }
    console.log(conversationTable.toString());
  }

  for (const rejected of report.rejected) {
    printWarning(`Event #${rejected.index} rejected: ${rejected.message}`);
  }

  const { byState } = report.stats.tasks;
  printSuccess(
    `${byState.Succeeded} succeeded, ${byState.DeadLettered} dead-lettered, ${byState.Cancelled} cancelled`
  );
}

export async function runCommand(filePath: string, options: RunOptions): Promise<void> {
  const loaded = loadConfig();
  const config: SystemConfig = {
    ...loaded,
    logLevel: options.verbose ? "debug" : "warn",
    workers: { ...loaded.workers, concurrency: options.workers ?? loaded.workers.concurrency },
  };
  ensureStorageDirectories(config);

  let executor = createOfflineExecutor();
  if (options.openai) {
    const openai = createOpenAIExecutorFromConfig(config.llm, createLogger(config).forLayer("executor"));
    if (!openai) {
      printError("OPENAI_API_KEY is not configured");
      process.exitCode = 1;
      return;
    }
    executor = openai;
  }

  let report: RunReport;
  try {
    report = await runEvents(readEventsFile(filePath), config, options, executor);
  } catch (error) {
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }
}
