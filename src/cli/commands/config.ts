/**
 * Config command - show the resolved configuration
 */

import fs from "fs";
import type { CliOptions } from "../types.js";
import type { SystemConfig } from "../../types/index.js";
import { loadConfig, getConfigPath } from "../../config/index.js";
import { formatOutput, printHeader, printInfo } from "../utils/output.js";

/**
 * Flatten the config into dotted keys, with the API key masked.
 */
export function describeConfig(config: SystemConfig): Record<string, string | number> {
  const rows: Record<string, string | number> = {
    logLevel: config.logLevel,
    "retry.maxAttempts": config.retry.maxAttempts,
    "retry.baseDelayMs": config.retry.baseDelayMs,
    "retry.maxDelayMs": config.retry.maxDelayMs,
    "timeouts.softTimeoutMs": config.timeouts.softTimeoutMs,
    "timeouts.hardTimeoutMs": config.timeouts.hardTimeoutMs,
    "workers.concurrency": config.workers.concurrency,
    "workers.leaseMs": config.workers.leaseMs,
    "workers.contentionDelayMs": config.workers.contentionDelayMs,
    "workers.watchdogIntervalMs": config.workers.watchdogIntervalMs,
    "conversation.abandonAfterDisengaged": config.conversation.abandonAfterDisengaged,
    "conversation.discoveryMessageLimit": config.conversation.discoveryMessageLimit,
    "conversation.maxMessages": config.conversation.maxMessages,
    taskRetentionMs: config.taskRetentionMs,
  };

  if (config.storage) {
    rows["storage.conversationsPath"] = config.storage.conversationsPath;
    rows["storage.logsPath"] = config.storage.logsPath;
  }
  if (config.llm?.model) {
    rows["llm.model"] = config.llm.model;
  }
  rows["llm.apiKey"] = config.llm?.apiKey ? "[REDACTED]" : "(not set)";

  return rows;
}

export async function configShow(options: CliOptions): Promise<void> {
  const configPath = getConfigPath();
  const rows = describeConfig(loadConfig());

  if (options.json) {
    console.log(formatOutput({ path: configPath, exists: fs.existsSync(configPath), config: rows }, "json"));
    return;
  }

  printHeader("Configuration");
  printInfo(`Config path: ${configPath}${fs.existsSync(configPath) ? "" : " (not found, using defaults)"}`);
  console.log(formatOutput(rows));
}
