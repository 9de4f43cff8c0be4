// Configuration loader and validator

import fs from "fs";
import path from "path";
import { homedir } from "os";
import { z } from "zod";
import type { SystemConfig, LLMConfig } from "../types/index.js";

const DEFAULT_CONFIG_PATH = path.join(homedir(), ".parley", "config.json");
const DEFAULT_STORAGE_BASE = path.join(homedir(), ".parley");

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Shape of the config file. Every section is optional; missing values fall back to defaults.
 */
const ConfigFileSchema = z
  .object({
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    retry: z
      .object({
        maxAttempts: positiveInt,
        baseDelayMs: nonNegativeInt,
        maxDelayMs: nonNegativeInt,
      })
      .partial(),
    timeouts: z
      .object({
        softTimeoutMs: positiveInt,
        hardTimeoutMs: positiveInt,
      })
      .partial(),
    workers: z
      .object({
        concurrency: positiveInt,
        leaseMs: positiveInt,
        contentionDelayMs: nonNegativeInt,
        watchdogIntervalMs: positiveInt,
      })
      .partial(),
    conversation: z
      .object({
        abandonAfterDisengaged: positiveInt,
        discoveryMessageLimit: positiveInt,
        maxMessages: positiveInt,
      })
      .partial(),
    taskRetentionMs: nonNegativeInt,
    storage: z.object({
      conversationsPath: z.string().min(1),
      logsPath: z.string().min(1),
    }),
    llm: z
      .object({
        apiKey: z.string(),
        model: z.string(),
        temperature: z.number().min(0).max(2),
        maxTokens: positiveInt,
      })
      .partial(),
  })
  .partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function getDefaultConfig(): SystemConfig {
  return {
    logLevel: "info",
    retry: {
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 60000,
    },
    timeouts: {
      softTimeoutMs: 240000, // 4 minutes
      hardTimeoutMs: 300000, // 5 minutes
    },
    workers: {
      concurrency: 4,
      leaseMs: 360000,
      contentionDelayMs: 250,
      watchdogIntervalMs: 30000,
    },
    conversation: {
      abandonAfterDisengaged: 3,
      discoveryMessageLimit: 4,
      maxMessages: 15,
    },
    taskRetentionMs: 3600000, // 1 hour
    storage: {
      conversationsPath: path.join(DEFAULT_STORAGE_BASE, "conversations"),
      logsPath: path.join(DEFAULT_STORAGE_BASE, "logs"),
    },
  };
}

/**
 * Merge a validated config file over the defaults, section by section.
 */
export function mergeWithDefaults(file: ConfigFile): SystemConfig {
  const defaults = getDefaultConfig();
  return {
    logLevel: file.logLevel ?? defaults.logLevel,
    retry: {
      maxAttempts: file.retry?.maxAttempts ?? defaults.retry.maxAttempts,
      baseDelayMs: file.retry?.baseDelayMs ?? defaults.retry.baseDelayMs,
      maxDelayMs: file.retry?.maxDelayMs ?? defaults.retry.maxDelayMs,
    },
    timeouts: {
      softTimeoutMs: file.timeouts?.softTimeoutMs ?? defaults.timeouts.softTimeoutMs,
      hardTimeoutMs: file.timeouts?.hardTimeoutMs ?? defaults.timeouts.hardTimeoutMs,
    },
    workers: {
      concurrency: file.workers?.concurrency ?? defaults.workers.concurrency,
      leaseMs: file.workers?.leaseMs ?? defaults.workers.leaseMs,
      contentionDelayMs: file.workers?.contentionDelayMs ?? defaults.workers.contentionDelayMs,
      watchdogIntervalMs: file.workers?.watchdogIntervalMs ?? defaults.workers.watchdogIntervalMs,
    },
    conversation: {
      abandonAfterDisengaged:
        file.conversation?.abandonAfterDisengaged ?? defaults.conversation.abandonAfterDisengaged,
      discoveryMessageLimit: file.conversation?.discoveryMessageLimit ?? defaults.conversation.discoveryMessageLimit,
      maxMessages: file.conversation?.maxMessages ?? defaults.conversation.maxMessages,
    },
    taskRetentionMs: file.taskRetentionMs ?? defaults.taskRetentionMs,
    storage: file.storage ?? defaults.storage,
    llm: file.llm,
  };
}

/**
 * Validate raw config data. Throws with the zod issue list when invalid.
 */
export function parseConfig(raw: unknown): SystemConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return mergeWithDefaults(result.data);
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const filePath = configPath || getConfigPath(env);

  if (!fs.existsSync(filePath)) {
    return applyEnvironmentVariables(getDefaultConfig(), env);
  }

  try {
    const content = fs.readFileSync(filePath, "utf-8");
    return applyEnvironmentVariables(parseConfig(JSON.parse(content)), env);
  } catch (error) {
    console.warn(
      `Failed to load config from ${filePath}, using defaults: ${error instanceof Error ? error.message : String(error)}`
    );
    return applyEnvironmentVariables(getDefaultConfig(), env);
  }
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined) {return undefined;}
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Apply environment variables to config
 * Priority: env > config.json > defaults
 */
export function applyEnvironmentVariables(config: SystemConfig, env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const result: SystemConfig = {
    ...config,
    retry: { ...config.retry },
    timeouts: { ...config.timeouts },
    workers: { ...config.workers },
    conversation: { ...config.conversation },
  };

  const workers = readInt(env.PARLEY_WORKERS);
  if (workers !== undefined && workers > 0) {
    result.workers.concurrency = workers;
  }

  const maxAttempts = readInt(env.PARLEY_MAX_ATTEMPTS);
  if (maxAttempts !== undefined && maxAttempts > 0) {
    result.retry.maxAttempts = maxAttempts;
  }

  const baseDelay = readInt(env.PARLEY_RETRY_BASE_MS);
  if (baseDelay !== undefined && baseDelay >= 0) {
    result.retry.baseDelayMs = baseDelay;
  }

  const maxDelay = readInt(env.PARLEY_RETRY_MAX_MS);
  if (maxDelay !== undefined && maxDelay >= 0) {
    result.retry.maxDelayMs = maxDelay;
  }

  const softTimeout = readInt(env.PARLEY_SOFT_TIMEOUT_MS);
  if (softTimeout !== undefined && softTimeout > 0) {
    result.timeouts.softTimeoutMs = softTimeout;
  }

  const hardTimeout = readInt(env.PARLEY_HARD_TIMEOUT_MS);
  if (hardTimeout !== undefined && hardTimeout > 0) {
    result.timeouts.hardTimeoutMs = hardTimeout;
  }

  const logLevel = env.PARLEY_LOG_LEVEL;
  if (logLevel === "debug" || logLevel === "info" || logLevel === "warn" || logLevel === "error") {
    result.logLevel = logLevel;
  }

  if (env.PARLEY_STORAGE_DIR) {
    result.storage = {
      conversationsPath: path.join(env.PARLEY_STORAGE_DIR, "conversations"),
      logsPath: path.join(env.PARLEY_STORAGE_DIR, "logs"),
    };
  }

  result.llm = applyLLMEnvironmentVariables(config.llm, env);

  return result;
}

/**
 * Apply LLM environment variables to config
 */
function applyLLMEnvironmentVariables(llmConfig: LLMConfig | undefined, env: NodeJS.ProcessEnv): LLMConfig | undefined {
  const llm: LLMConfig = llmConfig ? { ...llmConfig } : {};

  if (env.OPENAI_API_KEY) {
    llm.apiKey = env.OPENAI_API_KEY;
  }

  if (env.OPENAI_MODEL) {
    llm.model = env.OPENAI_MODEL;
  }

  // Return undefined if no LLM config is set
  if (Object.keys(llm).length === 0) {
    return undefined;
  }

  return llm;
}

export function ensureStorageDirectories(config: SystemConfig): void {
  const storage = config.storage;
  if (!storage) {return;}

  if (!fs.existsSync(storage.conversationsPath)) {
    fs.mkdirSync(storage.conversationsPath, { recursive: true });
  }

  if (!fs.existsSync(storage.logsPath)) {
    fs.mkdirSync(storage.logsPath, { recursive: true });
  }
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.PARLEY_CONFIG;
  if (envPath) {return envPath;}
  return DEFAULT_CONFIG_PATH;
}
