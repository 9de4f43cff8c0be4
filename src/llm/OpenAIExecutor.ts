// OpenAI-backed executor: one chat completion per task

import OpenAI from "openai";
import type { ExecutionContext, ExecutionResult, Executor, LLMConfig, TaskPayload } from "../types/index.js";
import { classifyOutcome } from "../conversations/OutcomeClassifier.js";
import { PermanentError, TransientError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";

export interface CompletionRequest {
  model: string;
  messages: OpenAI.Chat.ChatCompletionMessageParam[];
  temperature?: number;
  max_tokens?: number;
}

export interface CompletionResponse {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
}

/**
 * The slice of the OpenAI client the executor calls.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: CompletionRequest, options?: { signal?: AbortSignal }): Promise<CompletionResponse>;
    };
  };
}

export interface OpenAIExecutorOptions {
  client: ChatCompletionClient;
  model: string;
  temperature?: number;
  maxTokens?: number;
  logger?: LayerLogger;
}

const DEFAULT_MODEL = "gpt-4o-mini";

const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 422]);

export function buildMessages(payload: TaskPayload): OpenAI.Chat.ChatCompletionMessageParam[] {
  const conversation = payload.conversation;
  const lines = ["You are a sales assistant replying to a customer on behalf of a business."];

  if (conversation) {
    lines.push(`Conversation phase: ${conversation.phase}.`);
    lines.push(`Strategy: ${conversation.branch === "Manipulator" ? "product-led" : "discovery-led"}.`);
    if (conversation.actions.length > 0) {
      lines.push(`Next steps: ${conversation.actions.join(", ")}.`);
    }
  }

  const contextEntries = Object.entries(payload.context);
  if (contextEntries.length > 0) {
    lines.push(`Context: ${JSON.stringify(payload.context)}`);
  }

  return [
    { role: "system", content: lines.join("\n") },
    { role: "user", content: payload.text },
  ];
}

/**
 * Map provider failures onto the retry taxonomy.
 */
export function toExecutorError(error: unknown): Error {
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransientError(`OpenAI connection failed: ${error.message}`, { code: "PROVIDER_UNAVAILABLE", cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === 429) {
      return new TransientError(`OpenAI rate limit: ${error.message}`, { code: "RATE_LIMITED", cause: error });
    }
    if (status !== undefined && status >= 500) {
      return new TransientError(`OpenAI server error: ${error.message}`, { code: "PROVIDER_ERROR", cause: error });
    }
    if (status !== undefined && PERMANENT_STATUSES.has(status)) {
      return new PermanentError(`OpenAI rejected the request: ${error.message}`, { code: "PROVIDER_REJECTED", cause: error });
    }
  }

  return error instanceof Error ? error : new Error(String(error));
}

export function createOpenAIExecutor(options: OpenAIExecutorOptions): Executor {
  const { client, model, logger } = options;

  return async (payload: TaskPayload, context: ExecutionContext): Promise<ExecutionResult> => {
    let response: CompletionResponse;
    try {
      response = await client.chat.completions.create(
        {
          model,
          messages: buildMessages(payload),
          temperature: options.temperature ?? 0.7,
          max_tokens: options.maxTokens ?? 500,
        },
        { signal: context.signal }
      );
    } catch (error) {
      throw toExecutorError(error);
    }

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new PermanentError("Empty response from OpenAI", { code: "EMPTY_COMPLETION" });
    }

    logger?.debug("Completion received", { taskId: context.taskId, model: response.model, length: content.length });

    return {
      text: content,
      outcome: classifyOutcome(payload.text),
      data: { model: response.model },
    };
  };
}

/**
 * Build an executor from configuration. Returns null without an API key.
 */
export function createOpenAIExecutorFromConfig(config: LLMConfig | undefined, logger?: LayerLogger): Executor | null {
  const apiKey = config?.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    return null;
  }

  return createOpenAIExecutor({
    client: new OpenAI({ apiKey }),
    model: config?.model ?? DEFAULT_MODEL,
    temperature: config?.temperature,
    maxTokens: config?.maxTokens,
    logger,
  });
}
