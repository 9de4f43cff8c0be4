export {
  createOpenAIExecutor,
  createOpenAIExecutorFromConfig,
  buildMessages,
  toExecutorError,
  type ChatCompletionClient,
  type CompletionRequest,
  type CompletionResponse,
  type OpenAIExecutorOptions,
} from "./OpenAIExecutor.js";
export { createOfflineExecutor } from "./OfflineExecutor.js";
