/**
 * CLI types and interfaces
 */

import type { Conversation, TaskStatus } from "../types/index.js";
import type { OrchestratorStats } from "../orchestrator/types.js";

/** CLI command options */
export interface CliOptions {
  json?: boolean;
  verbose?: boolean;
}

/** Output format */
export type OutputFormat = "table" | "json";

/** Options for `parley run` */
export interface RunOptions extends CliOptions {
  workers?: number;
  persist?: boolean;
  /** Use the OpenAI executor instead of canned replies */
  openai?: boolean;
  timeout?: number;
}

/** An event file entry that failed validation */
export interface RejectedEvent {
  index: number;
  message: string;
}

/** Everything `parley run` reports */
export interface RunReport {
  tasks: TaskStatus[];
  conversations: Conversation[];
  rejected: RejectedEvent[];
  stats: OrchestratorStats;
}
