// File-backed conversation store: one JSON document per conversation

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Conversation } from "../types/index.js";
import type { ConversationRepository } from "./ConversationRepository.js";
import type { Logger } from "../utils/logger.js";

const ConversationSchema = z.object({
  id: z.string().min(1),
  customerId: z.string().min(1),
  businessId: z.string().min(1),
  branch: z.enum(["Manipulator", "Convincer"]),
  phase: z.enum(["Welcome", "Discovery", "Negotiation", "Closing", "Abandoned"]),
  messageCount: z.number().int().nonnegative(),
  disengagedStreak: z.number().int().nonnegative(),
  lastActions: z.array(
    z.enum([
      "send-welcome",
      "assess-needs",
      "present-products",
      "handle-objection",
      "recover-interest",
      "recommend-alternatives",
      "close-sale",
      "handoff",
      "end-conversation",
    ])
  ),
  createdAt: z.number(),
  lastActivityAt: z.number(),
  previousConversationId: z.string().optional(),
});

const SAFE_ID = /^[A-Za-z0-9_.:-]+$/;

export class FileConversationRepository implements ConversationRepository {
  private dir: string;
  private logger?: Logger;

  constructor(dir: string, logger?: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  async load(conversationId: string): Promise<Conversation | undefined> {
    const filePath = this.getConversationPath(conversationId);

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    const parsed = ConversationSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      this.logger?.error(`Corrupt conversation file: ${conversationId}`, {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      throw new Error(`Conversation file is invalid: ${filePath}`);
    }
    return parsed.data;
  }

  /**
   * Write via a temp file and rename so readers never see a partial document.
   */
  async save(conversation: Conversation): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const filePath = this.getConversationPath(conversation.id);
    const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(conversation, null, 2), "utf-8");
    await fs.rename(tmpPath, filePath);
  }

  async list(): Promise<Conversation[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const conversations: Conversation[] = [];
    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      const conversation = await this.load(file.slice(0, -".json".length));
      if (conversation) {
        conversations.push(conversation);
      }
    }
    return conversations;
  }

  private getConversationPath(conversationId: string): string {
    if (!SAFE_ID.test(conversationId)) {
      throw new Error(`Invalid conversation id for file storage: ${conversationId}`);
    }
    return path.join(this.dir, `${conversationId}.json`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
