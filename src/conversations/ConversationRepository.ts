// Conversation persistence contract and in-memory implementation

import type { Conversation } from "../types/index.js";

/**
 * Storage for conversations. The engine never deletes conversations.
 */
export interface ConversationRepository {
  load(conversationId: string): Promise<Conversation | undefined>;
  save(conversation: Conversation): Promise<void>;
  list(): Promise<Conversation[]>;
}

export class InMemoryConversationRepository implements ConversationRepository {
  private conversations = new Map<string, Conversation>();

  async load(conversationId: string): Promise<Conversation | undefined> {
    const conversation = this.conversations.get(conversationId);
    return conversation ? structuredClone(conversation) : undefined;
  }

  async save(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async list(): Promise<Conversation[]> {
    return Array.from(this.conversations.values()).map((c) => structuredClone(c));
  }
}
