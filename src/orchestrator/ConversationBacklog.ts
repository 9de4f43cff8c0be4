/**
 * ConversationBacklog
 *
 * Per-conversation admission control. At most one task per conversation is
 * admitted to the dispatch queue at a time; later tasks wait here in strict
 * FIFO order until the admitted one reaches a terminal state.
 */

export class ConversationBacklog {
  private waiting: Map<string, string[]> = new Map();
  private inFlight: Map<string, string> = new Map();

  /**
   * Admit a task if its conversation is idle, otherwise park it.
   * Returns true when the task was admitted.
   */
  admit(conversationKey: string, taskId: string): boolean {
    if (!this.inFlight.has(conversationKey)) {
      this.inFlight.set(conversationKey, taskId);
      return true;
    }

    let queue = this.waiting.get(conversationKey);
    if (!queue) {
      queue = [];
      this.waiting.set(conversationKey, queue);
    }
    queue.push(taskId);
    return false;
  }

  /**
   * Release the conversation slot held by a task and admit the next waiting one.
   * Returns the newly admitted task id, if any.
   */
  release(conversationKey: string, taskId: string): string | undefined {
    if (this.inFlight.get(conversationKey) !== taskId) {
      return undefined;
    }
    this.inFlight.delete(conversationKey);

    const queue = this.waiting.get(conversationKey);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waiting.delete(conversationKey);
    }

    if (next !== undefined) {
      this.inFlight.set(conversationKey, next);
    }
    return next;
  }

  /**
   * Remove a parked task (e.g. cancelled before admission).
   */
  remove(conversationKey: string, taskId: string): boolean {
    const queue = this.waiting.get(conversationKey);
    if (!queue) {
      return false;
    }

    const index = queue.indexOf(taskId);
    if (index === -1) {
      return false;
    }

    queue.splice(index, 1);
    if (queue.length === 0) {
      this.waiting.delete(conversationKey);
    }
    return true;
  }

  getInFlight(conversationKey: string): string | undefined {
    return this.inFlight.get(conversationKey);
  }

  isWaiting(conversationKey: string, taskId: string): boolean {
    return this.waiting.get(conversationKey)?.includes(taskId) ?? false;
  }

  /**
   * Number of parked tasks for a conversation.
   */
  size(conversationKey: string): number {
    return this.waiting.get(conversationKey)?.length ?? 0;
  }

  getStats(): { conversations: number; waiting: number; inFlight: number } {
    let waiting = 0;
    for (const queue of this.waiting.values()) {
      waiting += queue.length;
    }

    return {
      conversations: this.waiting.size,
      waiting,
      inFlight: this.inFlight.size,
    };
  }
}
