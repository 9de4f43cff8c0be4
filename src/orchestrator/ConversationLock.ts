/**
 * ConversationLock
 *
 * Lease-based mutual exclusion keyed by conversation.
 * Leases expire only so that a crashed worker cannot hold a conversation
 * forever; normal completion always releases explicitly.
 */

import type { LayerLogger } from "../utils/logger.js";

export interface Lease {
  conversationKey: string;
  taskId: string;
  expiresAt: number;
}

export class ConversationLock {
  private leases: Map<string, Lease> = new Map();
  private now: () => number;
  private logger?: LayerLogger;

  constructor(options?: { now?: () => number; logger?: LayerLogger }) {
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger;
  }

  /**
   * Acquire the lease for a conversation.
   * Succeeds when no unexpired lease exists, or the lease already belongs to
   * the same task (re-entry renews the expiry).
   */
  tryAcquire(conversationKey: string, taskId: string, leaseMs: number): boolean {
    const now = this.now();
    const existing = this.leases.get(conversationKey);

    if (existing && existing.taskId !== taskId && existing.expiresAt > now) {
      return false;
    }

    if (existing && existing.taskId !== taskId) {
      this.logger?.warn("Taking over expired lease", {
        conversationKey,
        previousTaskId: existing.taskId,
        taskId,
      });
    }

    this.leases.set(conversationKey, { conversationKey, taskId, expiresAt: now + leaseMs });
    return true;
  }

  /**
   * Release the lease only if it is still owned by the given task.
   */
  release(conversationKey: string, taskId: string): boolean {
    const existing = this.leases.get(conversationKey);
    if (!existing || existing.taskId !== taskId) {
      return false;
    }

    this.leases.delete(conversationKey);
    return true;
  }

  /**
   * Current unexpired lease holder, if any.
   */
  holder(conversationKey: string): string | undefined {
    const lease = this.leases.get(conversationKey);
    if (!lease || lease.expiresAt <= this.now()) {
      return undefined;
    }
    return lease.taskId;
  }

  /**
   * Drop expired leases. Returns how many were removed.
   */
  sweepExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, lease] of this.leases.entries()) {
      if (lease.expiresAt <= now) {
        this.leases.delete(key);
        removed++;
        this.logger?.warn("Lease expired", { conversationKey: key, taskId: lease.taskId });
      }
    }

    return removed;
  }

  size(): number {
    return this.leases.size;
  }
}
