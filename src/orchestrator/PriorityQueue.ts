/**
 * PriorityQueue
 *
 * In-memory dispatch queue with three lanes (high, medium, low).
 * dequeue() always serves the highest non-empty lane, FIFO within a lane.
 * Lanes are unbounded: enqueue never blocks and never drops work.
 */

import type { Lane, QueueBackend, QueueStats } from "../types/index.js";
import { LANES } from "../types/index.js";

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  cleanup: () => void;
}

export class PriorityQueue<T> implements QueueBackend<T> {
  private lanes: Record<Lane, T[]> = { high: [], medium: [], low: [] };
  private waiters: Waiter<T>[] = [];
  private closed = false;

  /**
   * Append an item to the tail of a lane.
   * Hands it straight to the oldest waiting consumer when there is one.
   */
  enqueue(item: T, lane: Lane): void {
    if (this.closed) {
      throw new Error("PriorityQueue is closed");
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(item);
      return;
    }

    this.lanes[lane].push(item);
  }

  /**
   * Remove and return the head of the highest-priority non-empty lane.
   */
  tryDequeue(): T | undefined {
    for (const lane of LANES) {
      const queue = this.lanes[lane];
      if (queue.length > 0) {
        return queue.shift();
      }
    }
    return undefined;
  }

  /**
   * Wait for the next item.
   * Resolves undefined when the signal aborts or the queue is closed.
   */
  dequeue(signal?: AbortSignal): Promise<T | undefined> {
    const item = this.tryDequeue();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      };
      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Peek at the item that dequeue() would return next.
   */
  peek(): T | undefined {
    for (const lane of LANES) {
      const head = this.lanes[lane][0];
      if (head !== undefined) {
        return head;
      }
    }
    return undefined;
  }

  /**
   * Remove the first occurrence of an item from whichever lane holds it.
   */
  remove(item: T): boolean {
    for (const lane of LANES) {
      const queue = this.lanes[lane];
      const index = queue.indexOf(item);
      if (index !== -1) {
        queue.splice(index, 1);
        return true;
      }
    }
    return false;
  }

  size(lane?: Lane): number {
    if (lane) {
      return this.lanes[lane].length;
    }
    return LANES.reduce((total, l) => total + this.lanes[l].length, 0);
  }

  /**
   * Stop accepting work and release every waiting consumer.
   */
  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.cleanup();
      waiter.resolve(undefined);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): QueueStats {
    return {
      lanes: {
        high: this.lanes.high.length,
        medium: this.lanes.medium.length,
        low: this.lanes.low.length,
      },
      totalItems: this.size(),
      waiters: this.waiters.length,
    };
  }
}
