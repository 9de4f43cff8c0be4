/**
 * WorkerPool Unit Tests
 *
 * Worker loop behaviour: success, retry with backoff, dead-lettering,
 * lock contention, cancellation, timeouts and the watchdog.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WorkerPool, type WorkerPoolConfig } from './WorkerPool.js';
import { TaskStore } from './TaskStore.js';
import { PriorityQueue } from './PriorityQueue.js';
import { ConversationLock } from './ConversationLock.js';
import { createLogger } from '../utils/logger.js';
import { PermanentError, TransientError } from '../utils/errors.js';
import type { Executor, TaskRecord } from '../types/index.js';

const baseConfig: WorkerPoolConfig = {
  concurrency: 1,
  leaseMs: 60000,
  contentionDelayMs: 5,
  watchdogIntervalMs: 60000,
  retry: { maxAttempts: 3, baseDelayMs: 5, maxDelayMs: 50 },
  timeouts: { softTimeoutMs: 1000, hardTimeoutMs: 2000 },
};

function until(check: () => void): Promise<void> {
  return vi.waitFor(check, { timeout: 2000, interval: 5 });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WorkerPool', () => {
  let store: TaskStore;
  let queue: PriorityQueue<string>;
  let lock: ConversationLock;
  let settled: TaskRecord[];
  let pool: WorkerPool | undefined;

  function createPool(executor: Executor, overrides: Partial<WorkerPoolConfig> = {}, now?: () => number): WorkerPool {
    pool = new WorkerPool(
      { ...baseConfig, ...overrides },
      {
        store,
        queue,
        lock,
        executor,
        logger: createLogger({ logLevel: 'error' }),
        onSettled: (task) => {
          settled.push(task);
        },
        now,
        random: () => 0,
      }
    );
    return pool;
  }

  function submit(conversationKey: string | null = 'conv-1', maxAttempts = 3): string {
    const task = store.create({
      queue: 'conversations',
      lane: 'high',
      conversationKey,
      payload: { text: 'hello', context: {} },
      maxAttempts,
    });
    queue.enqueue(task.id, task.lane);
    return task.id;
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new TaskStore();
    queue = new PriorityQueue<string>();
    lock = new ConversationLock();
    settled = [];
    pool = undefined;
  });

  afterEach(async () => {
    await pool?.stop();
    vi.restoreAllMocks();
  });

  it('should reject a pool without workers', () => {
    expect(() => createPool(async () => ({ text: 'x' }), { concurrency: 0 })).toThrow(
      'WorkerPool concurrency must be at least 1'
    );
  });

  it('should run a task to Succeeded and report it once', async () => {
    createPool(async (payload) => ({ text: `echo: ${payload.text}`, outcome: 'neutral' })).start();
    const id = submit();

    await until(() => expect(settled).toHaveLength(1));

    const task = store.get(id);
    expect(task?.state).toBe('Succeeded');
    expect(task?.attempt).toBe(1);
    expect(task?.result).toEqual({ text: 'echo: hello', outcome: 'neutral', data: undefined });
    expect(settled[0]?.id).toBe(id);
    expect(settled[0]?.state).toBe('Succeeded');
  });

  it('should retry transient failures with growing delays', async () => {
    const executor = vi.fn<Executor>(async (_payload, context) => {
      if (context.attempt < 3) {
        throw new TransientError('rate limited');
      }
      return { text: 'third time lucky' };
    });
    createPool(executor).start();
    const id = submit();

    await until(() => expect(store.getState(id)).toBe('Succeeded'));

    const task = store.get(id);
    expect(executor).toHaveBeenCalledTimes(3);
    expect(task?.attempt).toBe(3);
    expect(task?.retryDelaysMs).toEqual([10, 20]);
    expect(task?.error).toBeUndefined();
    expect(task?.history.map((h) => h.state)).toEqual([
      'Queued',
      'Running',
      'Retrying',
      'Running',
      'Retrying',
      'Running',
      'Succeeded',
    ]);
  });

  it('should dead-letter once attempts are exhausted', async () => {
    createPool(async () => {
      throw new TransientError('still down');
    }).start();
    const id = submit();

    await until(() => expect(settled).toHaveLength(1));

    const task = store.get(id);
    expect(task?.state).toBe('DeadLettered');
    expect(task?.attempt).toBe(3);
    expect(task?.error?.code).toBe('TRANSIENT_ERROR');
    expect(task?.history.slice(-3).map((h) => h.state)).toEqual(['Running', 'Failed', 'DeadLettered']);
  });

  it('should dead-letter a permanent failure without retrying', async () => {
    const executor = vi.fn<Executor>(async () => {
      throw new PermanentError('malformed payload');
    });
    createPool(executor).start();
    const id = submit();

    await until(() => expect(settled).toHaveLength(1));

    const task = store.get(id);
    expect(executor).toHaveBeenCalledTimes(1);
    expect(task?.state).toBe('DeadLettered');
    expect(task?.error).toMatchObject({ code: 'PERMANENT_ERROR', kind: 'permanent', message: 'malformed payload' });
    expect(task?.retryDelaysMs).toEqual([]);
  });

  it('should treat unknown errors as transient', async () => {
    const executor = vi.fn<Executor>(async (_payload, context) => {
      if (context.attempt === 1) {
        throw new Error('socket hang up');
      }
      return { text: 'ok' };
    });
    createPool(executor).start();
    const id = submit();

    await until(() => expect(store.getState(id)).toBe('Succeeded'));
    expect(executor).toHaveBeenCalledTimes(2);
  });

  it('should record a hard timeout distinctly', async () => {
    createPool(
      (_payload, context) =>
        new Promise((_resolve, reject) => {
          context.signal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
      { timeouts: { softTimeoutMs: 10, hardTimeoutMs: 20 } }
    ).start();
    const id = submit('conv-1', 1);

    await until(() => expect(settled).toHaveLength(1));

    const task = store.get(id);
    expect(task?.state).toBe('DeadLettered');
    expect(task?.error).toMatchObject({ code: 'TIMEOUT', kind: 'timeout' });
  });

  it('should keep the conversation lease through Retrying', async () => {
    const executor = vi.fn<Executor>(async (_payload, context) => {
      if (context.attempt === 1) {
        throw new TransientError('flaky');
      }
      return { text: 'ok' };
    });
    createPool(executor, { retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 } }).start();
    const id = submit('conv-1');

    await until(() => expect(store.getState(id)).toBe('Retrying'));
    expect(lock.holder('conv-1')).toBe(id);
    expect(lock.tryAcquire('conv-1', 'intruder', 1000)).toBe(false);

    await until(() => expect(store.getState(id)).toBe('Succeeded'));
  });

  it('should re-enqueue on lock contention without consuming an attempt', async () => {
    const executor = vi.fn<Executor>(async () => ({ text: 'ok' }));
    lock.tryAcquire('conv-1', 'other-task', 60000);
    createPool(executor).start();
    const id = submit('conv-1');

    await sleep(30);
    expect(store.getState(id)).toBe('Queued');
    expect(store.get(id)?.attempt).toBe(0);
    expect(executor).not.toHaveBeenCalled();

    lock.release('conv-1', 'other-task');

    await until(() => expect(store.getState(id)).toBe('Succeeded'));
    expect(store.get(id)?.attempt).toBe(1);
  });

  it('should skip tasks cancelled while queued', async () => {
    const executor = vi.fn<Executor>(async (payload) => ({ text: payload.text }));
    createPool(executor);
    const cancelled = submit('conv-1');
    store.transition(cancelled, 'Cancelled');
    const next = submit('conv-2');
    pool?.start();

    await until(() => expect(store.getState(next)).toBe('Succeeded'));

    expect(executor).toHaveBeenCalledTimes(1);
    expect(store.getState(cancelled)).toBe('Cancelled');
    expect(store.get(cancelled)?.attempt).toBe(0);
  });

  it('should run tasks of different conversations concurrently', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const created = createPool(
      async () => {
        await gate;
        return { text: 'ok' };
      },
      { concurrency: 2 }
    );
    created.start();
    const a = submit('conv-1');
    const b = submit('conv-2');

    await until(() => expect(created.activeCount).toBe(2));
    expect(store.getState(a)).toBe('Running');
    expect(store.getState(b)).toBe('Running');

    release();
    await until(() => expect(settled).toHaveLength(2));
    await until(() => expect(created.activeCount).toBe(0));
  });

  it('should fail stale Running tasks from the watchdog sweep', async () => {
    let clock = 0;
    store = new TaskStore({ now: () => clock });
    const created = createPool(async () => ({ text: 'unused' }), {}, () => clock);
    const task = store.create({
      queue: 'conversations',
      lane: 'high',
      conversationKey: 'conv-1',
      payload: { text: 'lost', context: {} },
      maxAttempts: 1,
    });
    store.transition(task.id, 'Running', { patch: { attempt: 1, startedAt: 0 } });

    clock = 3999;
    expect(await created.sweep()).toBe(0);

    clock = 4001;
    expect(await created.sweep()).toBe(1);
    expect(store.getState(task.id)).toBe('DeadLettered');
    expect(store.get(task.id)?.error?.code).toBe('TIMEOUT');
    expect(settled.map((t) => t.id)).toEqual([task.id]);
  });

  it('should stop its loops', async () => {
    const created = createPool(async () => ({ text: 'ok' }), { concurrency: 3 });
    created.start();
    expect(created.isRunning()).toBe(true);

    await created.stop();

    expect(created.isRunning()).toBe(false);
    expect(queue.getStats().waiters).toBe(0);
  });
});
