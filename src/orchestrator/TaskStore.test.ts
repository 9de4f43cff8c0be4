/**
 * TaskStore Unit Tests
 *
 * Compare-and-swap transitions, snapshots, lookups and retention.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskStore, isValidTransition, type CreateTaskInput } from './TaskStore.js';
import type { TaskEvent } from '../types/index.js';

const input = (conversationKey: string | null = 'conv-1'): CreateTaskInput => ({
  queue: 'conversations',
  lane: 'high',
  conversationKey,
  payload: { text: 'hello', context: {} },
  maxAttempts: 3,
});

describe('TaskStore', () => {
  let clock: number;
  let store: TaskStore;

  beforeEach(() => {
    clock = 1000;
    store = new TaskStore({ now: () => clock });
  });

  describe('create()', () => {
    it('should create a Queued task with no attempts', () => {
      const task = store.create(input());

      expect(task.state).toBe('Queued');
      expect(task.attempt).toBe(0);
      expect(task.maxAttempts).toBe(3);
      expect(task.createdAt).toBe(1000);
      expect(task.history).toEqual([{ state: 'Queued', at: 1000 }]);
      expect(task.retryDelaysMs).toEqual([]);
    });

    it('should assign unique ids', () => {
      const a = store.create(input());
      const b = store.create(input());

      expect(a.id).not.toBe(b.id);
    });
  });

  describe('get()', () => {
    it('should return a copy that does not affect stored state', () => {
      const task = store.create(input());
      const copy = store.get(task.id);
      if (!copy) throw new Error('task missing');

      copy.state = 'Succeeded';
      copy.payload.text = 'changed';

      expect(store.getState(task.id)).toBe('Queued');
      expect(store.get(task.id)?.payload.text).toBe('hello');
    });

    it('should return undefined for unknown ids', () => {
      expect(store.get('missing')).toBeUndefined();
    });
  });

  describe('transition()', () => {
    it('should apply the patch and record history', () => {
      const task = store.create(input());
      clock = 2000;

      const running = store.transition(task.id, 'Running', {
        expect: ['Queued'],
        patch: { attempt: 1, startedAt: 2000 },
      });

      expect(running?.state).toBe('Running');
      expect(running?.attempt).toBe(1);
      expect(running?.startedAt).toBe(2000);
      expect(running?.history).toEqual([
        { state: 'Queued', at: 1000 },
        { state: 'Running', at: 2000 },
      ]);
    });

    it('should reject when the current state is not expected', () => {
      const task = store.create(input());

      expect(store.transition(task.id, 'Running', { expect: ['Retrying'] })).toBeUndefined();
      expect(store.getState(task.id)).toBe('Queued');
    });

    it('should let only one of two racing compare-and-swaps win', () => {
      const task = store.create(input());

      const first = store.transition(task.id, 'Running', { expect: ['Queued'] });
      const second = store.transition(task.id, 'Cancelled', { expect: ['Queued'] });

      expect(first?.state).toBe('Running');
      expect(second).toBeUndefined();
      expect(store.getState(task.id)).toBe('Running');
    });

    it('should reject edges outside the transition graph', () => {
      const task = store.create(input());

      expect(store.transition(task.id, 'Succeeded')).toBeUndefined();
      expect(store.transition(task.id, 'DeadLettered')).toBeUndefined();
      expect(store.getState(task.id)).toBe('Queued');
    });

    it('should never leave a terminal state', () => {
      const task = store.create(input());
      store.transition(task.id, 'Cancelled');

      expect(store.transition(task.id, 'Running')).toBeUndefined();
      expect(store.getState(task.id)).toBe('Cancelled');
    });

    it('should set completedAt and drop the error on success', () => {
      const task = store.create(input());
      store.transition(task.id, 'Running');
      store.transition(task.id, 'Retrying', {
        patch: { error: { code: 'TRANSIENT_ERROR', message: 'flaky', kind: 'transient' } },
      });
      store.transition(task.id, 'Running');
      clock = 5000;

      const done = store.transition(task.id, 'Succeeded', { patch: { result: { text: 'hi' } } });

      expect(done?.completedAt).toBe(5000);
      expect(done?.result).toEqual({ text: 'hi' });
      expect(done?.error).toBeUndefined();
    });

    it('should keep the error and no result when dead-lettered', () => {
      const task = store.create(input());
      store.transition(task.id, 'Running');
      store.transition(task.id, 'Failed', {
        patch: { error: { code: 'PERMANENT_ERROR', message: 'bad', kind: 'permanent' } },
      });

      const dead = store.transition(task.id, 'DeadLettered');

      expect(dead?.state).toBe('DeadLettered');
      expect(dead?.error?.code).toBe('PERMANENT_ERROR');
      expect(dead?.result).toBeUndefined();
      expect(dead?.history.map((h) => h.state)).toEqual(['Queued', 'Running', 'Failed', 'DeadLettered']);
    });

    it('should return undefined for unknown tasks', () => {
      expect(store.transition('missing', 'Running')).toBeUndefined();
    });
  });

  describe('isValidTransition()', () => {
    it('should follow the task state graph', () => {
      expect(isValidTransition('Queued', 'Running')).toBe(true);
      expect(isValidTransition('Queued', 'Cancelled')).toBe(true);
      expect(isValidTransition('Running', 'Retrying')).toBe(true);
      expect(isValidTransition('Retrying', 'Cancelled')).toBe(true);
      expect(isValidTransition('Failed', 'DeadLettered')).toBe(true);
      expect(isValidTransition('Running', 'Cancelled')).toBe(false);
      expect(isValidTransition('Retrying', 'Queued')).toBe(false);
      expect(isValidTransition('DeadLettered', 'Running')).toBe(false);
    });
  });

  describe('queries', () => {
    it('should find active tasks of a conversation oldest first', () => {
      const first = store.create(input('conv-1'));
      clock = 1100;
      const second = store.create(input('conv-1'));
      store.create(input('conv-2'));
      clock = 1200;
      const done = store.create(input('conv-1'));
      store.transition(done.id, 'Cancelled');

      const active = store.findActiveByConversation('conv-1');

      expect(active.map((t) => t.id)).toEqual([first.id, second.id]);
    });

    it('should find Running tasks started before a cutoff', () => {
      const stale = store.create(input());
      store.transition(stale.id, 'Running', { patch: { startedAt: 1000 } });
      const fresh = store.create(input());
      store.transition(fresh.id, 'Running', { patch: { startedAt: 9000 } });

      expect(store.findStaleRunning(5000).map((t) => t.id)).toEqual([stale.id]);
    });

    it('should filter by state and queue', () => {
      const a = store.create(input());
      store.create({ ...input(null), queue: 'analytics', lane: 'low' });
      store.transition(a.id, 'Cancelled');

      expect(store.list({ state: 'Cancelled' }).map((t) => t.id)).toEqual([a.id]);
      expect(store.list({ queue: 'analytics' })).toHaveLength(1);
    });

    it('should count tasks by state', () => {
      const a = store.create(input());
      store.create(input());
      store.transition(a.id, 'Running');

      const stats = store.getStats();

      expect(stats.total).toBe(2);
      expect(stats.byState.Running).toBe(1);
      expect(stats.byState.Queued).toBe(1);
    });
  });

  describe('cleanup()', () => {
    it('should drop only terminal tasks older than the retention window', () => {
      const old = store.create(input());
      store.transition(old.id, 'Cancelled');
      const active = store.create(input());
      clock = 10_000;
      const recent = store.create(input());
      store.transition(recent.id, 'Cancelled');

      const removed = store.cleanup(5000);

      expect(removed).toBe(1);
      expect(store.get(old.id)).toBeUndefined();
      expect(store.get(active.id)).toBeDefined();
      expect(store.get(recent.id)).toBeDefined();
    });
  });

  describe('onTaskEvent()', () => {
    it('should emit state changes and stop after unsubscribe', () => {
      const events: TaskEvent[] = [];
      const unsubscribe = store.onTaskEvent((e) => events.push(e));

      const task = store.create(input());
      store.transition(task.id, 'Running');
      unsubscribe();
      store.transition(task.id, 'Succeeded');

      expect(events.map((e) => [e.previousState, e.newState])).toEqual([
        [null, 'Queued'],
        ['Queued', 'Running'],
      ]);
      expect(events[0]?.conversationKey).toBe('conv-1');
    });

    it('should not let a throwing listener break transitions', () => {
      const listener = vi.fn(() => {
        throw new Error('listener failure');
      });
      store.onTaskEvent(listener);

      const task = store.create(input());

      expect(store.transition(task.id, 'Running')?.state).toBe('Running');
      expect(listener).toHaveBeenCalledTimes(2);
    });
  });
});
