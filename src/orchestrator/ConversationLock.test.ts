/**
 * ConversationLock Unit Tests
 *
 * Lease acquisition, re-entry, owner-only release and expiry.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationLock } from './ConversationLock.js';

describe('ConversationLock', () => {
  let clock: number;
  let lock: ConversationLock;

  beforeEach(() => {
    clock = 0;
    lock = new ConversationLock({ now: () => clock });
  });

  it('should grant a free conversation', () => {
    expect(lock.tryAcquire('conv-1', 'task-a', 1000)).toBe(true);
    expect(lock.holder('conv-1')).toBe('task-a');
  });

  it('should refuse a second task while the lease is live', () => {
    lock.tryAcquire('conv-1', 'task-a', 1000);

    expect(lock.tryAcquire('conv-1', 'task-b', 1000)).toBe(false);
    expect(lock.holder('conv-1')).toBe('task-a');
  });

  it('should let the owner re-enter and renew the lease', () => {
    lock.tryAcquire('conv-1', 'task-a', 1000);
    clock = 900;

    expect(lock.tryAcquire('conv-1', 'task-a', 1000)).toBe(true);

    clock = 1500;
    expect(lock.tryAcquire('conv-1', 'task-b', 1000)).toBe(false);
  });

  it('should let another task take over an expired lease', () => {
    lock.tryAcquire('conv-1', 'task-a', 1000);
    clock = 1000;

    expect(lock.holder('conv-1')).toBeUndefined();
    expect(lock.tryAcquire('conv-1', 'task-b', 1000)).toBe(true);
    expect(lock.holder('conv-1')).toBe('task-b');
  });

  it('should only release for the owning task', () => {
    lock.tryAcquire('conv-1', 'task-a', 1000);
    clock = 1000;
    lock.tryAcquire('conv-1', 'task-b', 1000);

    // The stale owner must not clear the newer lease
    expect(lock.release('conv-1', 'task-a')).toBe(false);
    expect(lock.holder('conv-1')).toBe('task-b');

    expect(lock.release('conv-1', 'task-b')).toBe(true);
    expect(lock.holder('conv-1')).toBeUndefined();
  });

  it('should sweep expired leases', () => {
    lock.tryAcquire('conv-1', 'task-a', 100);
    lock.tryAcquire('conv-2', 'task-b', 5000);
    clock = 200;

    expect(lock.sweepExpired()).toBe(1);
    expect(lock.size()).toBe(1);
    expect(lock.holder('conv-2')).toBe('task-b');
  });
});
