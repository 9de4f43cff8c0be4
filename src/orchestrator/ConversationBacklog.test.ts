/**
 * ConversationBacklog Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationBacklog } from './ConversationBacklog.js';

describe('ConversationBacklog', () => {
  let backlog: ConversationBacklog;

  beforeEach(() => {
    backlog = new ConversationBacklog();
  });

  it('should admit the first task of an idle conversation', () => {
    expect(backlog.admit('conv-1', 't1')).toBe(true);
    expect(backlog.getInFlight('conv-1')).toBe('t1');
  });

  it('should park later tasks in submission order', () => {
    backlog.admit('conv-1', 't1');

    expect(backlog.admit('conv-1', 't2')).toBe(false);
    expect(backlog.admit('conv-1', 't3')).toBe(false);
    expect(backlog.size('conv-1')).toBe(2);

    expect(backlog.release('conv-1', 't1')).toBe('t2');
    expect(backlog.getInFlight('conv-1')).toBe('t2');
    expect(backlog.release('conv-1', 't2')).toBe('t3');
    expect(backlog.release('conv-1', 't3')).toBeUndefined();
    expect(backlog.getInFlight('conv-1')).toBeUndefined();
  });

  it('should keep conversations independent', () => {
    backlog.admit('conv-1', 't1');

    expect(backlog.admit('conv-2', 't2')).toBe(true);
  });

  it('should ignore a release from a task that does not hold the slot', () => {
    backlog.admit('conv-1', 't1');
    backlog.admit('conv-1', 't2');

    expect(backlog.release('conv-1', 't2')).toBeUndefined();
    expect(backlog.getInFlight('conv-1')).toBe('t1');
  });

  it('should remove a parked task', () => {
    backlog.admit('conv-1', 't1');
    backlog.admit('conv-1', 't2');
    backlog.admit('conv-1', 't3');

    expect(backlog.isWaiting('conv-1', 't2')).toBe(true);
    expect(backlog.remove('conv-1', 't2')).toBe(true);
    expect(backlog.isWaiting('conv-1', 't2')).toBe(false);
    expect(backlog.release('conv-1', 't1')).toBe('t3');
  });

  it('should report stats', () => {
    backlog.admit('conv-1', 't1');
    backlog.admit('conv-1', 't2');
    backlog.admit('conv-2', 't3');

    expect(backlog.getStats()).toEqual({ conversations: 1, waiting: 1, inFlight: 2 });
  });
});
