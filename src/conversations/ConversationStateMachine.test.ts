/**
 * ConversationStateMachine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  transition,
  initialActions,
  isTerminalPhase,
  DEFAULT_CONVERSATION_RULES,
  type TransitionInput,
} from './ConversationStateMachine.js';

const base = (overrides: Partial<TransitionInput>): TransitionInput => ({
  branch: 'Convincer',
  phase: 'Welcome',
  outcome: 'neutral',
  messageCount: 1,
  disengagedStreak: 0,
  ...overrides,
});

describe('ConversationStateMachine', () => {
  describe('Welcome', () => {
    it('should move a Convincer conversation into Discovery', () => {
      const result = transition(base({ branch: 'Convincer' }));

      expect(result).toEqual({
        phase: 'Discovery',
        disengagedStreak: 0,
        actions: ['assess-needs'],
        changed: true,
        terminal: false,
      });
    });

    it('should move a Manipulator conversation into Negotiation', () => {
      const result = transition(base({ branch: 'Manipulator', outcome: 'engaged' }));

      expect(result.phase).toBe('Negotiation');
      expect(result.actions).toEqual(['present-products']);
    });

    it('should leave Welcome even on ready-to-close', () => {
      expect(transition(base({ branch: 'Manipulator', outcome: 'ready-to-close' })).phase).toBe('Negotiation');
      expect(transition(base({ branch: 'Convincer', outcome: 'ready-to-close' })).phase).toBe('Discovery');
    });
  });

  describe('Discovery', () => {
    it('should move to Negotiation on engaged', () => {
      const result = transition(base({ phase: 'Discovery', outcome: 'engaged', messageCount: 2 }));

      expect(result.phase).toBe('Negotiation');
      expect(result.actions).toEqual(['present-products']);
    });

    it('should stay on neutral below the discovery message limit', () => {
      const result = transition(base({ phase: 'Discovery', outcome: 'neutral', messageCount: 3 }));

      expect(result.phase).toBe('Discovery');
      expect(result.changed).toBe(false);
      expect(result.actions).toEqual(['assess-needs']);
    });

    it('should move on to Negotiation once the discovery message limit is reached', () => {
      const result = transition(base({ phase: 'Discovery', outcome: 'neutral', messageCount: 4 }));

      expect(result.phase).toBe('Negotiation');
      expect(result.actions).toEqual(['handle-objection']);
    });

    it('should recover interest on a first disengaged outcome', () => {
      const result = transition(base({ phase: 'Discovery', outcome: 'disengaged', messageCount: 2 }));

      expect(result.phase).toBe('Discovery');
      expect(result.disengagedStreak).toBe(1);
      expect(result.actions).toEqual(['recover-interest']);
    });

    it('should close on ready-to-close', () => {
      const result = transition(base({ phase: 'Discovery', outcome: 'ready-to-close', messageCount: 2 }));

      expect(result).toEqual({
        phase: 'Closing',
        disengagedStreak: 0,
        actions: ['close-sale'],
        changed: true,
        terminal: true,
      });
    });
  });

  describe('Negotiation', () => {
    it('should handle objections on neutral', () => {
      const result = transition(base({ branch: 'Manipulator', phase: 'Negotiation', outcome: 'neutral', messageCount: 3 }));

      expect(result.phase).toBe('Negotiation');
      expect(result.actions).toEqual(['handle-objection']);
    });

    it('should recommend alternatives when disengaged', () => {
      const result = transition(base({ phase: 'Negotiation', outcome: 'disengaged', messageCount: 3, disengagedStreak: 1 }));

      expect(result.phase).toBe('Negotiation');
      expect(result.disengagedStreak).toBe(2);
      expect(result.actions).toEqual(['recover-interest', 'recommend-alternatives']);
    });

    it('should close on ready-to-close', () => {
      const result = transition(base({ phase: 'Negotiation', outcome: 'ready-to-close', messageCount: 5 }));

      expect(result.phase).toBe('Closing');
      expect(result.actions).toEqual(['close-sale']);
    });
  });

  describe('disengagement', () => {
    it('should abandon after three consecutive disengaged outcomes on either branch', () => {
      for (const branch of ['Manipulator', 'Convincer'] as const) {
        const result = transition(base({ branch, phase: 'Negotiation', outcome: 'disengaged', messageCount: 4, disengagedStreak: 2 }));

        expect(result.phase).toBe('Abandoned');
        expect(result.actions).toEqual(['end-conversation']);
        expect(result.terminal).toBe(true);
        expect(result.disengagedStreak).toBe(3);
      }
    });

    it('should abandon straight from Welcome', () => {
      const result = transition(base({ phase: 'Welcome', outcome: 'disengaged', disengagedStreak: 2 }));

      expect(result.phase).toBe('Abandoned');
    });

    it('should reset the streak on any other outcome', () => {
      const result = transition(base({ phase: 'Negotiation', outcome: 'neutral', messageCount: 4, disengagedStreak: 2 }));

      expect(result.disengagedStreak).toBe(0);
      expect(result.phase).toBe('Negotiation');
    });

    it('should honour a custom abandon threshold', () => {
      const result = transition(
        base({ phase: 'Discovery', outcome: 'disengaged', messageCount: 2 }),
        { ...DEFAULT_CONVERSATION_RULES, abandonAfterDisengaged: 1 }
      );

      expect(result.phase).toBe('Abandoned');
    });
  });

  describe('message cap', () => {
    it('should hand off once the message cap is reached', () => {
      const result = transition(base({ phase: 'Negotiation', outcome: 'engaged', messageCount: 15 }));

      expect(result.phase).toBe('Closing');
      expect(result.actions).toEqual(['handoff']);
    });

    it('should prefer closing the sale over a handoff', () => {
      const result = transition(base({ phase: 'Negotiation', outcome: 'ready-to-close', messageCount: 15 }));

      expect(result.actions).toEqual(['close-sale']);
    });

    it('should prefer abandonment over a handoff', () => {
      const result = transition(base({ phase: 'Negotiation', outcome: 'disengaged', messageCount: 15, disengagedStreak: 2 }));

      expect(result.phase).toBe('Abandoned');
    });
  });

  describe('terminal phases', () => {
    it('should never reopen Closing or Abandoned', () => {
      for (const phase of ['Closing', 'Abandoned'] as const) {
        const result = transition(base({ phase, outcome: 'engaged', messageCount: 20, disengagedStreak: 1 }));

        expect(result).toEqual({
          phase,
          disengagedStreak: 1,
          actions: [],
          changed: false,
          terminal: true,
        });
      }
    });

    it('should identify terminal phases', () => {
      expect(isTerminalPhase('Closing')).toBe(true);
      expect(isTerminalPhase('Abandoned')).toBe(true);
      expect(isTerminalPhase('Discovery')).toBe(false);
    });
  });

  describe('initialActions()', () => {
    it('should depend on the branch', () => {
      expect(initialActions('Manipulator')).toEqual(['send-welcome', 'present-products']);
      expect(initialActions('Convincer')).toEqual(['send-welcome', 'assess-needs']);
    });
  });
});
