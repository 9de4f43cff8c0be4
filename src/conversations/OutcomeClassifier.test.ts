/**
 * OutcomeClassifier Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { classifyOutcome } from './OutcomeClassifier.js';

describe('classifyOutcome', () => {
  it('should detect disengagement', () => {
    expect(classifyOutcome("I'm not interested")).toBe('disengaged');
    expect(classifyOutcome('That is too expensive')).toBe('disengaged');
    expect(classifyOutcome('No thanks')).toBe('disengaged');
  });

  it('should detect readiness to buy', () => {
    expect(classifyOutcome('I want to buy it')).toBe('ready-to-close');
    expect(classifyOutcome('How do I pay?')).toBe('ready-to-close');
    expect(classifyOutcome("OK I'll take two")).toBe('ready-to-close');
  });

  it('should detect engagement', () => {
    expect(classifyOutcome('Yes, tell me more')).toBe('engaged');
    expect(classifyOutcome('How much is the blue one?')).toBe('engaged');
  });

  it('should check disengagement before engagement', () => {
    expect(classifyOutcome('not interested, great day though')).toBe('disengaged');
  });

  it('should match whole words only', () => {
    expect(classifyOutcome('I know the way')).toBe('neutral');
    expect(classifyOutcome('buyers are welcome')).toBe('neutral');
  });

  it('should fall back to neutral', () => {
    expect(classifyOutcome('hello')).toBe('neutral');
    expect(classifyOutcome('')).toBe('neutral');
  });
});
