import { describe, it, expect } from 'vitest';
import { allowedSources, canTransition, isTerminal } from '@tessera/core';
import { crawlRunStatusEnum } from '@tessera/schemas';

describe('crawl run transitions', () => {
  it('lets a running run go anywhere', () => {
    for (const to of ['completed', 'failed', 'paused', 'cancelled'] as const) {
      expect(canTransition('running', to)).toBe(true);
    }
  });

  it('lets a paused run resume or be cancelled only', () => {
    expect(canTransition('paused', 'running')).toBe(true);
    expect(canTransition('paused', 'cancelled')).toBe(true);
    expect(canTransition('paused', 'completed')).toBe(false);
    expect(canTransition('paused', 'failed')).toBe(false);
  });

  it('accepts nothing from a terminal state', () => {
    for (const from of ['completed', 'failed', 'cancelled'] as const) {
      expect(isTerminal(from)).toBe(true);
      for (const to of crawlRunStatusEnum.options) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
  });

  it('lists the statuses a target can be reached from', () => {
    expect(allowedSources('paused')).toEqual(['running']);
    expect(allowedSources('running')).toEqual(['paused']);
    expect(allowedSources('cancelled')).toEqual(['running', 'paused']);
    expect(allowedSources('completed')).toEqual(['running']);
  });
});
