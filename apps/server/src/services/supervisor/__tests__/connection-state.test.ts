import { describe, it, expect } from 'vitest';
import {
  CONNECTION_TRANSITIONS,
  IllegalTransitionError,
  assertTransition,
  canTransition,
} from '../connection-state';

describe('connection state machine', () => {
  it('should allow the normal lifecycle', () => {
    expect(canTransition('disconnected', 'connecting')).toBe(true);
    expect(canTransition('connecting', 'ready')).toBe(true);
    expect(canTransition('ready', 'degraded')).toBe(true);
    expect(canTransition('degraded', 'connecting')).toBe(true);
  });

  it('should not jump from ready straight back to connecting', () => {
    expect(canTransition('ready', 'connecting')).toBe(false);
  });

  it('should let every live state close', () => {
    for (const state of ['disconnected', 'connecting', 'ready', 'degraded'] as const) {
      expect(canTransition(state, 'closed')).toBe(true);
    }
  });

  it('should treat closed as terminal', () => {
    expect(CONNECTION_TRANSITIONS.closed).toEqual([]);
    expect(() => assertTransition('closed', 'connecting')).toThrow(IllegalTransitionError);
  });

  it('should name both states in the error', () => {
    expect(() => assertTransition('disconnected', 'ready')).toThrow(
      'Illegal connection state transition: disconnected -> ready'
    );
  });
});
