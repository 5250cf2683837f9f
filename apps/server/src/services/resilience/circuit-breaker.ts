import type { CircuitBreakerState } from '@server/core/interfaces';

/**
 * Circuit breaker as pure transitions over CircuitBreakerState.
 *
 * - closed: calls pass; consecutive failures are counted
 * - open: calls fail fast until the cool-down has elapsed
 * - half_open: exactly one trial call; success closes, failure reopens
 */

export type BreakerDecision =
  | { allowed: true; state: CircuitBreakerState }
  | { allowed: false; state: CircuitBreakerState; retryAfterMs: number };

export function createBreakerState(failureThreshold: number, cooldownMs: number): CircuitBreakerState {
  return {
    status: 'closed',
    consecutiveFailures: 0,
    openedAt: null,
    trialInFlight: false,
    failureThreshold,
    cooldownMs,
  };
}

export function beforeCall(state: CircuitBreakerState, now: number): BreakerDecision {
  switch (state.status) {
    case 'closed':
      return { allowed: true, state };

    case 'open': {
      const openedAt = state.openedAt ?? now;
      const elapsed = now - openedAt;
      if (elapsed >= state.cooldownMs) {
        return { allowed: true, state: { ...state, status: 'half_open', trialInFlight: true } };
      }
      return { allowed: false, state, retryAfterMs: state.cooldownMs - elapsed };
    }

    case 'half_open':
      if (state.trialInFlight) {
        return { allowed: false, state, retryAfterMs: 0 };
      }
      return { allowed: true, state: { ...state, trialInFlight: true } };
  }
}

export function recordSuccess(state: CircuitBreakerState): CircuitBreakerState {
  return { ...state, status: 'closed', consecutiveFailures: 0, openedAt: null, trialInFlight: false };
}

export function recordFailure(state: CircuitBreakerState, now: number): CircuitBreakerState {
  const consecutiveFailures = state.consecutiveFailures + 1;

  if (state.status === 'half_open' || consecutiveFailures >= state.failureThreshold) {
    return { ...state, status: 'open', consecutiveFailures, openedAt: now, trialInFlight: false };
  }
  return { ...state, consecutiveFailures };
}

/**
 * An outcome that says nothing about the path's health (cancelled, or a
 * permanent error from the caller's own request). Frees the trial slot only.
 */
export function recordNeutral(state: CircuitBreakerState): CircuitBreakerState {
  return state.trialInFlight ? { ...state, trialInFlight: false } : state;
}
