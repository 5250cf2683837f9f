import type { ConnectionState } from '@server/core/interfaces';

/**
 * Allowed moves of the per-provider connection state machine.
 * `closed` is terminal; a closed connection is replaced, never revived.
 */
export const CONNECTION_TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  disconnected: ['connecting', 'closed'],
  connecting: ['ready', 'degraded', 'disconnected', 'closed'],
  ready: ['degraded', 'closed'],
  degraded: ['connecting', 'disconnected', 'closed'],
  closed: [],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return CONNECTION_TRANSITIONS[from].includes(to);
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: ConnectionState,
    readonly to: ConnectionState
  ) {
    super(`Illegal connection state transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function assertTransition(from: ConnectionState, to: ConnectionState): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}
