import { CancelledError } from '@server/core/errors';
import type { TurnHandle } from '@server/core/interfaces';

/**
 * The in-flight turn: a cancellation flag checked at every suspension point,
 * plus whether any output has reached the client yet.
 */
export class TurnState implements TurnHandle {
  private readonly controller = new AbortController();
  private outputEmitted = false;

  constructor(readonly turnId: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get hasEmittedOutput(): boolean {
    return this.outputEmitted;
  }

  markOutputEmitted(): void {
    this.outputEmitted = true;
  }

  cancel(): void {
    if (!this.cancelled) {
      this.controller.abort(new CancelledError('Turn cancelled'));
    }
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancelledError('Turn cancelled');
    }
  }
}
