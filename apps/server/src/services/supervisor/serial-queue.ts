import { CancelledError } from '@server/core/errors';

/**
 * Runs tasks one at a time in arrival order. A task whose signal aborts while
 * it is still waiting is dropped without running.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get size(): number {
    return this.waiting;
  }

  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => done);
    this.waiting++;

    return (async () => {
      try {
        await waitUnlessAborted(previous, signal);
        return await task();
      } finally {
        this.waiting--;
        release();
      }
    })();
  }
}

function waitUnlessAborted(turn: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
  if (!signal) {
    return turn;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError('Cancelled while queued'));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError('Cancelled while queued'));
    signal.addEventListener('abort', onAbort, { once: true });
    void turn.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}
