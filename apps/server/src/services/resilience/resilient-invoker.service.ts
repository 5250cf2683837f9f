import { injectable, inject } from 'inversify';
import { TYPES } from '@server/core/types';
import { CancelledError, CircuitOpenError, isTransientError, toErrorMessage } from '@server/core/errors';
import type {
  CircuitBreakerState,
  IConfig,
  ILogger,
  IResilientInvoker,
  ResilientExecuteOptions,
} from '@server/core/interfaces';
import { beforeCall, createBreakerState, recordFailure, recordNeutral, recordSuccess } from './circuit-breaker';
import { computeRetryDelay, retryPolicyFromConfig, shouldRetry, sleep } from './retry-policy';

/**
 * Runs one agent turn under a retry policy and a circuit breaker per path
 * (one path per conversation).
 *
 * Only transient failures count against the breaker or get retried, and a
 * turn that has already streamed output to the client is never re-run.
 */
@injectable()
export class ResilientInvoker implements IResilientInvoker {
  private breakers = new Map<string, CircuitBreakerState>();
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'resilient-invoker' });
  }

  async execute<T>(
    pathKey: string,
    operation: (attempt: number) => Promise<T>,
    options: ResilientExecuteOptions
  ): Promise<T> {
    const policy = retryPolicyFromConfig(this.config);

    for (let attempt = 1; ; attempt++) {
      if (options.signal?.aborted) {
        throw new CancelledError('Turn cancelled');
      }
      this.admit(pathKey);

      try {
        const result = await operation(attempt);
        this.record(pathKey, 'success');
        return result;
      } catch (error) {
        if (error instanceof CancelledError || options.signal?.aborted) {
          this.record(pathKey, 'neutral');
          throw error instanceof CancelledError ? error : new CancelledError('Turn cancelled');
        }

        const transient = isTransientError(error);
        const state = this.record(pathKey, transient ? 'failure' : 'neutral');

        if (state.status === 'open' || !shouldRetry(policy, attempt, error, options.hasEmittedOutput())) {
          if (state.status === 'open') {
            this.logger.warn('Circuit opened', { path: pathKey, failures: state.consecutiveFailures });
          }
          throw error;
        }

        const delay = computeRetryDelay(policy, attempt);
        this.logger.warn('Retrying turn after transient failure', {
          path: pathKey,
          attempt,
          delay,
          error: toErrorMessage(error),
        });
        options.onRetry?.(attempt, delay, error);
        await sleep(delay, options.signal);
      }
    }
  }

  getBreakerState(pathKey: string): CircuitBreakerState {
    return { ...(this.breakers.get(pathKey) ?? this.createState()) };
  }

  forget(pathKey: string): void {
    this.breakers.delete(pathKey);
  }

  private admit(pathKey: string): void {
    const decision = beforeCall(this.breakers.get(pathKey) ?? this.createState(), Date.now());
    this.breakers.set(pathKey, decision.state);

    if (!decision.allowed) {
      throw new CircuitOpenError(pathKey, decision.retryAfterMs);
    }
    if (decision.state.status === 'half_open') {
      this.logger.info('Circuit half-open, allowing trial call', { path: pathKey });
    }
  }

  private record(pathKey: string, outcome: 'success' | 'failure' | 'neutral'): CircuitBreakerState {
    const current = this.breakers.get(pathKey) ?? this.createState();
    const next =
      outcome === 'success'
        ? recordSuccess(current)
        : outcome === 'failure'
          ? recordFailure(current, Date.now())
          : recordNeutral(current);
    this.breakers.set(pathKey, next);
    return next;
  }

  private createState(): CircuitBreakerState {
    return createBreakerState(
      this.config.get<number>('resilience.breaker.failureThreshold', 5),
      this.config.get<number>('resilience.breaker.cooldownMs', 60000)
    );
  }
}
