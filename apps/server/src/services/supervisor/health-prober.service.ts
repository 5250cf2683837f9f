import { injectable, inject } from 'inversify';
import { TYPES } from '@server/core/types';
import { toErrorMessage } from '@server/core/errors';
import type { IConfig, IConnectionSupervisor, IHealthProber, ILogger } from '@server/core/interfaces';

/**
 * Periodically probes connections that have been idle for a full interval,
 * so a dead provider is noticed before the next turn needs it.
 */
@injectable()
export class HealthProber implements IHealthProber {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ConnectionSupervisor) private supervisor: IConnectionSupervisor,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'health-prober' });
  }

  start(): void {
    if (this.timer) {
      return;
    }

    const interval = this.interval();
    this.timer = setInterval(() => {
      void this.runOnce();
    }, interval);
    this.timer.unref();

    this.logger.info('Health prober started', { interval });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Health prober stopped');
    }
  }

  /** Skips the round when the previous one is still running. */
  async runOnce(): Promise<void> {
    if (this.running) {
      return this.running;
    }

    this.running = this.supervisor
      .probeIdleConnections(this.interval())
      .catch((error: unknown) => {
        this.logger.error('Health probe round failed', { error: toErrorMessage(error) });
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }

  private interval(): number {
    return this.config.get<number>('supervisor.probeIntervalMs', 30000);
  }
}
