import 'reflect-metadata';
import { TYPES } from '@server/core/types';
import { toErrorMessage } from '@server/core/errors';
import { disposeContainer, initializeContainer } from '@server/core/container';
import { Logger } from '@server/services/core/logger.service';
import type { IDatabase, IHealthProber, IHttpServer, ILogger, IProviderRegistry } from '@server/core/interfaces';

async function main(): Promise<void> {
  const container = initializeContainer();
  const logger = container.get<ILogger>(TYPES.Logger);

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', { error: toErrorMessage(reason) });
  });

  container.get<IDatabase>(TYPES.Database).initialize();
  const registry = container.get<IProviderRegistry>(TYPES.ProviderRegistry);
  registry.load();

  await container.get<IHttpServer>(TYPES.HttpServer).start();
  container.get<IHealthProber>(TYPES.HealthProber).start();

  process.on('SIGHUP', () => {
    logger.info('SIGHUP received, reloading provider configuration');
    try {
      registry.reload();
    } catch (error) {
      logger.error('Provider configuration reload failed', { error: toErrorMessage(error) });
    }
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    disposeContainer().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: toErrorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  new Logger({ component: 'main' }).error('Failed to start', { error: toErrorMessage(error) });
  process.exit(1);
});
