import { injectable, inject } from 'inversify';
import { TYPES } from '@server/core/types';
import { ValidationError } from '@server/core/errors';
import type { ILogger, IProviderTransport, ITransportFactory, ProviderConfig } from '@server/core/interfaces';
import { resolveProviderConfig } from '@server/services/providers/env-resolver';
import { StdioTransport } from './stdio-transport';
import { HttpTransport } from './http-transport';
import { SseTransport } from './sse-transport';

/**
 * Builds the transport variant named by a provider's `transport` tag,
 * resolving environment placeholders at this point and nowhere earlier.
 */
@injectable()
export class TransportFactory implements ITransportFactory {
  private readonly logger: ILogger;

  constructor(@inject(TYPES.Logger) logger: ILogger) {
    this.logger = logger.child({ component: 'transport' });
  }

  create(config: ProviderConfig): IProviderTransport {
    const { value: resolved, missing } = resolveProviderConfig(config);
    if (missing.length > 0) {
      this.logger.warn('Unset environment variables in provider config', {
        providerId: config.id,
        variables: missing,
      });
    }

    switch (resolved.transport) {
      case 'stdio':
        if (!resolved.command) {
          throw new ValidationError(`Provider "${config.id}" command resolved to an empty string`);
        }
        return new StdioTransport(resolved, this.logger);
      case 'streamable_http':
        assertHttpUrl(config.id, resolved.url);
        return new HttpTransport(resolved, this.logger);
      case 'sse':
        assertHttpUrl(config.id, resolved.url);
        return new SseTransport(resolved, this.logger);
    }
  }
}

function assertHttpUrl(providerId: string, url: string): void {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new ValidationError(`Provider "${providerId}" url "${url}" is not valid after resolution`);
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ValidationError(`Provider "${providerId}" url must be http or https`);
  }
}
