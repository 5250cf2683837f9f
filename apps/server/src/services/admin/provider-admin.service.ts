import { injectable, inject } from 'inversify';
import { TYPES } from '@server/core/types';
import { NotFoundError } from '@server/core/errors';
import type {
  ConnectionStatus,
  IConnectionSupervisor,
  ILogger,
  IProviderAdmin,
  IProviderRegistry,
  ProviderConfig,
  ProviderInput,
  ProviderPatch,
  ProviderView,
  ToolDescriptor,
} from '@server/core/interfaces';

/** Lease holder used for short-lived administrative connections. */
export const ADMIN_HOLDER = '__admin';

/**
 * Administrative operations over providers: registry mutations joined with
 * the live connection status of each provider.
 */
@injectable()
export class ProviderAdmin implements IProviderAdmin {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ProviderRegistry) private registry: IProviderRegistry,
    @inject(TYPES.ConnectionSupervisor) private supervisor: IConnectionSupervisor,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'provider-admin' });
  }

  list(): ProviderView[] {
    return this.registry.list().map((provider) => this.toView(provider));
  }

  get(id: string): ProviderView {
    return this.toView(this.require(id));
  }

  async add(input: ProviderInput): Promise<ProviderView> {
    return this.toView(await this.registry.add(input));
  }

  async update(id: string, patch: ProviderPatch): Promise<ProviderView> {
    return this.toView(await this.registry.update(id, patch));
  }

  async remove(id: string): Promise<void> {
    await this.registry.remove(id);
  }

  async setEnabled(id: string, enabled: boolean): Promise<ProviderView> {
    return this.toView(await this.registry.setEnabled(id, enabled));
  }

  status(id: string): ConnectionStatus {
    this.require(id);
    return this.supervisor.getStatus(id);
  }

  /**
   * Connects if needed and lists the provider's tools. The admin lease is
   * released afterwards; the connection stays pooled for conversations.
   */
  async tools(id: string): Promise<ToolDescriptor[]> {
    this.require(id);
    const handle = await this.supervisor.acquire(id, ADMIN_HOLDER);
    try {
      return [...handle.capabilities];
    } finally {
      await this.supervisor.release(id, ADMIN_HOLDER);
    }
  }

  reload(): ProviderView[] {
    this.registry.reload();
    const providers = this.list();
    this.logger.info('Provider configuration reloaded', { count: providers.length });
    return providers;
  }

  private require(id: string): ProviderConfig {
    const provider = this.registry.get(id);
    if (!provider) {
      throw new NotFoundError(`Provider "${id}" not found`);
    }
    return provider;
  }

  private toView(provider: ProviderConfig): ProviderView {
    return { ...provider, status: this.supervisor.getStatus(provider.id) };
  }
}
