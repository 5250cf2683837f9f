import { injectable, inject } from 'inversify';
import { EventEmitter } from 'events';
import { isDeepStrictEqual } from 'util';
import { TYPES } from '@server/core/types';
import { ImmutableProviderError, NotFoundError, ValidationError } from '@server/core/errors';
import type {
  IConfig,
  ILogger,
  IProviderConfigStore,
  IProviderRegistry,
  ProviderChangeEvent,
  ProviderConfig,
  ProviderInput,
  ProviderPatch,
} from '@server/core/interfaces';
import { buildProviderConfig, ProviderPatchSchema } from './provider-config.schema';

/**
 * Durable registry of provider configurations.
 *
 * Every mutation builds a new table, persists it, and only then swaps it in,
 * so a failed write leaves the registry unchanged and readers see either the
 * old or the new table. Listeners learn about changes after the swap.
 */
@injectable()
export class ProviderRegistry implements IProviderRegistry {
  private providers = new Map<string, ProviderConfig>();
  private loaded = false;
  private readonly events = new EventEmitter();
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ProviderConfigStore) private store: IProviderConfigStore,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'provider-registry' });
  }

  load(): void {
    const snapshot = this.store.read();
    this.providers = new Map(snapshot.providers.map((provider) => [provider.id, provider]));
    this.loaded = true;
  }

  /**
   * Re-read the file and notify listeners of every provider that changed.
   */
  reload(): void {
    const previous = this.providers;
    this.load();

    for (const [id, before] of previous) {
      const after = this.providers.get(id);
      if (!after) {
        this.emit({ kind: 'removed', providerId: id });
      } else if (!isDeepStrictEqual(before, after)) {
        this.emit({ kind: classifyUpdate(before, after), providerId: id, config: after });
      }
    }
    for (const [id, after] of this.providers) {
      if (!previous.has(id)) {
        this.emit({ kind: 'added', providerId: id, config: after });
      }
    }

    this.logger.info('Provider configuration reloaded', { count: this.providers.size });
  }

  list(): ProviderConfig[] {
    this.ensureLoaded();
    return [...this.providers.values()].map((provider) => structuredClone(provider));
  }

  get(id: string): ProviderConfig | undefined {
    this.ensureLoaded();
    const provider = this.providers.get(id);
    return provider ? structuredClone(provider) : undefined;
  }

  async add(input: ProviderInput): Promise<ProviderConfig> {
    this.ensureLoaded();
    if (this.providers.has(input.id)) {
      throw new ValidationError(`Provider "${input.id}" already exists`, [
        { path: ['id'], message: 'Already exists' },
      ]);
    }

    const provider = buildProviderConfig(input, {
      builtIn: false,
      defaultTimeoutMs: this.config.get<number>('supervisor.defaultTimeoutMs', 30000),
    });

    this.commit(new Map(this.providers).set(provider.id, provider));
    this.logger.info('Provider added', { providerId: provider.id, transport: provider.transport });
    this.emit({ kind: 'added', providerId: provider.id, config: provider });
    return structuredClone(provider);
  }

  async update(id: string, patch: ProviderPatch): Promise<ProviderConfig> {
    const current = this.require(id);

    const parsed = ProviderPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError(`Invalid update for provider "${id}"`, parsed.error.issues);
    }

    const next = buildProviderConfig({ ...parsed.data, id }, { base: current });
    this.commit(new Map(this.providers).set(id, next));
    this.logger.info('Provider updated', { providerId: id, fields: Object.keys(parsed.data) });
    this.emit({ kind: classifyUpdate(current, next), providerId: id, config: next });
    return structuredClone(next);
  }

  async remove(id: string): Promise<void> {
    const current = this.require(id);
    if (current.builtIn) {
      throw new ImmutableProviderError(id);
    }

    const next = new Map(this.providers);
    next.delete(id);
    this.commit(next);
    this.logger.info('Provider removed', { providerId: id });
    this.emit({ kind: 'removed', providerId: id });
  }

  async setEnabled(id: string, enabled: boolean): Promise<ProviderConfig> {
    const current = this.require(id);
    if (current.enabled === enabled) {
      return structuredClone(current);
    }

    const next = { ...current, enabled };
    this.commit(new Map(this.providers).set(id, next));
    this.logger.info(enabled ? 'Provider enabled' : 'Provider disabled', { providerId: id });
    this.emit({ kind: enabled ? 'enabled' : 'disabled', providerId: id, config: next });
    return structuredClone(next);
  }

  onChange(listener: (event: ProviderChangeEvent) => void): () => void {
    this.events.on('change', listener);
    return () => this.events.off('change', listener);
  }

  private commit(next: Map<string, ProviderConfig>): void {
    this.store.write([...next.values()]);
    this.providers = next;
  }

  private require(id: string): ProviderConfig {
    this.ensureLoaded();
    const provider = this.providers.get(id);
    if (!provider) {
      throw new NotFoundError(`Provider "${id}" not found`);
    }
    return provider;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      this.load();
    }
  }

  private emit(event: ProviderChangeEvent): void {
    try {
      this.events.emit('change', event);
    } catch (error) {
      this.logger.error('Provider change listener failed', {
        providerId: event.providerId,
        kind: event.kind,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}

// A flip of `enabled` wins over any other field changed alongside it; the
// event carries the new config either way.
function classifyUpdate(before: ProviderConfig, after: ProviderConfig): ProviderChangeEvent['kind'] {
  if (before.enabled !== after.enabled) {
    return after.enabled ? 'enabled' : 'disabled';
  }
  return 'updated';
}
