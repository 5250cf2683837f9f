import { injectable, inject } from 'inversify';
import { TYPES } from '@server/core/types';
import { ToolInvocationError, toErrorMessage } from '@server/core/errors';
import type {
  ICapabilityAggregator,
  IConnectionSupervisor,
  ILogger,
  InvokeOptions,
  InvokeOutcome,
  LlmToolSchema,
  NamespaceEntry,
  SkippedProvider,
  ToolNamespace,
} from '@server/core/interfaces';
import { SYSTEM_HOLDER } from '@server/services/supervisor/connection-supervisor.service';

/**
 * Merges the tools of the providers selected for a conversation into one
 * namespace keyed by tool name.
 *
 * Collisions: when two providers expose the same tool name, the provider that
 * comes later in the caller's list owns the name and one warning is logged.
 * Providers that cannot be reached are skipped; the namespace is built from
 * whatever is available.
 */
@injectable()
export class CapabilityAggregator implements ICapabilityAggregator {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ConnectionSupervisor) private supervisor: IConnectionSupervisor,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'capability-aggregator' });
  }

  async buildNamespace(providerIds: readonly string[], holderId: string = SYSTEM_HOLDER): Promise<ToolNamespace> {
    const ids = [...new Set(providerIds)];
    const acquired = await Promise.allSettled(ids.map((id) => this.supervisor.acquire(id, holderId)));

    const entries = new Map<string, NamespaceEntry>();
    const available: string[] = [];
    const skipped: SkippedProvider[] = [];

    acquired.forEach((outcome, index) => {
      const providerId = ids[index];
      if (providerId === undefined) {
        return;
      }

      if (outcome.status === 'rejected') {
        const reason = toErrorMessage(outcome.reason);
        skipped.push({ providerId, reason });
        this.logger.warn('Provider unavailable, continuing without its tools', { providerId, holderId, reason });
        return;
      }

      const handle = outcome.value;
      available.push(providerId);

      for (const tool of handle.capabilities) {
        const existing = entries.get(tool.name);
        if (existing) {
          this.logger.warn('Tool name collision, later provider wins', {
            tool: tool.name,
            winner: providerId,
            shadowed: existing.providerId,
          });
        }
        entries.set(tool.name, { qualifiedName: tool.name, providerId, tool, handle });
      }
    });

    this.logger.debug('Tool namespace built', {
      holderId,
      providers: available,
      tools: entries.size,
      skipped: skipped.length,
    });

    return { entries, providerIds: available, skipped };
  }

  async invokeByQualifiedName(
    namespace: ToolNamespace,
    name: string,
    args: Record<string, unknown>,
    options: InvokeOptions = {}
  ): Promise<InvokeOutcome> {
    const entry = namespace.entries.get(name);
    if (!entry) {
      return {
        ok: false,
        error: new ToolInvocationError(name, `Unknown tool "${name}"`),
        demoted: false,
      };
    }

    return this.supervisor.invoke(entry.handle, entry.tool.name, args, options);
  }
}

/**
 * Tool schemas for the LLM, in namespace order.
 */
export function toLlmToolSchemas(namespace: ToolNamespace): LlmToolSchema[] {
  return [...namespace.entries.values()].map((entry) => ({
    name: entry.qualifiedName,
    description: entry.tool.description ?? '',
    parameters: entry.tool.inputSchema,
  }));
}
