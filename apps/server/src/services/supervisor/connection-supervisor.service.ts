import { injectable, inject } from 'inversify';
import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';
import { TYPES } from '@server/core/types';
import {
  CancelledError,
  ProviderUnavailableError,
  ToolInvocationError,
  toErrorMessage,
} from '@server/core/errors';
import type {
  ConnectionHandle,
  ConnectionState,
  ConnectionStateChange,
  ConnectionStatus,
  IConfig,
  IConnectionSupervisor,
  ILogger,
  IProviderRegistry,
  IProviderTransport,
  ITransportFactory,
  InvokeOptions,
  InvokeOutcome,
  ProviderChangeEvent,
  ProviderConfig,
  ToolCallResult,
  ToolDescriptor,
} from '@server/core/interfaces';
import { assertTransition } from './connection-state';
import { SerialQueue } from './serial-queue';

/** Holder used when a caller does not name one. */
export const SYSTEM_HOLDER = '__system';

export interface ReconnectPolicy {
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
  maxAttempts: number;
}

interface ConnectionRecord {
  readonly connectionId: string;
  readonly providerId: string;
  config: ProviderConfig;
  transport: IProviderTransport | null;
  state: ConnectionState;
  lastError?: string;
  capabilities: ToolDescriptor[];
  lastActivityAt?: number;
  readonly leases: Set<string>;
  /** Config changed since this connection was opened. */
  stale: boolean;
  /** Provider disabled or removed, or a newer connection replaced this one; closes once the last lease is released. */
  retired: boolean;
  everReady: boolean;
  connecting: Promise<void> | null;
  reconnectTimer: NodeJS.Timeout | null;
  reconnectAttempts: number;
  readonly queue: SerialQueue;
}

/**
 * Owns one connection per provider and everything about its lifecycle:
 * connect on first use, serialize calls where the transport needs it,
 * demote on failure, reconnect with backoff, close when retired.
 * Consumers hold a ConnectionHandle, never a transport.
 */
@injectable()
export class ConnectionSupervisor implements IConnectionSupervisor {
  private records = new Map<string, ConnectionRecord>();
  /** Replaced by a connection on newer config but still leased, by connectionId. */
  private superseded = new Map<string, ConnectionRecord>();
  private readonly events = new EventEmitter();
  private readonly logger: ILogger;
  private readonly unsubscribe: () => void;
  private shuttingDown = false;

  constructor(
    @inject(TYPES.ProviderRegistry) private registry: IProviderRegistry,
    @inject(TYPES.TransportFactory) private transportFactory: ITransportFactory,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'connection-supervisor' });
    this.unsubscribe = this.registry.onChange((event) => this.handleProviderChange(event));
  }

  async acquire(providerId: string, holderId: string = SYSTEM_HOLDER): Promise<ConnectionHandle> {
    if (this.shuttingDown) {
      throw new ProviderUnavailableError(providerId, 'gateway is shutting down');
    }

    let record = this.records.get(providerId);
    const config = this.registry.get(providerId);

    if (!config || !config.enabled || record?.retired) {
      // A holder that already leases a retired connection keeps using it.
      if (record && record.state !== 'closed' && record.leases.has(holderId)) {
        await this.ensureReady(record);
        return this.toHandle(record);
      }
      throw new ProviderUnavailableError(providerId, config ? 'provider is disabled' : 'provider is not configured');
    }

    if (record && record.stale && record.state !== 'connecting' && record.state !== 'closed') {
      this.supersede(record, holderId);
      record = undefined;
    }

    if (!record || record.state === 'closed') {
      record = this.createRecord(config);
    }

    const isNewLease = !record.leases.has(holderId);
    record.leases.add(holderId);
    try {
      await this.ensureReady(record);
    } catch (error) {
      if (isNewLease) {
        record.leases.delete(holderId);
      }
      throw error;
    }

    return this.toHandle(record);
  }

  async invoke(
    handle: ConnectionHandle,
    toolName: string,
    args: Record<string, unknown>,
    options: InvokeOptions = {}
  ): Promise<InvokeOutcome> {
    const { providerId } = handle;
    const record = this.findRecord(handle);

    if (!record || record.state === 'closed') {
      return {
        ok: false,
        error: new ToolInvocationError(toolName, `Connection to "${providerId}" is no longer available`, providerId),
        demoted: false,
      };
    }

    if (record.state !== 'ready') {
      if (record.retired) {
        const reason = this.superseded.has(record.connectionId) ? 'has been reconfigured' : 'is disabled';
        return {
          ok: false,
          error: new ToolInvocationError(toolName, `Provider "${providerId}" ${reason}`, providerId),
          demoted: false,
        };
      }
      try {
        await this.ensureReady(record);
      } catch (error) {
        return { ok: false, error: toInvocationError(toolName, providerId, error), demoted: false };
      }
    }

    const transport = record.transport;
    if (!transport) {
      return {
        ok: false,
        error: new ToolInvocationError(toolName, `Connection to "${providerId}" is not open`, providerId),
        demoted: false,
      };
    }

    const call = (): Promise<ToolCallResult> =>
      transport.invoke(toolName, args, {
        timeoutMs: record.config.timeoutMs,
        ...(options.signal ? { signal: options.signal } : {}),
      });

    try {
      const result = await this.schedule(record, transport, call, options.signal);
      record.lastActivityAt = Date.now();

      if (result.isError) {
        return {
          ok: false,
          error: new ToolInvocationError(toolName, result.text || `Tool "${toolName}" reported an error`, providerId),
          demoted: false,
        };
      }
      return { ok: true, result };
    } catch (error) {
      if (error instanceof CancelledError) {
        return { ok: false, error, demoted: false };
      }

      const demoted = record.transport === transport && this.demote(record, error);
      this.logger.warn('Tool invocation failed', {
        providerId,
        tool: toolName,
        demoted,
        error: toErrorMessage(error),
      });
      return { ok: false, error: toInvocationError(toolName, providerId, error), demoted };
    }
  }

  async close(providerId: string): Promise<void> {
    const record = this.records.get(providerId);
    if (record) {
      await this.closeRecord(record, 'closed by request');
    }
  }

  async release(providerId: string, holderId: string): Promise<void> {
    const held = this.allRecords().filter((record) => record.providerId === providerId);
    await Promise.all(held.map((record) => this.releaseLease(record, holderId)));
  }

  async releaseAll(holderId: string): Promise<void> {
    await Promise.all(this.allRecords().map((record) => this.releaseLease(record, holderId)));
  }

  /**
   * List capabilities on every ready connection with no activity in the last
   * `idleForMs`; a failed probe demotes the connection.
   */
  async probeIdleConnections(idleForMs: number): Promise<void> {
    const now = Date.now();
    const idle = [...this.records.values()].filter(
      (record) => record.state === 'ready' && now - (record.lastActivityAt ?? 0) >= idleForMs
    );

    await Promise.all(idle.map((record) => this.probe(record)));
  }

  getStatus(providerId: string): ConnectionStatus {
    const record = this.records.get(providerId);
    if (!record) {
      return {
        providerId,
        state: 'disconnected',
        capabilityCount: 0,
        leaseCount: 0,
        stale: false,
        retired: false,
      };
    }
    return this.toStatus(record);
  }

  listStatuses(): ConnectionStatus[] {
    return [...this.records.values()].map((record) => this.toStatus(record));
  }

  onStateChange(listener: (change: ConnectionStateChange) => void): () => void {
    this.events.on('stateChange', listener);
    return () => this.events.off('stateChange', listener);
  }

  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.unsubscribe();

    const records = this.allRecords();
    this.logger.info('Closing all provider connections', { count: records.length });
    await Promise.all(records.map((record) => this.closeRecord(record, 'shutdown')));
  }

  private allRecords(): ConnectionRecord[] {
    return [...this.records.values(), ...this.superseded.values()];
  }

  private findRecord(handle: ConnectionHandle): ConnectionRecord | undefined {
    const current = this.records.get(handle.providerId);
    if (current?.connectionId === handle.connectionId) {
      return current;
    }
    return this.superseded.get(handle.connectionId);
  }

  private async releaseLease(record: ConnectionRecord, holderId: string): Promise<void> {
    if (!record.leases.delete(holderId)) {
      return;
    }
    if (record.retired && record.leases.size === 0) {
      await this.closeRecord(record, 'last lease released');
    }
  }

  /**
   * Move a stale connection aside so the caller gets one on the current
   * config. Other holders keep the old connection until they release it.
   */
  private supersede(record: ConnectionRecord, holderId: string): void {
    this.records.delete(record.providerId);
    record.leases.delete(holderId);

    if (record.leases.size === 0) {
      this.closeRecord(record, 'configuration changed').catch((error) =>
        this.logger.error('Failed to close stale connection', {
          providerId: record.providerId,
          error: toErrorMessage(error),
        })
      );
      return;
    }

    record.retired = true;
    this.clearReconnectTimer(record);
    this.superseded.set(record.connectionId, record);
    this.logger.info('Provider reconfigured, previous connection kept for current holders', {
      providerId: record.providerId,
      connectionId: record.connectionId,
      holders: record.leases.size,
    });
  }

  private createRecord(config: ProviderConfig): ConnectionRecord {
    const record: ConnectionRecord = {
      connectionId: nanoid(),
      providerId: config.id,
      config,
      transport: null,
      state: 'disconnected',
      capabilities: [],
      leases: new Set(),
      stale: false,
      retired: false,
      everReady: false,
      connecting: null,
      reconnectTimer: null,
      reconnectAttempts: 0,
      queue: new SerialQueue(),
    };
    this.records.set(config.id, record);
    return record;
  }

  private async ensureReady(record: ConnectionRecord): Promise<void> {
    if (record.state === 'ready') {
      return;
    }
    await this.connect(record);
  }

  /**
   * Connect or reconnect; concurrent callers share one attempt.
   */
  private connect(record: ConnectionRecord): Promise<void> {
    if (record.state === 'closed') {
      return Promise.reject(new ProviderUnavailableError(record.providerId, 'connection is closed'));
    }
    if (!record.connecting) {
      record.connecting = this.runConnect(record).finally(() => {
        record.connecting = null;
      });
    }
    return record.connecting;
  }

  private async runConnect(record: ConnectionRecord): Promise<void> {
    this.clearReconnectTimer(record);
    const attempts = Math.max(1, this.config.get<number>('supervisor.connectAttempts', 1));
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (record.state === 'closed') {
        throw new ProviderUnavailableError(record.providerId, 'connection closed while connecting');
      }

      const latest = this.registry.get(record.providerId);
      if (latest && !record.retired) {
        record.config = latest;
        record.stale = false;
      }

      this.transition(record, 'connecting');
      let transport: IProviderTransport | null = null;

      try {
        const created = this.transportFactory.create(record.config);
        transport = created;
        created.onClose((error) => this.handleTransportClosed(record, created, error));

        const options = { timeoutMs: record.config.timeoutMs };
        await created.connect(options);
        const capabilities = await created.listCapabilities(options);

        if (this.isClosed(record)) {
          await closeQuietly(created, this.logger);
          throw new ProviderUnavailableError(record.providerId, 'connection closed while connecting');
        }

        record.transport = created;
        record.capabilities = capabilities;
        record.lastError = undefined;
        record.lastActivityAt = Date.now();
        record.reconnectAttempts = 0;
        record.everReady = true;
        this.transition(record, 'ready');

        this.logger.info('Provider connected', {
          providerId: record.providerId,
          connectionId: record.connectionId,
          transport: record.config.transport,
          tools: capabilities.length,
          attempt,
        });
        return;
      } catch (error) {
        lastError = error;
        record.lastError = toErrorMessage(error);
        if (transport) {
          await closeQuietly(transport, this.logger);
        }
        if (error instanceof ProviderUnavailableError) {
          throw error;
        }
        this.logger.debug('Provider connect attempt failed', {
          providerId: record.providerId,
          attempt,
          attempts,
          error: record.lastError,
        });
      }
    }

    this.handleConnectFailure(record);
    throw new ProviderUnavailableError(record.providerId, toErrorMessage(lastError), { cause: lastError });
  }

  private handleConnectFailure(record: ConnectionRecord): void {
    if (this.isClosed(record)) {
      return;
    }

    const policy = this.reconnectPolicy();
    if (record.everReady && !record.retired && record.reconnectAttempts < policy.maxAttempts) {
      this.transition(record, 'degraded', record.lastError);
      this.scheduleReconnect(record);
    } else {
      this.transition(record, 'disconnected', record.lastError);
    }
  }

  /**
   * Ready → Degraded after a transport failure. Returns whether it demoted.
   */
  private demote(record: ConnectionRecord, error: unknown): boolean {
    if (record.state !== 'ready') {
      return false;
    }

    record.lastError = toErrorMessage(error);
    const transport = record.transport;
    record.transport = null;
    this.transition(record, 'degraded', record.lastError);

    if (transport) {
      void closeQuietly(transport, this.logger);
    }

    if (record.retired) {
      this.transition(record, 'disconnected', record.lastError);
    } else {
      this.scheduleReconnect(record);
    }
    return true;
  }

  private scheduleReconnect(record: ConnectionRecord): void {
    if (record.reconnectTimer || this.shuttingDown) {
      return;
    }

    const policy = this.reconnectPolicy();
    if (record.reconnectAttempts >= policy.maxAttempts) {
      this.logger.error('Provider reconnect attempts exhausted', {
        providerId: record.providerId,
        attempts: record.reconnectAttempts,
      });
      this.transition(record, 'disconnected', record.lastError);
      return;
    }

    const delay = Math.min(
      policy.initialBackoffMs * Math.pow(policy.backoffMultiplier, record.reconnectAttempts),
      policy.maxBackoffMs
    );
    record.reconnectAttempts++;

    this.logger.info('Scheduling provider reconnect', {
      providerId: record.providerId,
      attempt: record.reconnectAttempts,
      delay,
    });

    record.reconnectTimer = setTimeout(() => {
      record.reconnectTimer = null;
      this.connect(record).catch((error: unknown) => {
        this.logger.debug('Scheduled reconnect failed', {
          providerId: record.providerId,
          error: toErrorMessage(error),
        });
      });
    }, delay);
    record.reconnectTimer.unref();
  }

  private async probe(record: ConnectionRecord): Promise<void> {
    const transport = record.transport;
    if (!transport) {
      return;
    }

    try {
      const capabilities = await this.schedule(record, transport, () =>
        transport.listCapabilities({ timeoutMs: record.config.timeoutMs })
      );
      if (record.transport === transport) {
        record.capabilities = capabilities;
      }
      this.logger.debug('Provider probe succeeded', { providerId: record.providerId });
    } catch (error) {
      this.logger.warn('Provider probe failed', { providerId: record.providerId, error: toErrorMessage(error) });
      if (record.transport === transport) {
        this.demote(record, error);
      }
    }
  }

  private schedule<T>(
    record: ConnectionRecord,
    transport: IProviderTransport,
    task: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    return transport.concurrency === 'serial' ? record.queue.run(task, signal) : task();
  }

  private handleTransportClosed(record: ConnectionRecord, transport: IProviderTransport, error: Error): void {
    if (record.transport !== transport) {
      return;
    }
    this.logger.warn('Provider connection lost', { providerId: record.providerId, error: error.message });
    this.demote(record, error);
  }

  private handleProviderChange(event: ProviderChangeEvent): void {
    const record = this.records.get(event.providerId);
    if (!record || record.state === 'closed') {
      return;
    }

    switch (event.kind) {
      case 'disabled':
      case 'removed':
        this.retire(record, `provider ${event.kind}`);
        break;
      case 'updated':
        if (event.config?.enabled === false) {
          this.retire(record, 'provider disabled');
        } else {
          record.stale = true;
        }
        break;
      case 'added':
      case 'enabled':
        record.retired = false;
        record.stale = true;
        break;
    }
  }

  private retire(record: ConnectionRecord, reason: string): void {
    record.retired = true;
    this.clearReconnectTimer(record);
    if (record.leases.size === 0) {
      this.closeRecord(record, reason).catch((error) =>
        this.logger.error('Failed to close retired connection', {
          providerId: record.providerId,
          error: toErrorMessage(error),
        })
      );
      return;
    }
    this.logger.info('Provider retired, connection kept for current holders', {
      providerId: record.providerId,
      holders: record.leases.size,
      reason,
    });
  }

  private async closeRecord(record: ConnectionRecord, reason: string): Promise<void> {
    if (record.state === 'closed') {
      return;
    }

    this.clearReconnectTimer(record);
    const transport = record.transport;
    record.transport = null;
    this.transition(record, 'closed');
    this.logger.info('Provider connection closed', { providerId: record.providerId, reason });

    this.superseded.delete(record.connectionId);
    if (!this.registry.get(record.providerId) && this.records.get(record.providerId) === record) {
      this.records.delete(record.providerId);
    }

    if (transport) {
      await closeQuietly(transport, this.logger);
    }
  }

  private clearReconnectTimer(record: ConnectionRecord): void {
    if (record.reconnectTimer) {
      clearTimeout(record.reconnectTimer);
      record.reconnectTimer = null;
    }
  }

  private isClosed(record: ConnectionRecord): boolean {
    return record.state === 'closed';
  }

  private transition(record: ConnectionRecord, to: ConnectionState, error?: string): void {
    const from = record.state;
    if (from === to) {
      return;
    }
    assertTransition(from, to);
    record.state = to;

    this.logger.debug('Connection state changed', { providerId: record.providerId, from, to });

    const change: ConnectionStateChange = {
      providerId: record.providerId,
      connectionId: record.connectionId,
      from,
      to,
      ...(error !== undefined ? { error } : {}),
    };
    try {
      this.events.emit('stateChange', change);
    } catch (listenerError) {
      this.logger.error('Connection state listener failed', {
        providerId: record.providerId,
        error: toErrorMessage(listenerError),
      });
    }
  }

  private reconnectPolicy(): ReconnectPolicy {
    return {
      initialBackoffMs: this.config.get<number>('supervisor.reconnect.initialBackoffMs', 1000),
      backoffMultiplier: this.config.get<number>('supervisor.reconnect.backoffMultiplier', 2),
      maxBackoffMs: this.config.get<number>('supervisor.reconnect.maxBackoffMs', 30000),
      maxAttempts: this.config.get<number>('supervisor.reconnect.maxAttempts', 5),
    };
  }

  private toHandle(record: ConnectionRecord): ConnectionHandle {
    return {
      connectionId: record.connectionId,
      providerId: record.providerId,
      capabilities: record.capabilities.map((tool) => structuredClone(tool)),
    };
  }

  private toStatus(record: ConnectionRecord): ConnectionStatus {
    return {
      providerId: record.providerId,
      connectionId: record.connectionId,
      state: record.state,
      ...(record.lastError !== undefined ? { lastError: record.lastError } : {}),
      capabilityCount: record.capabilities.length,
      ...(record.lastActivityAt !== undefined ? { lastActivityAt: record.lastActivityAt } : {}),
      leaseCount: record.leases.size,
      stale: record.stale,
      retired: record.retired,
    };
  }
}

function toInvocationError(toolName: string, providerId: string, error: unknown): ToolInvocationError {
  if (error instanceof ToolInvocationError) {
    return error;
  }
  return new ToolInvocationError(toolName, `Tool "${toolName}" failed: ${toErrorMessage(error)}`, providerId, {
    cause: error,
  });
}

async function closeQuietly(transport: IProviderTransport, logger: ILogger): Promise<void> {
  try {
    await transport.close();
  } catch (error) {
    logger.warn('Failed to close provider transport', { error: toErrorMessage(error) });
  }
}
