import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import { toErrorMessage } from './errors';
import type {
  ICapabilityAggregator,
  IConfig,
  IConnectionSupervisor,
  IConversationAgent,
  IConversationGateway,
  IConversationRepository,
  IDatabase,
  IHealthProber,
  IHttpServer,
  ILlmRuntime,
  ILogger,
  IProviderAdmin,
  IProviderConfigStore,
  IProviderRegistry,
  IResilientInvoker,
  ITransportFactory,
  IWebSocketGateway,
} from './interfaces';

// Core
import { ConfigService } from '@server/services/core/config.service';
import { SqliteDatabase } from '@server/services/core/database.service';
import { Logger } from '@server/services/core/logger.service';

// Providers & connections
import { ProviderConfigFileStore } from '@server/services/providers/provider-config.repository';
import { ProviderRegistry } from '@server/services/providers/provider-registry.service';
import { TransportFactory } from '@server/services/transport/transport-factory';
import { ConnectionSupervisor } from '@server/services/supervisor/connection-supervisor.service';
import { HealthProber } from '@server/services/supervisor/health-prober.service';
import { CapabilityAggregator } from '@server/services/aggregator/capability-aggregator.service';
import { ProviderAdmin } from '@server/services/admin/provider-admin.service';

// Conversation
import { ResilientInvoker } from '@server/services/resilience/resilient-invoker.service';
import { OpenAiLlmRuntime } from '@server/services/agent/openai-llm-runtime';
import { ConversationAgent } from '@server/services/agent/conversation-agent.service';
import { ConversationRepository } from '@server/repositories/conversation.repository';
import { ConversationGateway } from '@server/services/gateway/conversation-gateway.service';

// Network
import { WebSocketGateway } from '@server/services/gateway/websocket-gateway.service';
import { AdminHttpServer } from '@server/services/http/admin-http-server.service';

/**
 * Creates and configures the InversifyJS dependency injection container.
 * All services are bound as singletons by default.
 */
export function createContainer(): Container {
  const container = new Container({
    defaultScope: 'Singleton',
    autoBindInjectable: false,
  });

  // ============================================================================
  // Core Infrastructure
  // ============================================================================
  container.bind<IConfig>(TYPES.Config).to(ConfigService);
  container.bind<ILogger>(TYPES.Logger).toConstantValue(new Logger());
  container.bind<IDatabase>(TYPES.Database).to(SqliteDatabase);

  // ============================================================================
  // Providers & Connections
  // ============================================================================
  container.bind<IProviderConfigStore>(TYPES.ProviderConfigStore).to(ProviderConfigFileStore);
  container.bind<IProviderRegistry>(TYPES.ProviderRegistry).to(ProviderRegistry);
  container.bind<ITransportFactory>(TYPES.TransportFactory).to(TransportFactory);
  container.bind<IConnectionSupervisor>(TYPES.ConnectionSupervisor).to(ConnectionSupervisor);
  container.bind<IHealthProber>(TYPES.HealthProber).to(HealthProber);
  container.bind<ICapabilityAggregator>(TYPES.CapabilityAggregator).to(CapabilityAggregator);
  container.bind<IProviderAdmin>(TYPES.ProviderAdmin).to(ProviderAdmin);

  // ============================================================================
  // Conversation
  // ============================================================================
  container.bind<IResilientInvoker>(TYPES.ResilientInvoker).to(ResilientInvoker);
  container.bind<ILlmRuntime>(TYPES.LlmRuntime).to(OpenAiLlmRuntime);
  container.bind<IConversationAgent>(TYPES.ConversationAgent).to(ConversationAgent);
  container.bind<IConversationRepository>(TYPES.ConversationRepository).to(ConversationRepository);
  container.bind<IConversationGateway>(TYPES.ConversationGateway).to(ConversationGateway);

  // ============================================================================
  // Network
  // ============================================================================
  container.bind<IWebSocketGateway>(TYPES.WebSocketGateway).to(WebSocketGateway);
  container.bind<IHttpServer>(TYPES.HttpServer).to(AdminHttpServer);

  return container;
}

/**
 * Global container instance.
 * Initialize by calling initializeContainer() during startup.
 */
let containerInstance: Container | null = null;

export function initializeContainer(): Container {
  if (containerInstance) {
    throw new Error('Container already initialized. Call disposeContainer() first.');
  }
  containerInstance = createContainer();
  return containerInstance;
}

/**
 * Returns the global container instance.
 * Throws if container hasn't been initialized.
 */
export function getContainer(): Container {
  if (!containerInstance) {
    throw new Error('Container not initialized. Call initializeContainer() first.');
  }
  return containerInstance;
}

/**
 * Shuts down, in order: the HTTP and WebSocket listeners, open conversation
 * sessions, health probing, every provider connection, then the database.
 */
export async function disposeContainer(): Promise<void> {
  const container = containerInstance;
  if (!container) {
    return;
  }
  containerInstance = null;
  await shutdownServices(container);
}

export async function shutdownServices(container: Container): Promise<void> {
  const logger = container.get<ILogger>(TYPES.Logger);

  const steps: Array<[string, () => Promise<void> | void]> = [
    ['http server', () => container.get<IHttpServer>(TYPES.HttpServer).stop()],
    ['conversation sessions', () => container.get<IConversationGateway>(TYPES.ConversationGateway).shutdown()],
    ['health prober', () => container.get<IHealthProber>(TYPES.HealthProber).stop()],
    ['connection supervisor', () => container.get<IConnectionSupervisor>(TYPES.ConnectionSupervisor).shutdown()],
    ['database', () => container.get<IDatabase>(TYPES.Database).close()],
  ];

  for (const [name, step] of steps) {
    try {
      await step();
    } catch (error) {
      logger.error('Shutdown step failed', { step: name, error: toErrorMessage(error) });
    }
  }
}

/**
 * Helper to get a service from the container.
 */
export function getService<T>(serviceIdentifier: symbol): T {
  return getContainer().get<T>(serviceIdentifier);
}
