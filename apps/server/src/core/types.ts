/**
 * Dependency injection service identifiers.
 * Using Symbol.for() so identifiers survive module reloads in tests.
 */
export const TYPES = {
  // Core Infrastructure
  Config: Symbol.for('Config'),
  Logger: Symbol.for('Logger'),
  Database: Symbol.for('Database'),

  // Providers
  ProviderConfigStore: Symbol.for('ProviderConfigStore'),
  ProviderRegistry: Symbol.for('ProviderRegistry'),
  ProviderAdmin: Symbol.for('ProviderAdmin'),

  // Connections
  TransportFactory: Symbol.for('TransportFactory'),
  ConnectionSupervisor: Symbol.for('ConnectionSupervisor'),
  HealthProber: Symbol.for('HealthProber'),
  CapabilityAggregator: Symbol.for('CapabilityAggregator'),

  // Conversation
  ResilientInvoker: Symbol.for('ResilientInvoker'),
  LlmRuntime: Symbol.for('LlmRuntime'),
  ConversationAgent: Symbol.for('ConversationAgent'),
  ConversationRepository: Symbol.for('ConversationRepository'),
  ConversationGateway: Symbol.for('ConversationGateway'),

  // Network
  HttpServer: Symbol.for('HttpServer'),
  WebSocketGateway: Symbol.for('WebSocketGateway'),
} as const;

export type ServiceIdentifier = (typeof TYPES)[keyof typeof TYPES];
