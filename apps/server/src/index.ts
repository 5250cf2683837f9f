/**
 * Public surface of the server package, for embedding and tests.
 */
export { createContainer, initializeContainer, getContainer, disposeContainer, getService } from './core/container';
export { TYPES } from './core/types';
export * from './core/errors';
export type * from './core/interfaces';
export type { ClientEnvelope, ServerEnvelope, ServerMessage } from './services/gateway/stream-protocol';
export { WEBSOCKET_PATH } from './services/gateway/websocket-gateway.service';
