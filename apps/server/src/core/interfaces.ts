import type { Server as HttpServerHandle } from 'http';
import type { Database as BetterSqlite3Database } from 'better-sqlite3';

/**
 * Core service interfaces for dependency injection.
 * All services implement these interfaces to enable testability and loose coupling.
 */

// ============================================================================
// Core Infrastructure
// ============================================================================

export interface IConfig {
  get<T>(key: string): T | undefined;
  get<T>(key: string, defaultValue: T): T;
  set<T>(key: string, value: T): void;
  has(key: string): boolean;
  delete(key: string): void;
  readonly dataPath: string;
  readonly isDevelopment: boolean;
}

export interface IDatabase {
  readonly db: BetterSqlite3Database;
  initialize(): void;
  close(): void;
  transaction<T>(fn: () => T): T;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}

// ============================================================================
// Provider Configuration
// ============================================================================

export type TransportKind = 'stdio' | 'streamable_http' | 'sse';

interface ProviderConfigBase {
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  /** Built-in providers can be disabled but never removed. */
  builtIn: boolean;
  /** Per-call timeout for every operation on this provider's connection. */
  timeoutMs: number;
}

export interface StdioProviderConfig extends ProviderConfigBase {
  transport: 'stdio';
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
}

export interface RemoteProviderConfig extends ProviderConfigBase {
  transport: 'streamable_http' | 'sse';
  url: string;
  headers: Record<string, string>;
}

/**
 * Stored provider configuration. String values may hold `${VAR}` or
 * `${VAR:-default}` placeholders; they are resolved at connect time only.
 */
export type ProviderConfig = StdioProviderConfig | RemoteProviderConfig;

export interface ProviderInput {
  id: string;
  name?: string;
  description?: string;
  transport?: TransportKind;
  enabled?: boolean;
  timeoutMs?: number;
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  url?: string;
  headers?: Record<string, string>;
}

export type ProviderPatch = Partial<Omit<ProviderInput, 'id'>>;

export type ProviderChangeKind = 'added' | 'updated' | 'removed' | 'enabled' | 'disabled';

export interface ProviderChangeEvent {
  kind: ProviderChangeKind;
  providerId: string;
  config?: ProviderConfig;
}

export interface ProviderConfigSnapshot {
  providers: ProviderConfig[];
  /** Top-level keys of the file other than the provider map, kept on save. */
  extras: Record<string, unknown>;
}

export interface IProviderConfigStore {
  readonly path: string;
  read(): ProviderConfigSnapshot;
  write(providers: readonly ProviderConfig[]): void;
}

export interface IProviderRegistry {
  load(): void;
  reload(): void;
  list(): ProviderConfig[];
  get(id: string): ProviderConfig | undefined;
  add(input: ProviderInput): Promise<ProviderConfig>;
  update(id: string, patch: ProviderPatch): Promise<ProviderConfig>;
  remove(id: string): Promise<void>;
  setEnabled(id: string, enabled: boolean): Promise<ProviderConfig>;
  onChange(listener: (event: ProviderChangeEvent) => void): () => void;
}

// ============================================================================
// Transports
// ============================================================================

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallResult {
  /** Text rendering of the result content, as relayed to the LLM and client. */
  text: string;
  isError: boolean;
}

export interface TransportCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Stdio transports need one request in flight at a time; HTTP-based ones can multiplex.
 */
export type TransportConcurrency = 'serial' | 'concurrent';

export interface IProviderTransport {
  readonly kind: TransportKind;
  readonly concurrency: TransportConcurrency;
  connect(options: TransportCallOptions): Promise<void>;
  listCapabilities(options: TransportCallOptions): Promise<ToolDescriptor[]>;
  invoke(
    toolName: string,
    args: Record<string, unknown>,
    options: TransportCallOptions
  ): Promise<ToolCallResult>;
  close(): Promise<void>;
  isOpen(): boolean;
  /** Called once when the underlying channel closes without close() being called. */
  onClose(handler: (error: Error) => void): void;
}

export interface ITransportFactory {
  create(config: ProviderConfig): IProviderTransport;
}

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: string | number;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

// ============================================================================
// Connection Supervisor
// ============================================================================

export type ConnectionState = 'disconnected' | 'connecting' | 'ready' | 'degraded' | 'closed';

/**
 * What consumers get back from acquire(): capabilities and an identity to
 * invoke through, never the transport itself.
 */
export interface ConnectionHandle {
  readonly connectionId: string;
  readonly providerId: string;
  readonly capabilities: readonly ToolDescriptor[];
}

export interface ConnectionStatus {
  providerId: string;
  connectionId?: string;
  state: ConnectionState;
  lastError?: string;
  capabilityCount: number;
  lastActivityAt?: number;
  leaseCount: number;
  /** Config changed since connecting; reconnects with the new config on next use. */
  stale: boolean;
  /** Provider was disabled or removed; closes when its last lease is released. */
  retired: boolean;
}

export interface ConnectionStateChange {
  providerId: string;
  connectionId: string;
  from: ConnectionState;
  to: ConnectionState;
  error?: string;
}

export type InvokeOutcome =
  | { ok: true; result: ToolCallResult }
  | { ok: false; error: Error; demoted: boolean };

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface IConnectionSupervisor {
  acquire(providerId: string, holderId?: string): Promise<ConnectionHandle>;
  invoke(
    handle: ConnectionHandle,
    toolName: string,
    args: Record<string, unknown>,
    options?: InvokeOptions
  ): Promise<InvokeOutcome>;
  close(providerId: string): Promise<void>;
  release(providerId: string, holderId: string): Promise<void>;
  releaseAll(holderId: string): Promise<void>;
  probeIdleConnections(idleForMs: number): Promise<void>;
  getStatus(providerId: string): ConnectionStatus;
  listStatuses(): ConnectionStatus[];
  onStateChange(listener: (change: ConnectionStateChange) => void): () => void;
  shutdown(): Promise<void>;
}

export interface IHealthProber {
  start(): void;
  stop(): void;
  runOnce(): Promise<void>;
}

// ============================================================================
// Capability Aggregator
// ============================================================================

export interface NamespaceEntry {
  qualifiedName: string;
  providerId: string;
  tool: ToolDescriptor;
  handle: ConnectionHandle;
}

export interface SkippedProvider {
  providerId: string;
  reason: string;
}

export interface ToolNamespace {
  readonly entries: ReadonlyMap<string, NamespaceEntry>;
  /** Providers whose tools made it into the namespace, in caller order. */
  readonly providerIds: readonly string[];
  readonly skipped: readonly SkippedProvider[];
}

export interface ICapabilityAggregator {
  buildNamespace(providerIds: readonly string[], holderId?: string): Promise<ToolNamespace>;
  invokeByQualifiedName(
    namespace: ToolNamespace,
    name: string,
    args: Record<string, unknown>,
    options?: InvokeOptions
  ): Promise<InvokeOutcome>;
}

// ============================================================================
// Resilience
// ============================================================================

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction of the delay added or removed at random, 0..1. */
  jitter: number;
}

export type BreakerStatus = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerState {
  status: BreakerStatus;
  consecutiveFailures: number;
  openedAt: number | null;
  trialInFlight: boolean;
  failureThreshold: number;
  cooldownMs: number;
}

export interface ResilientExecuteOptions {
  signal?: AbortSignal;
  /** Once this returns true the turn is never retried. */
  hasEmittedOutput: () => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export interface IResilientInvoker {
  execute<T>(
    pathKey: string,
    operation: (attempt: number) => Promise<T>,
    options: ResilientExecuteOptions
  ): Promise<T>;
  getBreakerState(pathKey: string): CircuitBreakerState;
  forget(pathKey: string): void;
}

// ============================================================================
// Agent & LLM Runtime
// ============================================================================

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON argument string as produced by the LLM. */
  arguments: string;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; content: string; toolCallId: string; name: string; isError: boolean };

export interface LlmToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export type LlmStreamEvent =
  | { type: 'token'; content: string }
  | { type: 'tool_calls'; calls: ToolCallRequest[]; independent: boolean };

export interface LlmTurnRequest {
  messages: readonly ChatMessage[];
  tools: readonly LlmToolSchema[];
  signal: AbortSignal;
}

/**
 * Given a prompt and a tool schema, produce a lazy, cancellable sequence of
 * text tokens or tool-call requests. Finite per call, not restartable.
 */
export interface ILlmRuntime {
  stream(request: LlmTurnRequest): AsyncIterable<LlmStreamEvent>;
}

export interface TurnEventSink {
  token(content: string): void;
  toolCallStarted(call: ToolCallRequest, args: Record<string, unknown>): void;
  toolCallResult(call: ToolCallRequest, result: ToolCallResult): void;
}

export interface TurnHandle {
  readonly signal: AbortSignal;
  readonly cancelled: boolean;
  throwIfCancelled(): void;
}

export interface AgentTurnInput {
  conversationId: string;
  history: readonly ChatMessage[];
  userContent: string;
  namespace: ToolNamespace;
  turn: TurnHandle;
  sink: TurnEventSink;
}

export interface AgentTurnResult {
  /** Assistant and tool messages produced by the turn, in order. */
  messages: ChatMessage[];
  rounds: number;
}

export interface IConversationAgent {
  runTurn(input: AgentTurnInput): Promise<AgentTurnResult>;
}

// ============================================================================
// Persistence
// ============================================================================

export interface IConversationRepository {
  appendMessage(conversationId: string, message: ChatMessage): Promise<void>;
  loadHistory(conversationId: string): Promise<ChatMessage[]>;
}

// ============================================================================
// Gateway
// ============================================================================

export type StreamingState = 'idle' | 'generating' | 'cancelling';

/**
 * The socket side of a session; a WebSocket in production.
 */
export interface SessionSink {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code: number, reason: string): void;
}

export interface SessionSummary {
  conversationId: string;
  state: StreamingState;
  attached: boolean;
  selectedProviderIds: string[];
  seq: number;
  historyLength: number;
  lastActivityAt: number;
}

export interface IConversationGateway {
  attach(conversationId: string, sink: SessionSink): void;
  detach(conversationId: string, sink: SessionSink, endSession: boolean): Promise<void>;
  handleRaw(conversationId: string, raw: string): Promise<void>;
  sendHeartbeats(): void;
  sweepIdle(now?: number): Promise<number>;
  listSessions(): SessionSummary[];
  closeSession(conversationId: string, reason: string): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * WebSocket endpoint sharing the admin HTTP server; one socket per conversation.
 */
export interface IWebSocketGateway {
  attach(server: HttpServerHandle): void;
  stop(): Promise<void>;
}

export interface IHttpServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number | undefined;
}

// ============================================================================
// Administration
// ============================================================================

export type ProviderView = ProviderConfig & { status: ConnectionStatus };

export interface IProviderAdmin {
  list(): ProviderView[];
  get(id: string): ProviderView;
  add(input: ProviderInput): Promise<ProviderView>;
  update(id: string, patch: ProviderPatch): Promise<ProviderView>;
  remove(id: string): Promise<void>;
  setEnabled(id: string, enabled: boolean): Promise<ProviderView>;
  status(id: string): ConnectionStatus;
  tools(id: string): Promise<ToolDescriptor[]>;
  reload(): ProviderView[];
}
