import type { ZodIssue } from 'zod';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'IMMUTABLE_PROVIDER'
  | 'PROVIDER_UNAVAILABLE'
  | 'TOOL_INVOCATION_FAILED'
  | 'CIRCUIT_OPEN'
  | 'CANCELLED'
  | 'TRANSPORT_ERROR';

/**
 * Base class for every error raised by the orchestration core.
 * `retryable` tells a client whether sending the same turn again can succeed.
 */
export abstract class GatewayError extends Error {
  abstract readonly code: ErrorCode;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad configuration or request; the caller's fault, never retried.
 */
export class ValidationError extends GatewayError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly issues: ReadonlyArray<Pick<ZodIssue, 'path' | 'message'>> = []
  ) {
    super(message);
  }
}

export class NotFoundError extends GatewayError {
  readonly code = 'NOT_FOUND';
}

/**
 * Attempted removal of a built-in provider.
 */
export class ImmutableProviderError extends GatewayError {
  readonly code = 'IMMUTABLE_PROVIDER';

  constructor(readonly providerId: string) {
    super(`Provider "${providerId}" is built in and cannot be removed`);
  }
}

/**
 * Connecting to a provider failed after the configured attempt budget.
 */
export class ProviderUnavailableError extends GatewayError {
  readonly code = 'PROVIDER_UNAVAILABLE';
  override readonly retryable = true;

  constructor(readonly providerId: string, message: string, options?: { cause?: unknown }) {
    super(`Provider "${providerId}" is unavailable: ${message}`, options);
  }
}

/**
 * One tool call failed. Surfaced to the LLM as a tool result, not to the client.
 */
export class ToolInvocationError extends GatewayError {
  readonly code = 'TOOL_INVOCATION_FAILED';

  constructor(
    readonly toolName: string,
    message: string,
    readonly providerId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class CircuitOpenError extends GatewayError {
  readonly code = 'CIRCUIT_OPEN';
  override readonly retryable = true;

  constructor(readonly pathKey: string, readonly retryAfterMs: number) {
    super(`Circuit open for "${pathKey}", retry in ${Math.ceil(retryAfterMs / 1000)}s`);
  }
}

export class CancelledError extends GatewayError {
  readonly code = 'CANCELLED';

  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

/**
 * Transport-level failure: process exit, closed socket, HTTP failure or timeout.
 */
export class TransportError extends GatewayError {
  readonly code = 'TRANSPORT_ERROR';
  override readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly transient: boolean,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.retryable = transient;
    this.status = options?.status;
  }
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const TRANSIENT_HTTP_STATUSES = new Set([408, 429, 502, 503, 504]);

const TRANSIENT_ERROR_NAMES = new Set([
  'TimeoutError',
  'APIConnectionError',
  'APIConnectionTimeoutError',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Classify an error as transient (worth retrying) or permanent.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof CancelledError || error instanceof CircuitOpenError) {
    return false;
  }
  if (error instanceof TransportError) {
    return error.transient;
  }
  if (error instanceof GatewayError) {
    return false;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  if (TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number' && TRANSIENT_HTTP_STATUSES.has(status)) {
    return true;
  }

  // fetch wraps socket failures as TypeError with the system error as cause
  if (error.cause !== undefined && error.cause !== error) {
    return isTransientError(error.cause);
  }

  return false;
}

export function isTransientHttpStatus(status: number): boolean {
  return TRANSIENT_HTTP_STATUSES.has(status) || status >= 500;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
