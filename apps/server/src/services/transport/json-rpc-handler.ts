import { nanoid } from 'nanoid';
import { CancelledError, GatewayError, TransportError, isTransientError, toErrorMessage } from '@server/core/errors';
import type {
  ILogger,
  JsonRpcError,
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcResponse,
  TransportCallOptions,
} from '@server/core/interfaces';

/**
 * An error response from the remote peer. For `tools/call` this is a tool
 * failure, not a broken connection.
 */
export class JsonRpcRemoteError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcRemoteError';
  }
}

/**
 * Delivers one outgoing message. The signal aborts when the request settles
 * or times out, so HTTP-based channels can drop the underlying fetch.
 */
export type JsonRpcSendFunction = (message: JsonRpcMessage, signal: AbortSignal) => Promise<void>;

export type JsonRpcRequestHandler = (method: string, params: unknown) => Promise<unknown>;

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  method: string;
  startTime: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRequestId(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

function readError(value: unknown): JsonRpcError | undefined {
  if (!isRecord(value) || typeof value.message !== 'string') {
    return undefined;
  }
  return {
    code: typeof value.code === 'number' ? value.code : -32603,
    message: value.message,
    data: value.data,
  };
}

/**
 * JSON-RPC 2.0 correlation for one connection: request ids, per-request
 * timeouts and cancellation, incoming requests and notifications.
 */
export class JsonRpcHandler {
  private pendingRequests = new Map<string | number, PendingRequest>();
  private requestHandler?: JsonRpcRequestHandler;
  private notificationHandler?: (method: string, params: unknown) => void;
  private nextId = 1;

  constructor(
    private logger: ILogger,
    private send: JsonRpcSendFunction
  ) {}

  /**
   * Send a request and wait for its response.
   * Rejects with TransportError on timeout or a failed send, CancelledError
   * when the signal aborts, and JsonRpcRemoteError on an error response.
   */
  sendRequest(method: string, params: unknown, options: TransportCallOptions): Promise<unknown> {
    const id = this.generateId();
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
    const { signal, timeoutMs } = options;

    if (signal?.aborted) {
      return Promise.reject(new CancelledError(`${method} cancelled`));
    }

    return new Promise<unknown>((resolve, reject) => {
      const controller = new AbortController();

      const cleanup = (): boolean => {
        if (!this.pendingRequests.has(id)) {
          return false;
        }
        this.pendingRequests.delete(id);
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        return true;
      };

      const fail = (error: Error): void => {
        if (cleanup()) {
          controller.abort();
          reject(error);
        }
      };

      const onAbort = (): void => fail(new CancelledError(`${method} cancelled`));

      const timeout = setTimeout(() => {
        this.logger.warn('JSON-RPC request timed out', { id, method, timeoutMs });
        fail(new TransportError(`Request timed out after ${timeoutMs}ms: ${method}`, true));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.pendingRequests.set(id, {
        resolve: (value) => {
          if (cleanup()) {
            resolve(value);
          }
        },
        reject: fail,
        method,
        startTime: Date.now(),
      });

      this.logger.debug('Sending JSON-RPC request', { id, method });
      this.send(request, controller.signal).catch((error: unknown) => {
        fail(toSendError(error, method));
      });
    });
  }

  /**
   * Send a notification (no response expected).
   */
  async sendNotification(method: string, params?: unknown): Promise<void> {
    this.logger.debug('Sending JSON-RPC notification', { method });
    try {
      await this.send({ jsonrpc: '2.0', method, params }, new AbortController().signal);
    } catch (error) {
      throw toSendError(error, method);
    }
  }

  /**
   * Dispatch one parsed incoming message.
   */
  handleMessage(message: unknown): void {
    if (!isRecord(message)) {
      this.logger.warn('Received non-object JSON-RPC message');
      return;
    }

    const { id, method } = message;

    if (typeof method === 'string') {
      if (isRequestId(id)) {
        void this.handleRequest(id, method, message.params);
      } else {
        this.handleNotification(method, message.params);
      }
      return;
    }

    if (isRequestId(id) && ('result' in message || 'error' in message)) {
      this.handleResponse(id, message.result, readError(message.error));
      return;
    }

    this.logger.warn('Received unknown JSON-RPC message format', { id: isRequestId(id) ? id : null });
  }

  onRequest(handler: JsonRpcRequestHandler): void {
    this.requestHandler = handler;
  }

  onNotification(handler: (method: string, params: unknown) => void): void {
    this.notificationHandler = handler;
  }

  isPending(id: string | number): boolean {
    return this.pendingRequests.has(id);
  }

  /**
   * Reject every pending request with the given error.
   */
  close(error: Error = new TransportError('Connection closed', true)): void {
    for (const pending of [...this.pendingRequests.values()]) {
      pending.reject(error);
    }
  }

  getPendingCount(): number {
    return this.pendingRequests.size;
  }

  private handleResponse(id: string | number, result: unknown, error: JsonRpcError | undefined): void {
    const pending = this.pendingRequests.get(id);
    if (!pending) {
      this.logger.warn('Received response for unknown request', { id });
      return;
    }

    this.logger.debug('Received JSON-RPC response', {
      id,
      method: pending.method,
      duration: Date.now() - pending.startTime,
      hasError: error !== undefined,
    });

    if (error) {
      pending.reject(new JsonRpcRemoteError(error.code, error.message, error.data));
    } else {
      pending.resolve(result);
    }
  }

  private async handleRequest(id: string | number, method: string, params: unknown): Promise<void> {
    let response: JsonRpcResponse;

    if (!this.requestHandler) {
      this.logger.warn('No request handler registered', { method });
      response = { jsonrpc: '2.0', id, error: { code: -32601, message: 'Method not found' } };
    } else {
      try {
        response = { jsonrpc: '2.0', id, result: await this.requestHandler(method, params) };
      } catch (error) {
        const code = error instanceof JsonRpcRemoteError ? error.code : -32603;
        response = { jsonrpc: '2.0', id, error: { code, message: toErrorMessage(error) } };
      }
    }

    try {
      await this.send(response, new AbortController().signal);
    } catch (error) {
      this.logger.warn('Failed to answer JSON-RPC request', { method, error: toErrorMessage(error) });
    }
  }

  private handleNotification(method: string, params: unknown): void {
    if (this.notificationHandler) {
      this.notificationHandler(method, params);
    } else {
      this.logger.debug('Received notification but no handler registered', { method });
    }
  }

  private generateId(): string {
    return `${this.nextId++}-${nanoid(8)}`;
  }
}

function toSendError(error: unknown, method: string): Error {
  if (error instanceof GatewayError) {
    return error;
  }
  return new TransportError(`Failed to send ${method}: ${toErrorMessage(error)}`, isTransientError(error), {
    cause: error,
  });
}
