import { EventSource } from 'eventsource';
import { TransportError, isTransientHttpStatus } from '@server/core/errors';
import type { ILogger, JsonRpcMessage, RemoteProviderConfig, TransportCallOptions } from '@server/core/interfaces';
import { McpTransport } from './mcp-transport';

export interface EventStreamHandlers {
  onEndpoint(data: string): void;
  onMessage(data: string): void;
  onError(message: string): void;
}

export interface EventStream {
  close(): void;
}

/**
 * Opens the provider's event stream and routes its events to the handlers.
 */
export type EventStreamFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: EventStreamHandlers
) => EventStream;

export const openEventSource: EventStreamFactory = (url, headers, handlers) => {
  const source = new EventSource(url, {
    fetch: (input, init) => fetch(input, { ...init, headers: { ...init?.headers, ...headers } }),
  });
  source.addEventListener('endpoint', (event) => handlers.onEndpoint(String(event.data)));
  source.addEventListener('message', (event) => handlers.onMessage(String(event.data)));
  source.addEventListener('error', (event) => handlers.onError(event.message ?? 'SSE connection error'));
  return { close: () => source.close() };
};

/**
 * MCP over server-sent events: requests are POSTed to the endpoint announced
 * by the stream, responses arrive as `message` events.
 */
export class SseTransport extends McpTransport {
  override readonly kind = 'sse';
  override readonly concurrency = 'concurrent';

  private stream: EventStream | null = null;
  private endpoint: string | null = null;

  constructor(
    private config: RemoteProviderConfig,
    logger: ILogger,
    private openStream: EventStreamFactory = openEventSource
  ) {
    super(config.id, logger);
  }

  getEndpoint(): string | null {
    return this.endpoint;
  }

  protected override async openChannel(options: TransportCallOptions): Promise<void> {
    this.logger.info('Connecting to SSE provider', { url: this.config.url });

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error) {
          this.stream?.close();
          this.stream = null;
          reject(error);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        settle(new TransportError(`Timed out after ${options.timeoutMs}ms waiting for the SSE endpoint`, true));
      }, options.timeoutMs);

      this.stream = this.openStream(this.config.url, this.config.headers, {
        onEndpoint: (data) => {
          try {
            this.endpoint = new URL(data, this.config.url).toString();
          } catch {
            settle(new TransportError(`Invalid SSE endpoint "${data}"`, false));
            return;
          }
          this.logger.debug('SSE endpoint received', { endpoint: this.endpoint });
          settle();
        },
        onMessage: (data) => this.receive(data),
        onError: (message) => {
          if (!settled) {
            settle(new TransportError(`SSE connection failed: ${message}`, true));
            return;
          }
          this.stream?.close();
          this.stream = null;
          this.handleChannelClosed(new TransportError(`SSE stream error: ${message}`, true));
        },
      });
    });
  }

  protected override async write(message: JsonRpcMessage, signal: AbortSignal): Promise<void> {
    if (!this.endpoint || !this.stream) {
      throw new TransportError('SSE endpoint not available', true);
    }

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { ...this.config.headers, 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
      signal,
    });

    if (!response.ok) {
      throw new TransportError(
        `HTTP ${response.status} ${response.statusText} from "${this.providerId}"`,
        isTransientHttpStatus(response.status),
        { status: response.status }
      );
    }
  }

  protected override async closeChannel(): Promise<void> {
    this.stream?.close();
    this.stream = null;
    this.endpoint = null;
  }
}
