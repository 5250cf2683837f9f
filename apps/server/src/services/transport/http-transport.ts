import { createParser } from 'eventsource-parser';
import { TransportError, isTransientHttpStatus, toErrorMessage } from '@server/core/errors';
import type { ILogger, JsonRpcMessage, RemoteProviderConfig, TransportCallOptions } from '@server/core/interfaces';
import { McpTransport } from './mcp-transport';

const SESSION_HEADER = 'mcp-session-id';

/**
 * MCP streamable HTTP: every message is a POST; the reply is either a JSON
 * body or an event stream carrying the response.
 */
export class HttpTransport extends McpTransport {
  override readonly kind = 'streamable_http';
  override readonly concurrency = 'concurrent';

  private sessionId: string | null = null;

  constructor(
    private config: RemoteProviderConfig,
    logger: ILogger
  ) {
    super(config.id, logger);
  }

  getSessionId(): string | null {
    return this.sessionId;
  }

  protected override async openChannel(_options: TransportCallOptions): Promise<void> {
    this.logger.info('Connecting to HTTP provider', { url: this.config.url });
  }

  protected override async write(message: JsonRpcMessage, signal: AbortSignal): Promise<void> {
    const response = await fetch(this.config.url, {
      method: 'POST',
      headers: this.buildHeaders({
        'Content-Type': 'application/json',
        Accept: 'application/json, text/event-stream',
      }),
      body: JSON.stringify(message),
      signal,
    });

    const sessionId = response.headers.get(SESSION_HEADER);
    if (sessionId) {
      this.sessionId = sessionId;
    }

    if (response.status === 202 || response.status === 204) {
      return;
    }

    if (!response.ok) {
      throw new TransportError(
        `HTTP ${response.status} ${response.statusText} from "${this.providerId}"`,
        isTransientHttpStatus(response.status),
        { status: response.status }
      );
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('text/event-stream')) {
      await this.readEventStream(response, 'id' in message ? message.id : null);
    } else {
      this.receive(await response.text());
    }
  }

  protected override async closeChannel(): Promise<void> {
    if (!this.sessionId) {
      return;
    }

    const sessionId = this.sessionId;
    this.sessionId = null;
    try {
      await fetch(this.config.url, {
        method: 'DELETE',
        headers: this.buildHeaders({ [SESSION_HEADER]: sessionId }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      this.logger.debug('Failed to end provider session', { error: toErrorMessage(error) });
    }
  }

  /**
   * Read server-sent events until the awaited response has arrived or the stream ends.
   */
  private async readEventStream(response: Response, requestId: string | number | null): Promise<void> {
    if (!response.body) {
      return;
    }

    const parser = createParser({
      onEvent: (event) => {
        if (!event.event || event.event === 'message') {
          this.receive(event.data);
        }
      },
    });

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      parser.feed(decoder.decode(value, { stream: true }));
      if (requestId !== null && !this.rpc.isPending(requestId)) {
        break;
      }
    }

    try {
      await reader.cancel();
    } catch (error) {
      this.logger.debug('Failed to cancel provider event stream', { error: toErrorMessage(error) });
    }
  }

  private buildHeaders(base: Record<string, string>): Record<string, string> {
    return {
      ...base,
      ...this.config.headers,
      ...(this.sessionId ? { [SESSION_HEADER]: this.sessionId } : {}),
    };
  }
}
