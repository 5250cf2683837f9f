import {
  CallToolResultSchema,
  InitializeResultSchema,
  ListToolsResultSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { TransportError } from '@server/core/errors';
import type {
  ILogger,
  IProviderTransport,
  JsonRpcMessage,
  ToolCallResult,
  ToolDescriptor,
  TransportCallOptions,
  TransportConcurrency,
  TransportKind,
} from '@server/core/interfaces';
import { JsonRpcHandler, JsonRpcRemoteError } from './json-rpc-handler';

export const MCP_PROTOCOL_VERSION = '2024-11-05';

export const CLIENT_INFO = { name: 'analyst-gateway', version: '0.1.0' };

const MAX_TOOL_PAGES = 50;

type CallToolContent = ReturnType<typeof CallToolResultSchema.parse>['content'];

/**
 * MCP client session over some message channel. Subclasses own the channel
 * (a child process, HTTP requests, an event stream); this class owns the
 * handshake, tool listing, tool calls and close semantics.
 */
export abstract class McpTransport implements IProviderTransport {
  abstract readonly kind: TransportKind;
  abstract readonly concurrency: TransportConcurrency;

  protected readonly rpc: JsonRpcHandler;
  protected readonly logger: ILogger;
  private open = false;
  private closed = false;
  private closeHandler?: (error: Error) => void;

  constructor(
    readonly providerId: string,
    logger: ILogger
  ) {
    this.logger = logger.child({ providerId });
    this.rpc = new JsonRpcHandler(this.logger, (message, signal) => this.write(message, signal));
    this.rpc.onRequest(async (method) => {
      if (method === 'ping') {
        return {};
      }
      throw new JsonRpcRemoteError(-32601, `Method not found: ${method}`);
    });
    this.rpc.onNotification((method) => {
      this.logger.debug('Provider notification', { method });
    });
  }

  /** Open the underlying channel. */
  protected abstract openChannel(options: TransportCallOptions): Promise<void>;

  /** Release the underlying channel; must tolerate being called more than once. */
  protected abstract closeChannel(): Promise<void>;

  /** Deliver one outgoing message; responses come back through `receive`. */
  protected abstract write(message: JsonRpcMessage, signal: AbortSignal): Promise<void>;

  async connect(options: TransportCallOptions): Promise<void> {
    if (this.open) {
      return;
    }
    if (this.closed) {
      throw new TransportError('Transport already closed', false);
    }

    await this.openChannel(options);

    try {
      const raw = await this.rpc.sendRequest(
        'initialize',
        {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: CLIENT_INFO,
        },
        options
      );
      const result = InitializeResultSchema.safeParse(raw);
      if (!result.success) {
        throw new TransportError(`Invalid initialize response from "${this.providerId}"`, false);
      }

      await this.rpc.sendNotification('notifications/initialized');
      this.open = true;

      this.logger.info('Provider session initialized', {
        serverName: result.data.serverInfo.name,
        serverVersion: result.data.serverInfo.version,
        protocolVersion: result.data.protocolVersion,
      });
    } catch (error) {
      this.rpc.close();
      await this.closeChannel();
      throw error;
    }
  }

  async listCapabilities(options: TransportCallOptions): Promise<ToolDescriptor[]> {
    this.ensureOpen();
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_TOOL_PAGES; page++) {
      const raw = await this.rpc.sendRequest('tools/list', cursor ? { cursor } : {}, options);
      const parsed = ListToolsResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new TransportError(`Invalid tools/list response from "${this.providerId}"`, false);
      }

      for (const tool of parsed.data.tools) {
        tools.push({
          name: tool.name,
          ...(tool.description !== undefined ? { description: tool.description } : {}),
          inputSchema: { ...tool.inputSchema },
        });
      }

      cursor = parsed.data.nextCursor;
      if (!cursor) {
        break;
      }
    }

    return tools;
  }

  async invoke(
    toolName: string,
    args: Record<string, unknown>,
    options: TransportCallOptions
  ): Promise<ToolCallResult> {
    this.ensureOpen();

    let raw: unknown;
    try {
      raw = await this.rpc.sendRequest('tools/call', { name: toolName, arguments: args }, options);
    } catch (error) {
      if (error instanceof JsonRpcRemoteError) {
        return { text: error.message, isError: true };
      }
      throw error;
    }

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError(`Invalid tools/call response from "${this.providerId}"`, false);
    }

    return { text: renderContent(parsed.data.content), isError: parsed.data.isError === true };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.open = false;
    this.rpc.close(new TransportError('Connection closed', false));
    await this.closeChannel();
  }

  isOpen(): boolean {
    return this.open;
  }

  onClose(handler: (error: Error) => void): void {
    this.closeHandler = handler;
  }

  /**
   * Feed raw text received from the channel (one JSON value, possibly a batch).
   */
  protected receive(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Failed to parse JSON-RPC message', {
        length: raw.length,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return;
    }

    for (const message of Array.isArray(parsed) ? parsed : [parsed]) {
      this.rpc.handleMessage(message);
    }
  }

  /**
   * The channel went away without close() being called.
   */
  protected handleChannelClosed(error: Error): void {
    if (this.closed) {
      return;
    }
    const wasOpen = this.open;
    this.closed = true;
    this.open = false;
    this.rpc.close(error);

    if (wasOpen) {
      this.logger.warn('Provider channel closed unexpectedly', { error: error.message });
      this.closeHandler?.(error);
    }
  }

  private ensureOpen(): void {
    if (!this.open) {
      throw new TransportError(`Connection to "${this.providerId}" is not open`, true);
    }
  }
}

/**
 * Render tool result content as text for the LLM and the client.
 */
export function renderContent(content: CallToolContent): string {
  return content
    .map((item) => {
      if (item.type === 'text') {
        return item.text;
      }
      if (item.type === 'resource' && 'text' in item.resource && typeof item.resource.text === 'string') {
        return item.resource.text;
      }
      if (item.type === 'image') {
        return `[image: ${item.mimeType}]`;
      }
      return JSON.stringify(item);
    })
    .join('\n');
}
