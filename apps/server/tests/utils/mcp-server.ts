import type { JsonRpcResponse, ToolDescriptor } from '@server/core/interfaces';

export interface FakeToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface FakeMcpServerOptions {
  tools?: ToolDescriptor[];
  /** Split tools/list into pages of this size, linked by cursors. */
  pageSize?: number;
  /** Throwing produces a JSON-RPC error response. */
  callTool?: (name: string, args: Record<string, unknown>) => FakeToolResult;
}

export interface ReceivedMessage {
  id?: string | number;
  method?: string;
  params?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Answers the MCP requests a transport sends, without any I/O.
 */
export class FakeMcpServer {
  readonly received: ReceivedMessage[] = [];

  constructor(public options: FakeMcpServerOptions = {}) {}

  /** Messages of one method, in arrival order. */
  messages(method: string): ReceivedMessage[] {
    return this.received.filter((message) => message.method === method);
  }

  handle(raw: unknown): JsonRpcResponse | undefined {
    if (!isRecord(raw)) {
      return undefined;
    }

    const message: ReceivedMessage = {};
    if (typeof raw.id === 'string' || typeof raw.id === 'number') message.id = raw.id;
    if (typeof raw.method === 'string') message.method = raw.method;
    if (isRecord(raw.params)) message.params = raw.params;
    this.received.push(message);

    if (message.id === undefined || message.method === undefined) {
      return undefined;
    }

    const { id } = message;
    try {
      return { jsonrpc: '2.0', id, result: this.dispatch(message.method, message.params ?? {}) };
    } catch (error) {
      return {
        jsonrpc: '2.0',
        id,
        error: { code: -32000, message: error instanceof Error ? error.message : 'Unknown error' },
      };
    }
  }

  private dispatch(method: string, params: Record<string, unknown>): unknown {
    switch (method) {
      case 'initialize':
        return {
          protocolVersion: '2024-11-05',
          capabilities: { tools: {} },
          serverInfo: { name: 'fake-provider', version: '1.0.0' },
        };
      case 'ping':
        return {};
      case 'tools/list':
        return this.listTools(typeof params.cursor === 'string' ? params.cursor : undefined);
      case 'tools/call': {
        const name = typeof params.name === 'string' ? params.name : '';
        const args = isRecord(params.arguments) ? params.arguments : {};
        if (this.options.callTool) {
          return this.options.callTool(name, args);
        }
        return { content: [{ type: 'text', text: `${name} ok` }] };
      }
      default:
        throw new Error(`Method not found: ${method}`);
    }
  }

  private listTools(cursor: string | undefined): unknown {
    const tools = this.options.tools ?? [];
    const pageSize = this.options.pageSize ?? tools.length;
    const start = cursor ? Number.parseInt(cursor, 10) : 0;
    const end = start + Math.max(pageSize, 1);
    return {
      tools: tools.slice(start, end),
      ...(end < tools.length ? { nextCursor: String(end) } : {}),
    };
  }
}
