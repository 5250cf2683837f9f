import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ILogger } from '@server/core/interfaces';
import { TransportError } from '@server/core/errors';
import { HttpTransport } from '../http-transport';
import { createMockLogger, createRemoteProvider, createTool, FakeMcpServer } from '@tests/utils';

interface RecordedRequest {
  method: string;
  headers: Headers;
  body: unknown;
}

describe('HttpTransport', () => {
  let mockLogger: ILogger;
  let server: FakeMcpServer;
  let requests: RecordedRequest[];
  let respondWithStream: boolean;
  let transport: HttpTransport;
  const options = { timeoutMs: 1000 };

  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    const method = init?.method ?? 'GET';
    requests.push({ method, headers: new Headers(init?.headers), body });

    if (method === 'DELETE') {
      return new Response(null, { status: 200 });
    }

    const response = server.handle(body);
    if (!response) {
      return new Response(null, { status: 202 });
    }

    const headers: Record<string, string> = { 'mcp-session-id': 'session-1' };
    if (respondWithStream) {
      headers['content-type'] = 'text/event-stream';
      return new Response(`: keep-alive\n\nevent: message\ndata: ${JSON.stringify(response)}\n\n`, { headers });
    }
    headers['content-type'] = 'application/json';
    return new Response(JSON.stringify(response), { headers });
  });

  beforeEach(() => {
    mockLogger = createMockLogger();
    server = new FakeMcpServer({ tools: [createTool('search_docs')] });
    requests = [];
    respondWithStream = false;
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
    transport = new HttpTransport(
      createRemoteProvider({ id: 'docs', headers: { Authorization: 'Bearer test-secret' } }),
      mockLogger
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should POST JSON-RPC with the MCP accept header and configured headers', async () => {
    await transport.connect(options);

    const [initialize] = requests;
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://provider.test/mcp');
    expect(initialize?.method).toBe('POST');
    expect(initialize?.headers.get('accept')).toBe('application/json, text/event-stream');
    expect(initialize?.headers.get('authorization')).toBe('Bearer test-secret');
    expect(transport.isOpen()).toBe(true);
  });

  it('should capture the session id and echo it on later requests', async () => {
    await transport.connect(options);
    await transport.listCapabilities(options);

    expect(transport.getSessionId()).toBe('session-1');
    expect(requests[0]?.headers.get('mcp-session-id')).toBeNull();
    expect(requests.at(-1)?.headers.get('mcp-session-id')).toBe('session-1');
  });

  it('should read responses delivered as an event stream', async () => {
    respondWithStream = true;
    await transport.connect(options);

    const tools = await transport.listCapabilities(options);
    const result = await transport.invoke('search_docs', { query: 'refunds' }, options);

    expect(tools.map((t) => t.name)).toEqual(['search_docs']);
    expect(result).toEqual({ text: 'search_docs ok', isError: false });
  });

  it('should send DELETE with the session id on close', async () => {
    await transport.connect(options);

    await transport.close();

    const last = requests.at(-1);
    expect(last?.method).toBe('DELETE');
    expect(last?.headers.get('mcp-session-id')).toBe('session-1');
    expect(transport.isOpen()).toBe(false);
  });

  it('should raise a transient TransportError for 503 responses', async () => {
    await transport.connect(options);
    fetchMock.mockResolvedValueOnce(new Response('unavailable', { status: 503, statusText: 'Service Unavailable' }));

    const error = await transport.invoke('search_docs', {}, options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ transient: true, status: 503 });
  });

  it('should raise a permanent TransportError for 4xx responses', async () => {
    fetchMock.mockResolvedValueOnce(new Response('forbidden', { status: 403, statusText: 'Forbidden' }));

    await expect(transport.connect(options)).rejects.toMatchObject({ transient: false, status: 403 });
    expect(transport.isOpen()).toBe(false);
  });

  it('should treat network failures as transient', async () => {
    await transport.connect(options);
    fetchMock.mockRejectedValueOnce(
      new TypeError('fetch failed', { cause: Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }) })
    );

    await expect(transport.invoke('search_docs', {}, options)).rejects.toMatchObject({ transient: true });
  });
});
