import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GatewayClient, GatewayRequestError } from '../client';

const status = {
  providerId: 'docs',
  state: 'ready',
  capabilityCount: 2,
  leaseCount: 0,
  stale: false,
  retired: false,
};

const docs = {
  id: 'docs',
  name: 'docs',
  description: '',
  transport: 'streamable_http',
  enabled: true,
  builtIn: false,
  timeoutMs: 30000,
  url: 'http://docs.test/mcp',
  headers: {},
  status,
};

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('GatewayClient', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const client = new GatewayClient({ host: '127.0.0.1', port: 8765 });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should list providers', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([docs]));

    const providers = await client.listProviders();

    expect(providers[0]?.status.state).toBe('ready');
    expect(fetchMock).toHaveBeenCalledWith(
      'http://127.0.0.1:8765/api/providers',
      expect.objectContaining({ method: 'GET' })
    );
  });

  it('should send provider input as JSON', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(docs, { status: 201 }));

    await client.addProvider({ id: 'docs', url: 'http://docs.test/mcp' });

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(init?.body).toBe('{"id":"docs","url":"http://docs.test/mcp"}');
  });

  it('should encode ids in paths', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(status));

    await client.getStatus('a b');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://127.0.0.1:8765/api/providers/a%20b/status');
  });

  it('should accept an empty 204 response on removal', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await expect(client.removeProvider('docs')).resolves.toBeUndefined();
  });

  it('should surface the error body and code of failed requests', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: 'Built-in provider "mssql" cannot be removed', code: 'IMMUTABLE_PROVIDER' }, { status: 409 })
    );

    const error = await client.removeProvider('mssql').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GatewayRequestError);
    expect(error).toMatchObject({
      message: 'Built-in provider "mssql" cannot be removed',
      status: 409,
      code: 'IMMUTABLE_PROVIDER',
    });
  });

  it('should fall back to the raw text of non-JSON errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Bad gateway', { status: 502 }));

    await expect(client.health()).rejects.toThrow('HTTP 502: Bad gateway');
  });

  it('should reject responses of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ providers: [] }));

    await expect(client.listProviders()).rejects.toThrow(/^Unexpected response from \/api\/providers/);
  });

  it('should report unreachable gateways', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(client.health()).rejects.toThrow('Cannot reach the gateway at http://127.0.0.1:8765: fetch failed');
  });
});
