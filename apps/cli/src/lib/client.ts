/**
 * HTTP client for the gateway's administrative API.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  ConnectionStatusSchema,
  ErrorBodySchema,
  HealthSchema,
  ProviderSchema,
  ToolSchema,
  type ConnectionStatus,
  type Health,
  type Provider,
  type Tool,
} from './schemas.js';

interface ClientOptions {
  host: string;
  port: number;
  timeoutMs?: number;
}

export interface ProviderInput {
  id: string;
  name?: string;
  description?: string;
  transport?: 'stdio' | 'streamable_http' | 'sse';
  enabled?: boolean;
  timeoutMs?: number;
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  url?: string;
  headers?: Record<string, string>;
}

/**
 * A non-2xx answer from the gateway, carrying its error code when it sent one.
 */
export class GatewayRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'GatewayRequestError';
  }
}

export class GatewayClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ClientOptions) {
    this.baseUrl = `http://${options.host}:${options.port}`;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  private async request<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown> | null,
    options: { method?: string; body?: unknown } = {}
  ): Promise<T | undefined> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: options.method ?? 'GET',
        headers: options.body === undefined ? {} : { 'Content-Type': 'application/json' },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Request to ${this.baseUrl} timed out after ${this.timeoutMs}ms`);
      }
      throw new Error(`Cannot reach the gateway at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const text = await response.text();
      throw toRequestError(response.status, text);
    }

    if (schema === null || response.status === 204) {
      return undefined;
    }

    const result = schema.safeParse(await response.json());
    if (!result.success) {
      throw new Error(`Unexpected response from ${path}: ${result.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return result.data;
  }

  private async expect<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options?: { method?: string; body?: unknown }
  ): Promise<T> {
    const value = await this.request(path, schema, options);
    if (value === undefined) {
      throw new Error(`Empty response from ${path}`);
    }
    return value;
  }

  async health(): Promise<Health> {
    return this.expect('/health', HealthSchema);
  }

  async listProviders(): Promise<Provider[]> {
    return this.expect('/api/providers', z.array(ProviderSchema));
  }

  async getProvider(id: string): Promise<Provider> {
    return this.expect(`/api/providers/${encodeURIComponent(id)}`, ProviderSchema);
  }

  async addProvider(input: ProviderInput): Promise<Provider> {
    return this.expect('/api/providers', ProviderSchema, { method: 'POST', body: input });
  }

  async updateProvider(id: string, patch: Omit<ProviderInput, 'id'>): Promise<Provider> {
    return this.expect(`/api/providers/${encodeURIComponent(id)}`, ProviderSchema, { method: 'PATCH', body: patch });
  }

  async removeProvider(id: string): Promise<void> {
    await this.request(`/api/providers/${encodeURIComponent(id)}`, null, { method: 'DELETE' });
  }

  async setEnabled(id: string, enabled: boolean): Promise<Provider> {
    const action = enabled ? 'enable' : 'disable';
    return this.expect(`/api/providers/${encodeURIComponent(id)}/${action}`, ProviderSchema, { method: 'POST' });
  }

  async getStatus(id: string): Promise<ConnectionStatus> {
    return this.expect(`/api/providers/${encodeURIComponent(id)}/status`, ConnectionStatusSchema);
  }

  async listTools(id: string): Promise<Tool[]> {
    return this.expect(`/api/providers/${encodeURIComponent(id)}/tools`, z.array(ToolSchema));
  }

  async reload(): Promise<Provider[]> {
    return this.expect('/api/providers/reload', z.array(ProviderSchema), { method: 'POST' });
  }
}

function toRequestError(status: number, text: string): GatewayRequestError {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return new GatewayRequestError(`HTTP ${status}: ${text || 'no body'}`, status);
  }

  const body = ErrorBodySchema.safeParse(data);
  if (!body.success) {
    return new GatewayRequestError(`HTTP ${status}: ${text}`, status);
  }
  return new GatewayRequestError(body.data.error, status, body.data.code);
}
