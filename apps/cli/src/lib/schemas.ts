import { z } from 'zod';

/**
 * Response shapes of the gateway's administrative API, checked on arrival.
 * Unknown fields pass through so newer servers stay readable.
 */

export const ConnectionStatusSchema = z
  .object({
    providerId: z.string(),
    connectionId: z.string().optional(),
    state: z.string(),
    lastError: z.string().optional(),
    capabilityCount: z.number(),
    lastActivityAt: z.number().optional(),
    leaseCount: z.number(),
    stale: z.boolean(),
    retired: z.boolean(),
  })
  .passthrough();

export const ProviderSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    transport: z.enum(['stdio', 'streamable_http', 'sse']),
    enabled: z.boolean(),
    builtIn: z.boolean(),
    timeoutMs: z.number(),
    command: z.string().optional(),
    args: z.array(z.string()).optional(),
    cwd: z.string().optional(),
    url: z.string().optional(),
    status: ConnectionStatusSchema,
  })
  .passthrough();

export const ToolSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()),
  })
  .passthrough();

export const HealthSchema = z.object({ status: z.string(), timestamp: z.number() }).passthrough();

export const ErrorBodySchema = z.object({ error: z.string(), code: z.string().optional() }).passthrough();

export type ConnectionStatus = z.infer<typeof ConnectionStatusSchema>;
export type Provider = z.infer<typeof ProviderSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type Health = z.infer<typeof HealthSchema>;

/**
 * Envelopes the server sends on the conversation stream.
 */
export const ServerEnvelopeSchema = z.discriminatedUnion('type', [
  z.object({
    conversationId: z.string(),
    seq: z.number(),
    type: z.literal('token'),
    payload: z.object({ content: z.string() }),
  }),
  z.object({
    conversationId: z.string(),
    seq: z.number(),
    type: z.literal('tool_call_started'),
    payload: z.object({ callId: z.string(), name: z.string(), args: z.record(z.unknown()) }),
  }),
  z.object({
    conversationId: z.string(),
    seq: z.number(),
    type: z.literal('tool_call_result'),
    payload: z.object({ callId: z.string(), name: z.string(), result: z.string(), isError: z.boolean() }),
  }),
  z.object({ conversationId: z.string(), seq: z.number(), type: z.literal('turn_complete'), payload: z.object({}) }),
  z.object({ conversationId: z.string(), seq: z.number(), type: z.literal('turn_cancelled'), payload: z.object({}) }),
  z.object({
    conversationId: z.string(),
    seq: z.number(),
    type: z.literal('error'),
    payload: z.object({ message: z.string(), retryable: z.boolean(), code: z.string().optional() }),
  }),
  z.object({ conversationId: z.string(), seq: z.number(), type: z.literal('heartbeat'), payload: z.object({}) }),
]);

export type ServerEnvelope = z.infer<typeof ServerEnvelopeSchema>;
