import { z } from 'zod';

/**
 * Wire format of the conversation stream. Every message is one JSON envelope
 * `{conversationId, seq, type, payload}`; `seq` is assigned by the sender and
 * strictly increases per conversation.
 */

/** Ids starting with this prefix name the gateway's own lease holders. */
const RESERVED_HOLDER_PREFIX = '__';

const ConversationIdSchema = z
  .string()
  .min(1)
  .max(128)
  .refine((id) => !id.startsWith(RESERVED_HOLDER_PREFIX), {
    message: `Conversation ids may not start with "${RESERVED_HOLDER_PREFIX}"`,
  });

const EnvelopeBase = {
  conversationId: ConversationIdSchema,
  seq: z.number().int().nonnegative().optional(),
};

export const UserTurnEnvelopeSchema = z.object({
  ...EnvelopeBase,
  type: z.literal('user_turn'),
  payload: z.object({
    content: z.string().trim().min(1, 'content must not be empty'),
    selectedProviderIds: z.array(z.string().min(1)).default([]),
  }),
});

export const CancelEnvelopeSchema = z.object({
  ...EnvelopeBase,
  type: z.literal('cancel'),
  payload: z.object({}).passthrough().default({}),
});

export const ClientEnvelopeSchema = z.discriminatedUnion('type', [UserTurnEnvelopeSchema, CancelEnvelopeSchema]);

export type ClientEnvelope = z.infer<typeof ClientEnvelopeSchema>;
export type UserTurnEnvelope = z.infer<typeof UserTurnEnvelopeSchema>;

export type ServerMessage =
  | { type: 'token'; payload: { content: string } }
  | { type: 'tool_call_started'; payload: { callId: string; name: string; args: Record<string, unknown> } }
  | { type: 'tool_call_result'; payload: { callId: string; name: string; result: string; isError: boolean } }
  | { type: 'turn_complete'; payload: Record<string, never> }
  | { type: 'turn_cancelled'; payload: Record<string, never> }
  | { type: 'error'; payload: { message: string; retryable: boolean; code?: string } }
  | { type: 'heartbeat'; payload: Record<string, never> };

export type ServerMessageType = ServerMessage['type'];

export type ServerEnvelope = ServerMessage & { conversationId: string; seq: number };

export type ParsedEnvelope = { ok: true; envelope: ClientEnvelope } | { ok: false; message: string };

export function parseClientEnvelope(raw: string): ParsedEnvelope {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, message: 'Message is not valid JSON' };
  }

  const result = ClientEnvelopeSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, message: `Invalid message: ${where}${issue?.message ?? 'unknown shape'}` };
  }
  return { ok: true, envelope: result.data };
}

const AddressedSchema = z.object({ conversationId: ConversationIdSchema });

/**
 * The conversation a raw message is addressed to, if it names a valid one.
 */
export function peekConversationId(raw: string): string | undefined {
  try {
    const result = AddressedSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data.conversationId : undefined;
  } catch {
    return undefined;
  }
}

export function isValidConversationId(value: string): boolean {
  return ConversationIdSchema.safeParse(value).success;
}
