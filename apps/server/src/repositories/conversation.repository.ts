import { injectable, inject } from 'inversify';
import { z } from 'zod';
import { TYPES } from '@server/core/types';
import type { ChatMessage, IConversationRepository, IDatabase, ToolCallRequest } from '@server/core/interfaces';

const ToolCallsSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string(),
    arguments: z.string(),
  })
);

const MessageRowSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
  tool_calls: z.string().nullable(),
  tool_call_id: z.string().nullable(),
  tool_name: z.string().nullable(),
  is_error: z.number(),
});

type MessageRow = z.infer<typeof MessageRowSchema>;

/**
 * Conversation history in SQLite, append-only.
 */
@injectable()
export class ConversationRepository implements IConversationRepository {
  constructor(@inject(TYPES.Database) private database: IDatabase) {}

  async appendMessage(conversationId: string, message: ChatMessage): Promise<void> {
    const now = Date.now();

    this.database.transaction(() => {
      this.database.db
        .prepare(`
          INSERT INTO conversations (id, created_at, updated_at)
          VALUES (?, ?, ?)
          ON CONFLICT(id) DO UPDATE SET updated_at = excluded.updated_at
        `)
        .run(conversationId, now, now);

      this.database.db
        .prepare(`
          INSERT INTO messages (
            conversation_id, role, content, tool_calls, tool_call_id, tool_name, is_error, created_at
          )
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          conversationId,
          message.role,
          message.content,
          message.role === 'assistant' && message.toolCalls ? JSON.stringify(message.toolCalls) : null,
          message.role === 'tool' ? message.toolCallId : null,
          message.role === 'tool' ? message.name : null,
          message.role === 'tool' && message.isError ? 1 : 0,
          now
        );
    });
  }

  async loadHistory(conversationId: string): Promise<ChatMessage[]> {
    const rows = this.database.db
      .prepare(`
        SELECT role, content, tool_calls, tool_call_id, tool_name, is_error
        FROM messages
        WHERE conversation_id = ?
        ORDER BY id ASC
      `)
      .all(conversationId);

    return rows.map((row) => this.mapRowToMessage(MessageRowSchema.parse(row)));
  }

  /**
   * Map database row to ChatMessage.
   */
  private mapRowToMessage(row: MessageRow): ChatMessage {
    switch (row.role) {
      case 'system':
      case 'user':
        return { role: row.role, content: row.content };
      case 'assistant': {
        const toolCalls = row.tool_calls ? parseToolCalls(row.tool_calls) : undefined;
        return toolCalls && toolCalls.length > 0
          ? { role: 'assistant', content: row.content, toolCalls }
          : { role: 'assistant', content: row.content };
      }
      case 'tool':
        return {
          role: 'tool',
          content: row.content,
          toolCallId: row.tool_call_id ?? '',
          name: row.tool_name ?? '',
          isError: row.is_error === 1,
        };
    }
  }
}

function parseToolCalls(json: string): ToolCallRequest[] {
  const parsed: unknown = JSON.parse(json);
  return ToolCallsSchema.parse(parsed);
}
