import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Container } from 'inversify';
import { TYPES } from '@server/core/types';
import type { ChatMessage, IConversationRepository, IDatabase } from '@server/core/interfaces';
import { ConversationRepository } from '../conversation.repository';
import { createTestContainer } from '@tests/utils';

describe('ConversationRepository', () => {
  let container: Container;
  let repository: IConversationRepository;

  beforeEach(() => {
    container = createTestContainer();
    container.bind<IConversationRepository>(TYPES.ConversationRepository).to(ConversationRepository);
    repository = container.get<IConversationRepository>(TYPES.ConversationRepository);
  });

  afterEach(() => {
    container.get<IDatabase>(TYPES.Database).close();
  });

  it('should return an empty history for an unknown conversation', async () => {
    await expect(repository.loadHistory('conv-missing')).resolves.toEqual([]);
  });

  it('should keep messages in the order they were appended', async () => {
    const messages: ChatMessage[] = [
      { role: 'user', content: 'Top customers by revenue?' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'call-1', name: 'query', arguments: '{"sql":"SELECT 1"}' }],
      },
      { role: 'tool', content: 'Acme 120k', toolCallId: 'call-1', name: 'query', isError: false },
      { role: 'tool', content: 'timeout', toolCallId: 'call-2', name: 'query', isError: true },
      { role: 'assistant', content: 'Acme leads with 120k.' },
    ];

    for (const message of messages) {
      await repository.appendMessage('conv-1', message);
    }

    await expect(repository.loadHistory('conv-1')).resolves.toEqual(messages);
  });

  it('should keep conversations apart', async () => {
    await repository.appendMessage('conv-1', { role: 'user', content: 'first' });
    await repository.appendMessage('conv-2', { role: 'user', content: 'second' });

    await expect(repository.loadHistory('conv-2')).resolves.toEqual([{ role: 'user', content: 'second' }]);
  });

  it('should record the conversation once and touch it on each append', async () => {
    await repository.appendMessage('conv-1', { role: 'user', content: 'a' });
    await repository.appendMessage('conv-1', { role: 'assistant', content: 'b' });

    const db = container.get<IDatabase>(TYPES.Database).db;
    const count = db.prepare('SELECT COUNT(*) FROM conversations').pluck().get();
    expect(count).toBe(1);
  });
});
