import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { LlmStreamEvent, LlmTurnRequest } from '@server/core/interfaces';
import { OpenAiLlmRuntime, toOpenAiMessage } from '../openai-llm-runtime';
import { createMockConfig, createMockLogger } from '@tests/utils';

const { createMock, constructorMock } = vi.hoisted(() => ({
  createMock: vi.fn(),
  constructorMock: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: createMock } };

    constructor(options: unknown) {
      constructorMock(options);
    }
  },
}));

async function* chunks(...deltas: Array<Record<string, unknown>>): AsyncIterable<unknown> {
  for (const delta of deltas) {
    yield { choices: [{ index: 0, delta }] };
  }
}

async function collect(stream: AsyncIterable<LlmStreamEvent>): Promise<LlmStreamEvent[]> {
  const events: LlmStreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe('OpenAiLlmRuntime', () => {
  const controller = new AbortController();
  const request: LlmTurnRequest = {
    messages: [{ role: 'user', content: 'Top customers?' }],
    tools: [{ name: 'query', description: 'Run SQL', parameters: { type: 'object', properties: {} } }],
    signal: controller.signal,
  };

  const createRuntime = (config: Record<string, unknown> = {}): OpenAiLlmRuntime =>
    new OpenAiLlmRuntime(createMockConfig(config), createMockLogger());

  beforeEach(() => {
    createMock.mockReset();
    constructorMock.mockReset();
  });

  it('should point the client at the configured endpoint without its own retries', () => {
    createRuntime();

    expect(constructorMock).toHaveBeenCalledWith({
      baseURL: 'http://localhost:11434/v1',
      apiKey: 'test-secret',
      maxRetries: 0,
    });
  });

  it('should stream content deltas as tokens', async () => {
    createMock.mockResolvedValue(chunks({ content: 'Acme' }, { content: ' leads.' }, {}));

    const events = await collect(createRuntime().stream(request));

    expect(events).toEqual([
      { type: 'token', content: 'Acme' },
      { type: 'token', content: ' leads.' },
    ]);
    expect(createMock).toHaveBeenCalledWith(
      {
        model: 'test-model',
        temperature: 0,
        stream: true,
        messages: [{ role: 'user', content: 'Top customers?' }],
        tools: [
          {
            type: 'function',
            function: { name: 'query', description: 'Run SQL', parameters: { type: 'object', properties: {} } },
          },
        ],
        parallel_tool_calls: false,
      },
      { signal: controller.signal }
    );
  });

  it('should assemble tool calls split across chunks', async () => {
    createMock.mockResolvedValue(
      chunks(
        { tool_calls: [{ index: 0, id: 'call_a', function: { name: 'query', arguments: '{"sql":' } }] },
        { tool_calls: [{ index: 0, function: { arguments: '"SELECT 1"}' } }] },
        { tool_calls: [{ index: 1, id: 'call_b', function: { name: 'list_tables', arguments: '{}' } }] }
      )
    );

    const events = await collect(createRuntime().stream(request));

    expect(events).toEqual([
      {
        type: 'tool_calls',
        calls: [
          { id: 'call_a', name: 'query', arguments: '{"sql":"SELECT 1"}' },
          { id: 'call_b', name: 'list_tables', arguments: '{}' },
        ],
        independent: false,
      },
    ]);
  });

  it('should mark a batch independent only when parallel tool calls are enabled', async () => {
    createMock.mockResolvedValue(
      chunks({
        tool_calls: [
          { index: 0, id: 'call_a', function: { name: 'query', arguments: '{}' } },
          { index: 1, id: 'call_b', function: { name: 'query', arguments: '{}' } },
        ],
      })
    );

    const events = await collect(createRuntime({ 'llm.parallelToolCalls': true }).stream(request));

    expect(events[0]).toMatchObject({ type: 'tool_calls', independent: true });
  });

  it('should leave tool options out when no tools are offered', async () => {
    createMock.mockResolvedValue(chunks({ content: 'ok' }));

    await collect(createRuntime().stream({ ...request, tools: [] }));

    const [params] = createMock.mock.calls[0] ?? [];
    expect(params).not.toHaveProperty('tools');
    expect(params).not.toHaveProperty('parallel_tool_calls');
  });

  it('should give an id to tool calls that arrive without one', async () => {
    createMock.mockResolvedValue(chunks({ tool_calls: [{ index: 0, function: { name: 'query', arguments: '{}' } }] }));

    const [event] = await collect(createRuntime().stream(request));

    expect(event?.type === 'tool_calls' && event.calls[0]?.id).toMatch(/^call_/);
  });
});

describe('toOpenAiMessage', () => {
  it('should map assistant tool calls and tool results', () => {
    expect(
      toOpenAiMessage({
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'call_a', name: 'query', arguments: '{}' }],
      })
    ).toEqual({
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'call_a', type: 'function', function: { name: 'query', arguments: '{}' } }],
    });

    expect(
      toOpenAiMessage({ role: 'tool', content: '3 rows', toolCallId: 'call_a', name: 'query', isError: false })
    ).toEqual({ role: 'tool', content: '3 rows', tool_call_id: 'call_a' });
  });
});
