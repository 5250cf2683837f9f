import { injectable, inject } from 'inversify';
import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { nanoid } from 'nanoid';
import { TYPES } from '@server/core/types';
import type {
  ChatMessage,
  IConfig,
  ILlmRuntime,
  ILogger,
  LlmStreamEvent,
  LlmToolSchema,
  LlmTurnRequest,
  ToolCallRequest,
} from '@server/core/interfaces';

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

/**
 * LLM runtime over any OpenAI-compatible chat completions endpoint
 * (Ollama by default). Streams tokens as they arrive and reports the tool
 * calls of a response once the stream ends.
 */
@injectable()
export class OpenAiLlmRuntime implements ILlmRuntime {
  private readonly client: OpenAI;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'llm-runtime' });
    this.client = new OpenAI({
      baseURL: this.config.get<string>('llm.baseUrl', 'http://localhost:11434/v1'),
      apiKey: this.config.get<string>('llm.apiKey', 'ollama'),
      // Retries belong to the resilient invoker, which knows whether output was streamed.
      maxRetries: 0,
    });
  }

  async *stream(request: LlmTurnRequest): AsyncIterable<LlmStreamEvent> {
    const model = this.config.get<string>('llm.model', 'qwen2.5:7b-instruct');
    const parallel = this.config.get<boolean>('llm.parallelToolCalls', false);
    const hasTools = request.tools.length > 0;

    this.logger.debug('Starting completion', {
      model,
      messages: request.messages.length,
      tools: request.tools.length,
    });

    const stream = await this.client.chat.completions.create(
      {
        model,
        temperature: this.config.get<number>('llm.temperature', 0.1),
        stream: true,
        messages: request.messages.map(toOpenAiMessage),
        ...(hasTools ? { tools: request.tools.map(toOpenAiTool), parallel_tool_calls: parallel } : {}),
      },
      { signal: request.signal }
    );

    const pending = new Map<number, PartialToolCall>();

    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta;
      if (!delta) {
        continue;
      }

      if (delta.content) {
        yield { type: 'token', content: delta.content };
      }

      for (const toolCall of delta.tool_calls ?? []) {
        const entry = pending.get(toolCall.index) ?? { id: '', name: '', arguments: '' };
        if (toolCall.id) {
          entry.id = toolCall.id;
        }
        if (toolCall.function?.name && !entry.name) {
          entry.name = toolCall.function.name;
        }
        if (toolCall.function?.arguments) {
          entry.arguments += toolCall.function.arguments;
        }
        pending.set(toolCall.index, entry);
      }
    }

    if (pending.size > 0) {
      const calls: ToolCallRequest[] = [...pending.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, call]) => ({
          id: call.id || `call_${nanoid(12)}`,
          name: call.name,
          arguments: call.arguments,
        }));
      yield { type: 'tool_calls', calls, independent: parallel && calls.length > 1 };
    }
  }
}

export function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
  }
}

function toOpenAiTool(tool: LlmToolSchema): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}
