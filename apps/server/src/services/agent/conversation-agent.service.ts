import { injectable, inject } from 'inversify';
import { z } from 'zod';
import { TYPES } from '@server/core/types';
import { CancelledError, toErrorMessage } from '@server/core/errors';
import type {
  AgentTurnInput,
  AgentTurnResult,
  ChatMessage,
  ICapabilityAggregator,
  IConfig,
  IConversationAgent,
  ILlmRuntime,
  ILogger,
  ToolCallRequest,
  ToolCallResult,
  ToolNamespace,
  TurnHandle,
  TurnEventSink,
} from '@server/core/interfaces';
import { toLlmToolSchemas } from '@server/services/aggregator/capability-aggregator.service';

const ToolArgumentsSchema = z.record(z.unknown());

type ParsedArguments = { ok: true; args: Record<string, unknown> } | { ok: false; message: string };

export function parseToolArguments(raw: string): ParsedArguments {
  if (raw.trim() === '') {
    return { ok: true, args: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, message: `arguments are not valid JSON (${toErrorMessage(error)})` };
  }

  const result = ToolArgumentsSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, message: 'arguments must be a JSON object' };
  }
  return { ok: true, args: result.data };
}

/**
 * Drives one turn: streams the LLM, relays tokens, runs the tool calls it
 * asks for through the conversation's namespace and feeds the results back,
 * until the LLM answers without tool calls.
 *
 * Tool failures become tool results the LLM can read; only cancellation and
 * LLM failures end the turn early.
 */
@injectable()
export class ConversationAgent implements IConversationAgent {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.LlmRuntime) private llm: ILlmRuntime,
    @inject(TYPES.CapabilityAggregator) private aggregator: ICapabilityAggregator,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'conversation-agent' });
  }

  async runTurn(input: AgentTurnInput): Promise<AgentTurnResult> {
    const { conversationId, namespace, turn, sink } = input;
    const maxToolRounds = this.config.get<number>('llm.maxToolRounds', 8);
    const systemPrompt = this.config.get<string>('llm.systemPrompt', '');
    const tools = toLlmToolSchemas(namespace);

    const messages: ChatMessage[] = [
      ...(systemPrompt ? [{ role: 'system' as const, content: systemPrompt }] : []),
      ...input.history,
      { role: 'user', content: input.userContent },
    ];
    const produced: ChatMessage[] = [];

    for (let round = 1; ; round++) {
      turn.throwIfCancelled();
      const finalRound = round > maxToolRounds;

      let text = '';
      const calls: ToolCallRequest[] = [];
      let independent = false;

      for await (const event of this.llm.stream({
        messages,
        tools: finalRound ? [] : tools,
        signal: turn.signal,
      })) {
        turn.throwIfCancelled();
        if (event.type === 'token') {
          text += event.content;
          sink.token(event.content);
        } else {
          calls.push(...event.calls);
          independent = event.independent;
        }
      }
      turn.throwIfCancelled();

      if (calls.length > 0 && finalRound) {
        this.logger.warn('Tool round limit reached, ignoring further tool calls', {
          conversationId,
          rounds: maxToolRounds,
          ignored: calls.length,
        });
      }

      const runTools = calls.length > 0 && !finalRound;
      const assistant: ChatMessage = runTools
        ? { role: 'assistant', content: text, toolCalls: calls }
        : { role: 'assistant', content: text };
      messages.push(assistant);
      produced.push(assistant);

      if (!runTools) {
        return { messages: produced, rounds: round };
      }

      const results = await this.runToolCalls(calls, independent, namespace, turn, sink);
      messages.push(...results);
      produced.push(...results);
    }
  }

  private async runToolCalls(
    calls: ToolCallRequest[],
    independent: boolean,
    namespace: ToolNamespace,
    turn: TurnHandle,
    sink: TurnEventSink
  ): Promise<ChatMessage[]> {
    const run = async (call: ToolCallRequest): Promise<ChatMessage> => {
      turn.throwIfCancelled();
      const result = await this.runToolCall(call, namespace, turn, sink);
      return {
        role: 'tool',
        content: result.text,
        toolCallId: call.id,
        name: call.name,
        isError: result.isError,
      };
    };

    if (independent && calls.length > 1) {
      return Promise.all(calls.map(run));
    }

    const results: ChatMessage[] = [];
    for (const call of calls) {
      results.push(await run(call));
    }
    return results;
  }

  private async runToolCall(
    call: ToolCallRequest,
    namespace: ToolNamespace,
    turn: TurnHandle,
    sink: TurnEventSink
  ): Promise<ToolCallResult> {
    const parsed = parseToolArguments(call.arguments);
    if (!parsed.ok) {
      sink.toolCallStarted(call, {});
      const result = { text: `Tool "${call.name}" was not called: ${parsed.message}`, isError: true };
      sink.toolCallResult(call, result);
      return result;
    }

    sink.toolCallStarted(call, parsed.args);
    const startedAt = Date.now();
    const outcome = await this.aggregator.invokeByQualifiedName(namespace, call.name, parsed.args, {
      signal: turn.signal,
    });

    if (!outcome.ok && (outcome.error instanceof CancelledError || turn.cancelled)) {
      throw outcome.error instanceof CancelledError ? outcome.error : new CancelledError('Turn cancelled');
    }

    const result: ToolCallResult = outcome.ok ? outcome.result : { text: outcome.error.message, isError: true };
    this.logger.debug('Tool call finished', {
      tool: call.name,
      callId: call.id,
      isError: result.isError,
      duration: Date.now() - startedAt,
    });

    sink.toolCallResult(call, result);
    return result;
  }
}
