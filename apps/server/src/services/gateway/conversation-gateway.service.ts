import { injectable, inject } from 'inversify';
import { nanoid } from 'nanoid';
import { TYPES } from '@server/core/types';
import { CancelledError, GatewayError, isTransientError, toErrorMessage } from '@server/core/errors';
import type {
  ChatMessage,
  ICapabilityAggregator,
  IConfig,
  IConnectionSupervisor,
  IConversationAgent,
  IConversationGateway,
  IConversationRepository,
  ILogger,
  IResilientInvoker,
  SessionSink,
  SessionSummary,
  StreamingState,
  ToolNamespace,
  TurnEventSink,
} from '@server/core/interfaces';
import { TurnState } from '@server/services/agent/turn-state';
import { parseClientEnvelope, type ServerMessage, type UserTurnEnvelope } from './stream-protocol';

/** WebSocket close code for a normal end of conversation. */
export const NORMAL_CLOSURE = 1000;
/** Close code sent to a socket replaced by a newer one for the same conversation. */
export const REPLACED_CLOSURE = 4000;

interface Session {
  readonly conversationId: string;
  readonly logger: ILogger;
  sink: SessionSink | null;
  selectedProviderIds: string[];
  history: ChatMessage[];
  historyLoaded: boolean;
  state: StreamingState;
  seq: number;
  turn: TurnState | null;
  running: Promise<void> | null;
  lastActivityAt: number;
}

/**
 * Conversation sessions and the turn protocol.
 *
 * Every user turn ends with exactly one of turn_complete, turn_cancelled or
 * error. Sequence numbers keep counting while no socket is attached, so a
 * client that reconnects can see what it missed.
 */
@injectable()
export class ConversationGateway implements IConversationGateway {
  private sessions = new Map<string, Session>();
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ConversationAgent) private agent: IConversationAgent,
    @inject(TYPES.CapabilityAggregator) private aggregator: ICapabilityAggregator,
    @inject(TYPES.ConnectionSupervisor) private supervisor: IConnectionSupervisor,
    @inject(TYPES.ResilientInvoker) private invoker: IResilientInvoker,
    @inject(TYPES.ConversationRepository) private repository: IConversationRepository,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'conversation-gateway' });
  }

  attach(conversationId: string, sink: SessionSink): void {
    const session = this.sessions.get(conversationId) ?? this.createSession(conversationId);

    if (session.sink && session.sink !== sink && session.sink.isOpen) {
      session.sink.close(REPLACED_CLOSURE, 'Replaced by a newer connection');
    }
    session.sink = sink;
    session.lastActivityAt = Date.now();
    session.logger.info('Client attached', { seq: session.seq, state: session.state });
  }

  async detach(conversationId: string, sink: SessionSink, endSession: boolean): Promise<void> {
    const session = this.sessions.get(conversationId);
    if (!session || session.sink !== sink) {
      return;
    }

    session.sink = null;
    session.lastActivityAt = Date.now();

    if (endSession) {
      await this.closeSession(conversationId, 'Client closed the conversation');
    } else {
      session.logger.info('Client detached, session kept until idle timeout');
    }
  }

  async handleRaw(conversationId: string, raw: string): Promise<void> {
    const session = this.sessions.get(conversationId) ?? this.createSession(conversationId);
    session.lastActivityAt = Date.now();

    const parsed = parseClientEnvelope(raw);
    if (!parsed.ok) {
      this.send(session, { type: 'error', payload: { message: parsed.message, retryable: false } });
      return;
    }

    const { envelope } = parsed;
    if (envelope.conversationId !== conversationId) {
      this.send(session, {
        type: 'error',
        payload: {
          message: `This connection belongs to conversation "${conversationId}"`,
          retryable: false,
        },
      });
      return;
    }

    if (envelope.type === 'cancel') {
      this.cancelTurn(session);
      return;
    }

    if (session.state !== 'idle') {
      this.send(session, {
        type: 'error',
        payload: { message: 'A turn is already in progress for this conversation', retryable: true },
      });
      return;
    }

    const running = this.runTurn(session, envelope);
    session.running = running;
    await running;
  }

  sendHeartbeats(): void {
    for (const session of this.sessions.values()) {
      if (session.sink?.isOpen) {
        this.send(session, { type: 'heartbeat', payload: {} });
      }
    }
  }

  /**
   * Close sessions with no activity for longer than the idle timeout.
   * Returns how many were closed.
   */
  async sweepIdle(now: number = Date.now()): Promise<number> {
    const timeout = this.config.get<number>('gateway.idleTimeoutMs', 900000);
    const idle = [...this.sessions.values()].filter((session) => now - session.lastActivityAt > timeout);

    await Promise.all(idle.map((session) => this.closeSession(session.conversationId, 'Idle timeout')));
    if (idle.length > 0) {
      this.logger.info('Closed idle sessions', { count: idle.length });
    }
    return idle.length;
  }

  listSessions(): SessionSummary[] {
    return [...this.sessions.values()].map((session) => ({
      conversationId: session.conversationId,
      state: session.state,
      attached: session.sink?.isOpen ?? false,
      selectedProviderIds: [...session.selectedProviderIds],
      seq: session.seq,
      historyLength: session.history.length,
      lastActivityAt: session.lastActivityAt,
    }));
  }

  async closeSession(conversationId: string, reason: string): Promise<void> {
    const session = this.sessions.get(conversationId);
    if (!session) {
      return;
    }
    this.sessions.delete(conversationId);

    session.turn?.cancel();
    if (session.running) {
      await session.running;
    }

    await this.supervisor.releaseAll(conversationId);
    this.invoker.forget(conversationId);

    if (session.sink?.isOpen) {
      session.sink.close(NORMAL_CLOSURE, reason);
    }
    session.sink = null;
    session.logger.info('Session closed', { reason });
  }

  async shutdown(): Promise<void> {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.closeSession(id, 'Server shutting down')));
  }

  private createSession(conversationId: string): Session {
    const session: Session = {
      conversationId,
      logger: this.logger.child({ conversationId }),
      sink: null,
      selectedProviderIds: [],
      history: [],
      historyLoaded: false,
      state: 'idle',
      seq: 0,
      turn: null,
      running: null,
      lastActivityAt: Date.now(),
    };
    this.sessions.set(conversationId, session);
    session.logger.info('Session opened');
    return session;
  }

  private cancelTurn(session: Session): void {
    if (!session.turn || session.state === 'idle') {
      session.logger.debug('Cancel received with no turn in flight');
      return;
    }
    session.state = 'cancelling';
    session.turn.cancel();
    session.logger.info('Turn cancellation requested', { turnId: session.turn.turnId });
  }

  private async runTurn(session: Session, envelope: UserTurnEnvelope): Promise<void> {
    const turn = new TurnState(nanoid());
    const { content, selectedProviderIds } = envelope.payload;
    const { conversationId } = session;
    session.turn = turn;
    session.state = 'generating';
    const startedAt = Date.now();

    try {
      const namespace = await this.prepareNamespace(session, selectedProviderIds);
      await this.ensureHistory(session);
      turn.throwIfCancelled();

      const sink = this.createTurnSink(session, turn);
      const history = [...session.history];
      const userMessage: ChatMessage = { role: 'user', content };
      session.history.push(userMessage);
      this.persist(session, userMessage);

      const result = await this.invoker.execute(
        conversationId,
        () =>
          this.agent.runTurn({
            conversationId,
            history,
            userContent: content,
            namespace,
            turn,
            sink,
          }),
        {
          signal: turn.signal,
          hasEmittedOutput: () => turn.hasEmittedOutput,
        }
      );

      for (const message of result.messages) {
        session.history.push(message);
        this.persist(session, message);
      }

      this.send(session, { type: 'turn_complete', payload: {} });
      session.logger.info('Turn complete', { rounds: result.rounds, duration: Date.now() - startedAt });
    } catch (error) {
      if (error instanceof CancelledError || turn.cancelled) {
        this.send(session, { type: 'turn_cancelled', payload: {} });
        session.logger.info('Turn cancelled', { duration: Date.now() - startedAt });
      } else {
        const retryable = error instanceof GatewayError ? error.retryable : isTransientError(error);
        this.send(session, {
          type: 'error',
          payload: {
            message: toErrorMessage(error),
            retryable,
            ...(error instanceof GatewayError ? { code: error.code } : {}),
          },
        });
        session.logger.error('Turn failed', { error: toErrorMessage(error), retryable });
      }
    } finally {
      session.turn = null;
      session.running = null;
      session.state = 'idle';
      session.lastActivityAt = Date.now();
    }
  }

  /**
   * Acquire the selected providers for this conversation, releasing the ones
   * it no longer selects. Rebuilt every turn so reconnects and config changes
   * are picked up.
   */
  private async prepareNamespace(session: Session, selectedProviderIds: string[]): Promise<ToolNamespace> {
    const selected = [...new Set(selectedProviderIds)];
    const dropped = session.selectedProviderIds.filter((id) => !selected.includes(id));

    await Promise.all(dropped.map((id) => this.supervisor.release(id, session.conversationId)));
    session.selectedProviderIds = selected;

    const namespace = await this.aggregator.buildNamespace(selected, session.conversationId);
    if (namespace.skipped.length > 0) {
      session.logger.debug('Continuing without some providers', {
        skipped: namespace.skipped.map((skip) => skip.providerId),
      });
    }
    return namespace;
  }

  private async ensureHistory(session: Session): Promise<void> {
    if (session.historyLoaded) {
      return;
    }
    session.historyLoaded = true;

    try {
      session.history = await this.repository.loadHistory(session.conversationId);
    } catch (error) {
      session.logger.error('Failed to load conversation history', { error: toErrorMessage(error) });
    }
  }

  private persist(session: Session, message: ChatMessage): void {
    this.repository.appendMessage(session.conversationId, message).catch((error: unknown) => {
      session.logger.error('Failed to persist message', { role: message.role, error: toErrorMessage(error) });
    });
  }

  private createTurnSink(session: Session, turn: TurnState): TurnEventSink {
    return {
      token: (content) => {
        turn.markOutputEmitted();
        this.send(session, { type: 'token', payload: { content } });
      },
      toolCallStarted: (call, args) => {
        turn.markOutputEmitted();
        this.send(session, { type: 'tool_call_started', payload: { callId: call.id, name: call.name, args } });
      },
      toolCallResult: (call, result) => {
        this.send(session, {
          type: 'tool_call_result',
          payload: { callId: call.id, name: call.name, result: result.text, isError: result.isError },
        });
      },
    };
  }

  private send(session: Session, message: ServerMessage): void {
    session.seq++;
    const sink = session.sink;
    if (!sink?.isOpen) {
      return;
    }

    try {
      sink.send(JSON.stringify({ conversationId: session.conversationId, seq: session.seq, ...message }));
    } catch (error) {
      session.logger.warn('Failed to send to client', { type: message.type, error: toErrorMessage(error) });
    }
  }
}
