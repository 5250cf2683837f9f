/**
 * One conversation over the gateway's WebSocket stream.
 */

import WebSocket from 'ws';
import { ServerEnvelopeSchema, type ServerEnvelope } from './schemas.js';

export interface ChatHandlers {
  onToken?(content: string): void;
  onToolCallStarted?(name: string, args: Record<string, unknown>, callId: string): void;
  onToolCallResult?(name: string, result: string, isError: boolean, callId: string): void;
  /** Sequence numbers skipped since the last envelope, e.g. after a reconnect. */
  onGap?(expected: number, received: number): void;
  onWarning?(message: string): void;
}

export type TurnOutcome =
  | { status: 'complete' }
  | { status: 'cancelled' }
  | { status: 'error'; message: string; retryable: boolean; code?: string };

interface ChatSessionOptions {
  host: string;
  port: number;
  conversationId: string;
  handlers?: ChatHandlers;
}

interface PendingTurn {
  resolve(outcome: TurnOutcome): void;
  reject(error: Error): void;
}

export class ChatSession {
  private socket: WebSocket | null = null;
  private pending: PendingTurn | null = null;
  private lastSeq = 0;
  private readonly handlers: ChatHandlers;

  constructor(private readonly options: ChatSessionOptions) {
    this.handlers = options.handlers ?? {};
  }

  get conversationId(): string {
    return this.options.conversationId;
  }

  get url(): string {
    const query = new URLSearchParams({ conversationId: this.options.conversationId });
    return `ws://${this.options.host}:${this.options.port}/ws?${query.toString()}`;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);

      socket.once('open', () => {
        this.socket = socket;
        resolve();
      });
      socket.on('error', (error) => {
        if (this.socket === null) {
          reject(new Error(`Cannot reach the gateway at ${this.url}: ${error.message}`));
        } else {
          this.handlers.onWarning?.(`Connection error: ${error.message}`);
        }
      });
      socket.on('message', (data) => this.handleMessage(data.toString()));
      socket.on('close', (code, reason) => {
        this.socket = null;
        const pending = this.pending;
        this.pending = null;
        pending?.reject(new Error(`Connection closed before the turn finished (${code}${reason.length > 0 ? `: ${reason.toString()}` : ''})`));
      });
    });
  }

  /**
   * Send one user turn and wait for its terminating message.
   */
  sendTurn(content: string, selectedProviderIds: string[]): Promise<TurnOutcome> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('Not connected'));
    }
    if (this.pending) {
      return Promise.reject(new Error('A turn is already in progress'));
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
      socket.send(
        JSON.stringify({
          conversationId: this.options.conversationId,
          type: 'user_turn',
          payload: { content, selectedProviderIds },
        })
      );
    });
  }

  cancel(): void {
    if (this.socket?.readyState === WebSocket.OPEN) {
      this.socket.send(JSON.stringify({ conversationId: this.options.conversationId, type: 'cancel', payload: {} }));
    }
  }

  /**
   * Close normally, which ends the conversation on the server.
   */
  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      socket.once('close', () => resolve());
      socket.close(1000, 'Chat finished');
    });
  }

  private handleMessage(raw: string): void {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      this.handlers.onWarning?.('Ignored a message that is not valid JSON');
      return;
    }

    const parsed = ServerEnvelopeSchema.safeParse(data);
    if (!parsed.success) {
      this.handlers.onWarning?.('Ignored a message of unknown shape');
      return;
    }

    const envelope = parsed.data;
    if (envelope.seq !== this.lastSeq + 1 && this.lastSeq > 0) {
      this.handlers.onGap?.(this.lastSeq + 1, envelope.seq);
    }
    this.lastSeq = envelope.seq;
    this.dispatch(envelope);
  }

  private dispatch(envelope: ServerEnvelope): void {
    switch (envelope.type) {
      case 'token':
        this.handlers.onToken?.(envelope.payload.content);
        return;
      case 'tool_call_started':
        this.handlers.onToolCallStarted?.(envelope.payload.name, envelope.payload.args, envelope.payload.callId);
        return;
      case 'tool_call_result':
        this.handlers.onToolCallResult?.(
          envelope.payload.name,
          envelope.payload.result,
          envelope.payload.isError,
          envelope.payload.callId
        );
        return;
      case 'turn_complete':
        this.settle({ status: 'complete' });
        return;
      case 'turn_cancelled':
        this.settle({ status: 'cancelled' });
        return;
      case 'error':
        this.settle({ status: 'error', ...envelope.payload });
        return;
      case 'heartbeat':
        return;
    }
  }

  private settle(outcome: TurnOutcome): void {
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      pending.resolve(outcome);
    } else if (outcome.status === 'error') {
      this.handlers.onWarning?.(outcome.message);
    }
  }
}
