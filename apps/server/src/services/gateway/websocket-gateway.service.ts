import { injectable, inject } from 'inversify';
import type { IncomingMessage, Server } from 'http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { TYPES } from '@server/core/types';
import { toErrorMessage } from '@server/core/errors';
import type { IConfig, IConversationGateway, ILogger, IWebSocketGateway, SessionSink } from '@server/core/interfaces';
import { NORMAL_CLOSURE } from './conversation-gateway.service';
import { isValidConversationId, peekConversationId, type ServerEnvelope } from './stream-protocol';

export const WEBSOCKET_PATH = '/ws';

/** Policy violation; sent when a socket cannot be bound to a conversation. */
const POLICY_CLOSURE = 1008;

function rawDataToString(raw: RawData): string {
  if (Buffer.isBuffer(raw)) {
    return raw.toString('utf8');
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }
  return Buffer.from(raw).toString('utf8');
}

export function isOriginAllowed(origin: string | undefined, allowedOrigins: readonly string[]): boolean {
  // Non-browser clients (the CLI) send no Origin header
  if (!origin) {
    return true;
  }
  return allowedOrigins.some((allowed) => {
    if (allowed.includes('*')) {
      const pattern = new RegExp('^' + allowed.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*') + '$');
      return pattern.test(origin);
    }
    return origin === allowed;
  });
}

class WebSocketSink implements SessionSink {
  constructor(private readonly socket: WebSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): void {
    this.socket.send(data);
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }
}

/**
 * Binds WebSocket connections to conversation sessions. A socket belongs to
 * the conversation named in `?conversationId=` or, failing that, in its first
 * envelope. Closing with 1000 ends the session; any other close only detaches
 * it so the client can reconnect.
 */
@injectable()
export class WebSocketGateway implements IWebSocketGateway {
  private wss: WebSocketServer | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.ConversationGateway) private gateway: IConversationGateway,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    this.logger = logger.child({ component: 'websocket-gateway' });
  }

  attach(server: Server): void {
    if (this.wss) {
      throw new Error('WebSocket gateway already attached');
    }

    const allowedOrigins = this.config.get<string[]>('gateway.allowedOrigins', ['http://localhost:5173']);
    this.wss = new WebSocketServer({
      server,
      path: WEBSOCKET_PATH,
      maxPayload: this.config.get<number>('gateway.maxMessageBytes', 65536),
      verifyClient: (info: { origin: string | undefined }) => {
        const allowed = isOriginAllowed(info.origin, allowedOrigins);
        if (!allowed) {
          this.logger.warn('WebSocket blocked from unauthorized origin', { origin: info.origin });
        }
        return allowed;
      },
    });

    this.wss.on('connection', (socket, request) => this.handleConnection(socket, request));
    this.wss.on('error', (error) => {
      this.logger.error('WebSocket server error', { error: error.message });
    });

    const interval = this.config.get<number>('gateway.heartbeatIntervalMs', 30000);
    this.heartbeatTimer = setInterval(() => this.tick(), interval);
    this.heartbeatTimer.unref();

    this.logger.info('WebSocket gateway attached', { path: WEBSOCKET_PATH });
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    const wss = this.wss;
    if (!wss) {
      return;
    }
    this.wss = null;

    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.info('WebSocket gateway stopped');
  }

  private tick(): void {
    this.gateway.sendHeartbeats();
    this.gateway.sweepIdle().catch((error: unknown) => {
      this.logger.error('Idle session sweep failed', { error: toErrorMessage(error) });
    });
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const url = new URL(request.url ?? WEBSOCKET_PATH, 'http://localhost');
    const requested = url.searchParams.get('conversationId');
    const remote = request.socket.remoteAddress ?? 'unknown';

    if (requested !== null && !isValidConversationId(requested)) {
      socket.close(POLICY_CLOSURE, 'Invalid conversationId');
      return;
    }

    const sink = new WebSocketSink(socket);
    let conversationId: string | null = requested;
    if (conversationId) {
      this.gateway.attach(conversationId, sink);
    }
    this.logger.info('Client connected', { remote, conversationId });

    socket.on('message', (raw) => {
      const text = rawDataToString(raw);

      if (!conversationId) {
        const addressed = peekConversationId(text);
        if (!addressed) {
          this.sendUnbound(socket, 'The first message must name a conversationId');
          return;
        }
        conversationId = addressed;
        this.gateway.attach(conversationId, sink);
      }

      const id = conversationId;
      this.gateway.handleRaw(id, text).catch((error: unknown) => {
        this.logger.error('Failed to handle client message', { conversationId: id, error: toErrorMessage(error) });
      });
    });

    socket.on('close', (code) => {
      this.logger.info('Client disconnected', { remote, conversationId, code });
      if (!conversationId) {
        return;
      }
      const id = conversationId;
      this.gateway.detach(id, sink, code === NORMAL_CLOSURE).catch((error: unknown) => {
        this.logger.error('Failed to detach client', { conversationId: id, error: toErrorMessage(error) });
      });
    });

    socket.on('error', (error) => {
      this.logger.warn('Socket error', { conversationId, error: error.message });
    });
  }

  private sendUnbound(socket: WebSocket, message: string): void {
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }
    const envelope: ServerEnvelope = {
      conversationId: '',
      seq: 0,
      type: 'error',
      payload: { message, retryable: false },
    };
    socket.send(JSON.stringify(envelope));
  }
}
