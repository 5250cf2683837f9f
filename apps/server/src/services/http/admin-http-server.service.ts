import { injectable, inject } from 'inversify';
import express, { type Application, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { createServer, type Server } from 'http';
import { randomUUID } from 'crypto';
import type { ZodType, ZodTypeDef } from 'zod';
import { TYPES } from '@server/core/types';
import { GatewayError, ValidationError, toErrorMessage } from '@server/core/errors';
import type {
  IConfig,
  IConnectionSupervisor,
  IConversationGateway,
  IHttpServer,
  ILogger,
  IProviderAdmin,
  IWebSocketGateway,
} from '@server/core/interfaces';
import { ProviderInputSchema, ProviderPatchSchema } from '@server/services/providers/provider-config.schema';
import { isOriginAllowed } from '@server/services/gateway/websocket-gateway.service';

const ERROR_STATUS: Partial<Record<GatewayError['code'], number>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  IMMUTABLE_PROVIDER: 409,
  PROVIDER_UNAVAILABLE: 503,
};

function parseBody<Output>(schema: ZodType<Output, ZodTypeDef, unknown>, body: unknown, what: string): Output {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, result.error.issues);
  }
  return result.data;
}

/**
 * Client errors raised by express itself (malformed or oversized JSON bodies).
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = Reflect.get(error, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Express 4 does not forward rejected promises to the error handler.
 */
function route(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

/**
 * Administrative HTTP API over the provider registry and live connections.
 * The conversation WebSocket endpoint shares its server.
 */
@injectable()
export class AdminHttpServer implements IHttpServer {
  private app: Application;
  private server: Server | null = null;
  private port: number | undefined;

  constructor(
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) private logger: ILogger,
    @inject(TYPES.ProviderAdmin) private admin: IProviderAdmin,
    @inject(TYPES.ConnectionSupervisor) private supervisor: IConnectionSupervisor,
    @inject(TYPES.ConversationGateway) private gateway: IConversationGateway,
    @inject(TYPES.WebSocketGateway) private websocketGateway: IWebSocketGateway
  ) {
    this.app = express();
    this.configureMiddleware();
    this.configureRoutes();
    this.configureErrorHandling();
  }

  /**
   * The express application, exposed for in-process tests.
   */
  get application(): Application {
    return this.app;
  }

  private configureMiddleware(): void {
    this.app.use(helmet());

    const allowedOrigins = this.config.get<string[]>('gateway.allowedOrigins', ['http://localhost:5173']);
    this.app.use(
      cors({
        origin: (origin, callback) => {
          if (isOriginAllowed(origin, allowedOrigins)) {
            callback(null, true);
          } else {
            this.logger.warn('CORS blocked request from unauthorized origin', { origin });
            callback(new Error('CORS not allowed'));
          }
        },
        methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'X-Request-ID'],
        exposedHeaders: ['X-Request-ID', 'RateLimit-Remaining', 'RateLimit-Reset'],
        maxAge: 86400,
      })
    );

    this.app.use(
      rateLimit({
        windowMs: 60 * 1000,
        limit: this.config.get<number>('gateway.rateLimit.global', 100),
        standardHeaders: true,
        legacyHeaders: false,
        handler: (req: Request, res: Response) => {
          this.logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
          res.status(429).json({ error: 'Rate limit exceeded' });
        },
      })
    );

    this.app.use(express.json({ limit: '1mb' }));

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const requestId = req.get('x-request-id') ?? randomUUID();
      res.setHeader('X-Request-ID', requestId);
      next();
    });

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();
      res.on('finish', () => {
        this.logger.info('HTTP request', {
          requestId: res.getHeader('X-Request-ID'),
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
        });
      });
      next();
    });
  }

  private configureRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    this.app.get('/api/status', (_req: Request, res: Response) => {
      res.json({ providers: this.supervisor.listStatuses(), sessions: this.gateway.listSessions() });
    });

    const router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
      res.json(this.admin.list());
    });

    router.post('/reload', (_req: Request, res: Response) => {
      res.json(this.admin.reload());
    });

    router.post(
      '/',
      route(async (req, res) => {
        const input = parseBody(ProviderInputSchema, req.body, 'provider');
        res.status(201).json(await this.admin.add(input));
      })
    );

    router.get('/:id', (req: Request, res: Response) => {
      res.json(this.admin.get(req.params.id ?? ''));
    });

    router.patch(
      '/:id',
      route(async (req, res) => {
        const patch = parseBody(ProviderPatchSchema, req.body, 'provider update');
        res.json(await this.admin.update(req.params.id ?? '', patch));
      })
    );

    router.delete(
      '/:id',
      route(async (req, res) => {
        await this.admin.remove(req.params.id ?? '');
        res.status(204).end();
      })
    );

    router.post(
      '/:id/enable',
      route(async (req, res) => {
        res.json(await this.admin.setEnabled(req.params.id ?? '', true));
      })
    );

    router.post(
      '/:id/disable',
      route(async (req, res) => {
        res.json(await this.admin.setEnabled(req.params.id ?? '', false));
      })
    );

    router.get('/:id/status', (req: Request, res: Response) => {
      res.json(this.admin.status(req.params.id ?? ''));
    });

    router.get(
      '/:id/tools',
      route(async (req, res) => {
        res.json(await this.admin.tools(req.params.id ?? ''));
      })
    );

    this.app.use('/api/providers', router);
  }

  private configureErrorHandling(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const requestId = res.getHeader('X-Request-ID');

      if (err instanceof GatewayError) {
        const status = ERROR_STATUS[err.code];
        if (status !== undefined) {
          this.logger.warn('Request failed', { requestId, path: req.path, code: err.code, error: err.message });
          res.status(status).json({
            error: err.message,
            code: err.code,
            ...(err instanceof ValidationError && err.issues.length > 0 ? { issues: err.issues } : {}),
          });
          return;
        }
      }

      const clientStatus = clientErrorStatus(err);
      if (clientStatus !== undefined) {
        this.logger.warn('Malformed request', { requestId, path: req.path, error: toErrorMessage(err) });
        res.status(clientStatus).json({ error: toErrorMessage(err) });
        return;
      }

      this.logger.error('Unhandled error', {
        requestId,
        error: toErrorMessage(err),
        stack: this.config.isDevelopment && err instanceof Error ? err.stack : undefined,
      });
      res.status(500).json({ error: 'Internal server error', requestId });
    });
  }

  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Server already running');
    }

    const port = this.config.get<number>('gateway.port', 8765);
    const host = this.config.get<string>('gateway.host', '127.0.0.1');
    const server = createServer(this.app);
    this.websocketGateway.attach(server);

    await new Promise<void>((resolve, reject) => {
      server.once('error', (error: NodeJS.ErrnoException) => {
        reject(error.code === 'EADDRINUSE' ? new Error(`Port ${port} is already in use`) : error);
      });
      server.listen(port, host, () => resolve());
    });

    const address = server.address();
    this.port = address !== null && typeof address === 'object' ? address.port : port;
    this.server = server;
    this.logger.info('HTTP server started', { port: this.port, host });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await this.websocketGateway.stop();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });

    this.server = null;
    this.port = undefined;
    this.logger.info('HTTP server stopped');
  }

  getPort(): number | undefined {
    return this.port;
  }
}
