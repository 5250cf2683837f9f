import { spawn, type ChildProcess } from 'child_process';
import { StringDecoder } from 'string_decoder';
import { TransportError, toErrorMessage } from '@server/core/errors';
import type { ILogger, JsonRpcMessage, StdioProviderConfig, TransportCallOptions } from '@server/core/interfaces';
import { McpTransport } from './mcp-transport';

export const KILL_GRACE_MS = 5000;

/**
 * MCP over a child process: newline-delimited JSON-RPC on stdin/stdout.
 * Expects a config whose placeholders are already resolved.
 */
export class StdioTransport extends McpTransport {
  override readonly kind = 'stdio';
  override readonly concurrency = 'serial';

  private process: ChildProcess | null = null;
  private buffer = '';
  /** Holds back the bytes of a character split across stdout chunks. */
  private decoder = new StringDecoder('utf8');

  constructor(
    private config: StdioProviderConfig,
    logger: ILogger
  ) {
    super(config.id, logger);
  }

  getPid(): number | undefined {
    return this.process?.pid;
  }

  protected override async openChannel(_options: TransportCallOptions): Promise<void> {
    if (this.process) {
      return;
    }

    const { command, args, env, cwd } = this.config;
    this.logger.info('Spawning provider process', { command, args });

    await new Promise<void>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd,
          env: { ...process.env, ...env },
          stdio: ['pipe', 'pipe', 'pipe'],
          shell: false,
        });
      } catch (error) {
        reject(new TransportError(`Failed to spawn "${command}": ${toErrorMessage(error)}`, false, { cause: error }));
        return;
      }
      this.process = child;
      this.buffer = '';
      this.decoder = new StringDecoder('utf8');
      let spawned = false;

      child.stdout?.on('data', (data: Buffer) => this.handleStdoutData(data));

      child.stderr?.on('data', (data: Buffer) => {
        for (const line of data.toString().split('\n')) {
          if (line.trim()) {
            this.logger.debug('Provider stderr', { line: line.trim() });
          }
        }
      });

      child.stdin?.on('error', (error: Error) => {
        this.logger.warn('Provider stdin error', { error: error.message });
      });

      child.on('error', (error: Error) => {
        this.logger.error('Provider process error', { error: error.message });
        if (!spawned) {
          this.process = null;
          reject(new TransportError(`Failed to spawn "${command}": ${error.message}`, false, { cause: error }));
        }
      });

      child.on('spawn', () => {
        spawned = true;
        this.logger.info('Provider process spawned', { pid: child.pid });
        resolve();
      });

      child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        this.logger.info('Provider process exited', { code, signal });
        if (this.process === child) {
          this.process = null;
        }
        this.handleChannelClosed(
          new TransportError(`Provider process exited (${signal ?? `code ${code ?? 'unknown'}`})`, true)
        );
      });
    });
  }

  protected override async write(message: JsonRpcMessage, _signal: AbortSignal): Promise<void> {
    const stdin = this.process?.stdin;
    if (!stdin?.writable) {
      throw new TransportError('Provider process stdin not available', true);
    }
    stdin.write(JSON.stringify(message) + '\n');
  }

  protected override async closeChannel(): Promise<void> {
    const child = this.process;
    if (!child) {
      return;
    }
    this.process = null;

    this.logger.info('Stopping provider process', { pid: child.pid });
    child.stdin?.end();
    child.kill('SIGTERM');

    const forceKill = setTimeout(() => {
      if (child.exitCode === null && child.signalCode === null) {
        this.logger.warn('Provider process ignored SIGTERM, killing', { pid: child.pid });
        child.kill('SIGKILL');
      }
    }, KILL_GRACE_MS);
    forceKill.unref();
    child.once('exit', () => clearTimeout(forceKill));
  }

  private handleStdoutData(data: Buffer): void {
    this.buffer += this.decoder.write(data);

    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, newlineIndex).trim();
      this.buffer = this.buffer.slice(newlineIndex + 1);

      if (line) {
        this.receive(line);
      }
    }
  }
}
