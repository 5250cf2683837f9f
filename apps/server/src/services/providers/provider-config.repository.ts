import { injectable, inject } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { TYPES } from '@server/core/types';
import { toErrorMessage } from '@server/core/errors';
import type {
  IConfig,
  ILogger,
  IProviderConfigStore,
  ProviderConfig,
  ProviderConfigSnapshot,
} from '@server/core/interfaces';
import { BUILTIN_PROVIDERS } from './builtin-providers';
import {
  buildProviderConfig,
  fileEntryToInput,
  ProviderFileEntrySchema,
  ProviderFileSchema,
  toFileEntry,
} from './provider-config.schema';

/**
 * JSON file store for provider configurations (`{ "mcpServers": { ... } }`).
 * Writes go to a temporary file that is fsynced and renamed over the original,
 * so readers of the file only ever see a complete document.
 */
@injectable()
export class ProviderConfigFileStore implements IProviderConfigStore {
  readonly path: string;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.Logger) logger: ILogger
  ) {
    const configured = this.config.get<string>('providers.configPath', 'mcp_config.json');
    this.path = path.isAbsolute(configured) ? configured : path.join(this.config.dataPath, configured);
    this.logger = logger.child({ component: 'provider-config-store' });
  }

  read(): ProviderConfigSnapshot {
    const builtIns = new Map(BUILTIN_PROVIDERS.map((provider) => [provider.id, provider]));
    const providers = new Map<string, ProviderConfig>(builtIns);
    const defaultTimeoutMs = this.config.get<number>('supervisor.defaultTimeoutMs', 30000);

    const document = this.readDocument();
    if (!document) {
      return { providers: [...providers.values()], extras: {} };
    }

    const { mcpServers, ...extras } = document;
    for (const [id, rawEntry] of Object.entries(mcpServers)) {
      const entry = ProviderFileEntrySchema.safeParse(rawEntry);
      if (!entry.success) {
        this.logger.warn('Skipping malformed provider entry', {
          providerId: id,
          issues: entry.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        continue;
      }

      const builtIn = builtIns.get(id);
      try {
        providers.set(
          id,
          buildProviderConfig(fileEntryToInput(id, entry.data), {
            base: builtIn,
            builtIn: builtIn !== undefined,
            defaultTimeoutMs,
          })
        );
      } catch (error) {
        this.logger.warn('Skipping invalid provider entry', { providerId: id, error: toErrorMessage(error) });
      }
    }

    this.logger.info('Provider configuration loaded', { path: this.path, count: providers.size });
    return { providers: [...providers.values()], extras };
  }

  write(providers: readonly ProviderConfig[]): void {
    const { mcpServers: _previous, ...extras } = this.readDocument() ?? { mcpServers: {} };
    const mcpServers: Record<string, unknown> = {};
    for (const provider of providers) {
      mcpServers[provider.id] = toFileEntry(provider);
    }

    const dir = path.dirname(this.path);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    const tmpPath = `${this.path}.${process.pid}.tmp`;
    const fd = fs.openSync(tmpPath, 'w', 0o600);
    try {
      fs.writeSync(fd, JSON.stringify({ ...extras, mcpServers }, null, 2) + '\n');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmpPath, this.path);

    this.logger.debug('Provider configuration saved', { path: this.path, count: providers.length });
  }

  private readDocument(): { mcpServers: Record<string, unknown>; [key: string]: unknown } | null {
    if (!fs.existsSync(this.path)) {
      return null;
    }

    try {
      const parsed = ProviderFileSchema.safeParse(JSON.parse(fs.readFileSync(this.path, 'utf-8')));
      if (!parsed.success) {
        this.logger.warn('Provider configuration file has an unexpected shape', { path: this.path });
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn('Failed to read provider configuration file', {
        path: this.path,
        error: toErrorMessage(error),
      });
      return null;
    }
  }
}
