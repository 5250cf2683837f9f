import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { Container } from 'inversify';
import { TYPES } from '@server/core/types';
import { ImmutableProviderError, NotFoundError, ValidationError } from '@server/core/errors';
import type {
  IConfig,
  ILogger,
  IProviderConfigStore,
  IProviderRegistry,
  ProviderChangeEvent,
} from '@server/core/interfaces';
import { ProviderRegistry } from '../provider-registry.service';
import { ProviderConfigFileStore } from '../provider-config.repository';
import { createMockConfig, createMockLogger, createTempDir, removeTempDir } from '@tests/utils';

describe('ProviderRegistry', () => {
  let dataDir: string;
  let configFile: string;
  let container: Container;
  let registry: IProviderRegistry;
  let store: IProviderConfigStore;
  let mockLogger: ILogger;

  const readFile = (): { mcpServers: Record<string, Record<string, unknown>>; [key: string]: unknown } =>
    JSON.parse(fs.readFileSync(configFile, 'utf-8'));

  const createRegistry = (): IProviderRegistry => {
    container = new Container();
    mockLogger = createMockLogger();
    container.bind<ILogger>(TYPES.Logger).toConstantValue(mockLogger);
    container.bind<IConfig>(TYPES.Config).toConstantValue(createMockConfig({}, dataDir));
    container.bind<IProviderConfigStore>(TYPES.ProviderConfigStore).to(ProviderConfigFileStore).inSingletonScope();
    container.bind<IProviderRegistry>(TYPES.ProviderRegistry).to(ProviderRegistry);
    store = container.get<IProviderConfigStore>(TYPES.ProviderConfigStore);
    const created = container.get<IProviderRegistry>(TYPES.ProviderRegistry);
    created.load();
    return created;
  };

  beforeEach(() => {
    dataDir = createTempDir();
    configFile = path.join(dataDir, 'mcp_config.json');
    registry = createRegistry();
  });

  afterEach(() => {
    removeTempDir(dataDir);
  });

  describe('load', () => {
    it('should start with the built-in providers when no file exists', () => {
      expect(registry.list().map((p) => p.id)).toEqual(['mssql', 'analytics-management', 'data-analytics']);
      expect(registry.list().every((p) => p.builtIn)).toBe(true);
    });

    it('should read entries, infer transports and keep built-in status', () => {
      fs.writeFileSync(
        configFile,
        JSON.stringify({
          $schema: './schema.json',
          mcpServers: {
            mssql: { enabled: false },
            docs: { url: 'http://docs.test/mcp', description: 'Docs search' },
            legacy: { type: 'python', command: 'uv', args: ['run', 'x'] },
            broken: { description: 'no transport info' },
          },
        })
      );

      registry = createRegistry();

      expect(registry.get('mssql')).toMatchObject({ builtIn: true, enabled: false, command: 'node' });
      expect(registry.get('docs')).toMatchObject({ transport: 'streamable_http', builtIn: false });
      expect(registry.get('legacy')).toMatchObject({ transport: 'stdio', command: 'uv' });
      expect(registry.get('broken')).toBeUndefined();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Skipping invalid provider entry',
        expect.objectContaining({ providerId: 'broken' })
      );
    });
  });

  describe('add', () => {
    it('should be visible to list() immediately and persisted', async () => {
      await registry.add({ id: 'docs', transport: 'sse', url: 'http://docs.test/sse' });

      expect(registry.list().map((p) => p.id)).toContain('docs');
      expect(readFile().mcpServers.docs).toMatchObject({ transport: 'sse', url: 'http://docs.test/sse' });
    });

    it('should keep placeholders literal in the persisted file', async () => {
      await registry.add({
        id: 'secure',
        url: 'https://secure.test/mcp',
        headers: { Authorization: 'Bearer ${API_KEY}' },
      });

      expect(readFile().mcpServers.secure?.headers).toEqual({ Authorization: 'Bearer ${API_KEY}' });
      expect(fs.readFileSync(configFile, 'utf-8')).toContain('${API_KEY}');
    });

    it.each([
      [{ id: 'no-command', transport: 'stdio' as const }],
      [{ id: 'no-url', transport: 'streamable_http' as const }],
      [{ id: 'no-url-sse', transport: 'sse' as const }],
    ])('should reject %o and never persist it', async (input) => {
      await expect(registry.add(input)).rejects.toBeInstanceOf(ValidationError);

      expect(registry.get(input.id)).toBeUndefined();
      expect(fs.existsSync(configFile)).toBe(false);
    });

    it('should reject duplicate ids', async () => {
      await expect(registry.add({ id: 'mssql', command: 'node' })).rejects.toThrow('already exists');
    });

    it('should leave the registry unchanged when the write fails', async () => {
      vi.spyOn(store, 'write').mockImplementationOnce(() => {
        throw new Error('disk full');
      });

      await expect(registry.add({ id: 'docs', url: 'http://docs.test' })).rejects.toThrow('disk full');
      expect(registry.get('docs')).toBeUndefined();
    });
  });

  describe('update', () => {
    it('should apply the patch and persist it', async () => {
      await registry.add({ id: 'docs', url: 'http://docs.test' });

      const updated = await registry.update('docs', { description: 'Product docs', timeoutMs: 10000 });

      expect(updated).toMatchObject({ description: 'Product docs', timeoutMs: 10000 });
      expect(registry.get('docs')?.description).toBe('Product docs');
      expect(readFile().mcpServers.docs).toMatchObject({ description: 'Product docs', timeout: 10 });
    });

    it('should validate the merged result', async () => {
      await expect(registry.update('mssql', { url: 'http://x.test' })).rejects.toBeInstanceOf(ValidationError);
      expect(registry.get('mssql')?.transport).toBe('stdio');
    });

    it('should reject out-of-range timeouts', async () => {
      await expect(registry.update('mssql', { timeoutMs: 10 })).rejects.toBeInstanceOf(ValidationError);
      expect(registry.get('mssql')?.timeoutMs).toBe(30000);
    });

    it('should throw NotFoundError for unknown ids', async () => {
      await expect(registry.update('nope', { description: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('remove', () => {
    it('should remove a user provider from list() and the file', async () => {
      await registry.add({ id: 'docs', url: 'http://docs.test' });

      await registry.remove('docs');

      expect(registry.list().map((p) => p.id)).not.toContain('docs');
      expect(readFile().mcpServers.docs).toBeUndefined();
    });

    it('should refuse to remove a built-in provider', async () => {
      await expect(registry.remove('mssql')).rejects.toBeInstanceOf(ImmutableProviderError);
      expect(registry.get('mssql')).toBeDefined();
    });
  });

  describe('setEnabled', () => {
    it('should allow disabling a built-in provider and persist it', async () => {
      await registry.setEnabled('data-analytics', false);

      expect(registry.get('data-analytics')?.enabled).toBe(false);
      expect(readFile().mcpServers['data-analytics']).toMatchObject({ enabled: false });

      const reloaded = createRegistry();
      expect(reloaded.get('data-analytics')).toMatchObject({ enabled: false, builtIn: true });
    });
  });

  describe('onChange', () => {
    it('should notify listeners with the kind of change', async () => {
      const events: ProviderChangeEvent[] = [];
      registry.onChange((event) => events.push(event));

      await registry.add({ id: 'docs', url: 'http://docs.test' });
      await registry.update('docs', { description: 'changed' });
      await registry.setEnabled('docs', false);
      await registry.update('docs', { enabled: true });
      await registry.remove('docs');

      expect(events.map((e) => e.kind)).toEqual(['added', 'updated', 'disabled', 'enabled', 'removed']);
    });

    it('should report a disable even when other fields change with it', async () => {
      const events: ProviderChangeEvent[] = [];
      registry.onChange((event) => events.push(event));

      await registry.update('mssql', { enabled: false, description: 'paused for maintenance' });
      await registry.update('mssql', { enabled: true, timeoutMs: 9000 });

      expect(events).toEqual([
        expect.objectContaining({
          kind: 'disabled',
          providerId: 'mssql',
          config: expect.objectContaining({ enabled: false, description: 'paused for maintenance' }),
        }),
        expect.objectContaining({
          kind: 'enabled',
          providerId: 'mssql',
          config: expect.objectContaining({ enabled: true, timeoutMs: 9000 }),
        }),
      ]);
    });

    it('should report a disable on reload when the args change too', async () => {
      await registry.add({ id: 'docs', url: 'http://docs.test' });
      const events: ProviderChangeEvent[] = [];
      registry.onChange((event) => events.push(event));

      const document = readFile();
      document.mcpServers.mssql = { ...document.mcpServers.mssql, args: ['/opt/mssql/index.js'], enabled: false };
      fs.writeFileSync(configFile, JSON.stringify(document));

      registry.reload();

      expect(events).toEqual([expect.objectContaining({ kind: 'disabled', providerId: 'mssql' })]);
    });

    it('should stop notifying after unsubscribe', async () => {
      const listener = vi.fn();
      const unsubscribe = registry.onChange(listener);
      unsubscribe();

      await registry.setEnabled('mssql', false);

      expect(listener).not.toHaveBeenCalled();
    });

    it('should report differences on reload', async () => {
      await registry.add({ id: 'docs', url: 'http://docs.test' });
      const events: ProviderChangeEvent[] = [];
      registry.onChange((event) => events.push(event));

      const document = readFile();
      delete document.mcpServers.docs;
      document.mcpServers.extra = { command: 'node', args: ['extra.js'] };
      document.mcpServers.mssql = { ...document.mcpServers.mssql, args: ['/opt/mssql/index.js'] };
      fs.writeFileSync(configFile, JSON.stringify(document));

      registry.reload();

      expect(events).toEqual([
        expect.objectContaining({ kind: 'updated', providerId: 'mssql' }),
        { kind: 'removed', providerId: 'docs' },
        expect.objectContaining({ kind: 'added', providerId: 'extra' }),
      ]);
    });
  });

  it('should preserve unrelated top-level keys of the file', async () => {
    fs.writeFileSync(configFile, JSON.stringify({ $schema: './schema.json', mcpServers: {} }));
    registry = createRegistry();

    await registry.setEnabled('mssql', false);

    expect(readFile().$schema).toBe('./schema.json');
  });
});
