import { describe, it, expect } from 'vitest';
import { ValidationError } from '@server/core/errors';
import { createStdioProvider } from '@tests/utils';
import { buildProviderConfig, fileEntryToInput, toFileEntry } from '../provider-config.schema';

describe('buildProviderConfig', () => {
  it('should infer stdio from a command', () => {
    const config = buildProviderConfig({ id: 'local', command: 'node', args: ['a.js'] });

    expect(config).toEqual({
      id: 'local',
      name: 'local',
      description: '',
      enabled: true,
      builtIn: false,
      timeoutMs: 30000,
      transport: 'stdio',
      command: 'node',
      args: ['a.js'],
      env: {},
    });
  });

  it('should infer streamable_http from a url', () => {
    const config = buildProviderConfig({ id: 'docs', url: 'http://docs.test/mcp' });

    expect(config.transport).toBe('streamable_http');
    expect(config).toMatchObject({ url: 'http://docs.test/mcp', headers: {} });
  });

  it('should reject stdio without a command', () => {
    expect(() => buildProviderConfig({ id: 'bad', transport: 'stdio' })).toThrow(ValidationError);
    expect(() => buildProviderConfig({ id: 'bad', transport: 'stdio' })).toThrow('requires a command');
  });

  it.each(['streamable_http', 'sse'] as const)('should reject %s without a url', (transport) => {
    expect(() => buildProviderConfig({ id: 'bad', transport })).toThrow('requires a url');
  });

  it('should reject a config with both command and url', () => {
    expect(() =>
      buildProviderConfig({ id: 'both', command: 'node', url: 'http://x.test' })
    ).toThrow(ValidationError);
  });

  it('should reject stdio fields on a remote transport', () => {
    expect(() =>
      buildProviderConfig({ id: 'mixed', transport: 'sse', url: 'http://x.test', env: { A: '1' } })
    ).toThrow('cannot have stdio fields');
  });

  it('should reject a config with no transport, command or url', () => {
    expect(() => buildProviderConfig({ id: 'empty' })).toThrow('needs a transport');
  });

  it('should reject invalid ids and non-http urls', () => {
    expect(() => buildProviderConfig({ id: 'Bad Id', command: 'node' })).toThrow(ValidationError);
    expect(() => buildProviderConfig({ id: 'ftp', url: 'ftp://x.test' })).toThrow('must be http or https');
    expect(() => buildProviderConfig({ id: 'junk', url: 'not a url' })).toThrow('invalid url');
  });

  it('should accept a url placeholder without checking it', () => {
    const config = buildProviderConfig({ id: 'docs', transport: 'sse', url: '${DOCS_URL}' });
    expect(config).toMatchObject({ transport: 'sse', url: '${DOCS_URL}' });
  });

  it('should apply a patch on top of a base config', () => {
    const base = createStdioProvider({ id: 'p1', args: ['one.js'], env: { A: '1' } });

    const config = buildProviderConfig({ id: 'p1', args: ['two.js'] }, { base });

    expect(config).toMatchObject({ transport: 'stdio', command: 'node', args: ['two.js'], env: { A: '1' } });
  });

  it('should drop the old transport fields when the transport changes', () => {
    const base = createStdioProvider({ id: 'p1' });

    const config = buildProviderConfig({ id: 'p1', transport: 'streamable_http', url: 'http://p1.test' }, { base });

    expect(config).toEqual({
      id: 'p1',
      name: base.name,
      description: base.description,
      enabled: true,
      builtIn: false,
      timeoutMs: base.timeoutMs,
      transport: 'streamable_http',
      url: 'http://p1.test',
      headers: {},
    });
  });
});

describe('file entries', () => {
  it('should map legacy type values and seconds-based timeouts', () => {
    expect(fileEntryToInput('py', { type: 'python', command: 'uv', args: ['run'], timeout: 45 })).toEqual({
      id: 'py',
      transport: 'stdio',
      command: 'uv',
      args: ['run'],
      timeoutMs: 45000,
    });
    expect(fileEntryToInput('web', { type: 'http', url: 'http://w.test', command: null })).toEqual({
      id: 'web',
      transport: 'streamable_http',
      url: 'http://w.test',
    });
  });

  it('should leave transport unset for unknown entries so it can be inferred', () => {
    expect(fileEntryToInput('x', { url: 'http://x.test' })).toEqual({ id: 'x', url: 'http://x.test' });
  });

  it('should write placeholders as stored and the timeout in seconds', () => {
    const entry = toFileEntry({
      id: 'docs',
      name: 'Docs',
      description: '',
      enabled: false,
      builtIn: false,
      timeoutMs: 15000,
      transport: 'streamable_http',
      url: 'http://docs.test',
      headers: { Authorization: 'Bearer ${API_KEY}' },
    });

    expect(entry).toEqual({
      name: 'Docs',
      description: '',
      transport: 'streamable_http',
      enabled: false,
      timeout: 15,
      url: 'http://docs.test',
      headers: { Authorization: 'Bearer ${API_KEY}' },
    });
  });
});
