import { describe, it, expect } from 'vitest';
import { collect, parseKeyValues, parseProviderList, toProviderFields, type ProviderFlags } from '../input';

const noFlags: ProviderFlags = { arg: [], env: [], header: [] };

describe('parseKeyValues', () => {
  it('should split on the first equals sign and keep placeholders', () => {
    expect(parseKeyValues(['Authorization=Bearer ${DOCS_KEY}', 'QUERY=a=b'], '--header')).toEqual({
      Authorization: 'Bearer ${DOCS_KEY}',
      QUERY: 'a=b',
    });
  });

  it('should reject pairs without a key', () => {
    expect(() => parseKeyValues(['=value'], '--env')).toThrow('--env expects KEY=VALUE, got "=value"');
    expect(() => parseKeyValues(['novalue'], '--env')).toThrow('--env expects KEY=VALUE, got "novalue"');
  });
});

describe('toProviderFields', () => {
  it('should include only the flags that were given', () => {
    expect(toProviderFields(noFlags)).toEqual({});
    expect(toProviderFields({ ...noFlags, description: 'Docs' })).toEqual({ description: 'Docs' });
  });

  it('should build a stdio provider', () => {
    const flags: ProviderFlags = {
      ...noFlags,
      command: 'node',
      arg: collect('server.js', collect('--stdio', [])),
      env: ['HOST=${DB_HOST:-localhost}'],
      timeout: '15000',
      disabled: true,
    };

    expect(toProviderFields(flags)).toEqual({
      command: 'node',
      args: ['--stdio', 'server.js'],
      env: { HOST: '${DB_HOST:-localhost}' },
      timeoutMs: 15000,
      enabled: false,
    });
  });

  it('should reject unknown transports and bad timeouts', () => {
    expect(() => toProviderFields({ ...noFlags, transport: 'grpc' })).toThrow(
      'Unknown transport "grpc" (expected stdio, streamable_http, sse)'
    );
    expect(() => toProviderFields({ ...noFlags, timeout: '-1' })).toThrow('Invalid timeout: -1');
  });
});

describe('parseProviderList', () => {
  it('should trim, drop empties and deduplicate', () => {
    expect(parseProviderList(' mssql, docs,,mssql ')).toEqual(['mssql', 'docs']);
  });
});
