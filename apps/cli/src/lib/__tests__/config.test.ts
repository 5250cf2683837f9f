import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, statSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_HOST, DEFAULT_PORT, getConfigPath, loadConfig, mergeConfig, parsePort, resolveConnection, saveConfig } from '../config';

describe('CLI config', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'agw-cli-'));
    path = join(dir, 'nested', 'cli-config.json');
    vi.stubEnv('AGW_HOST', '');
    vi.stubEnv('AGW_PORT', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should treat a missing file as empty', () => {
    expect(loadConfig(path)).toEqual({});
  });

  it('should save and merge values', () => {
    saveConfig({ defaultHost: 'gateway.local' }, path);
    const merged = mergeConfig({ defaultPort: 9000 }, path);

    expect(merged).toEqual({ defaultHost: 'gateway.local', defaultPort: 9000 });
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(merged);
    expect(statSync(path).mode & 0o777).toBe(0o600);
  });

  it('should reject malformed files', () => {
    saveConfig({}, path);
    writeFileSync(path, '{ nope');
    expect(() => loadConfig(path)).toThrow(/is not valid JSON/);

    writeFileSync(path, JSON.stringify({ defaultPort: 'high' }));
    expect(() => loadConfig(path)).toThrow(/is invalid: defaultPort/);
  });

  it('should honour the config directory override', () => {
    vi.stubEnv('AGW_CONFIG_DIR', dir);

    expect(getConfigPath()).toBe(join(dir, 'cli-config.json'));
  });

  describe('resolveConnection', () => {
    it('should fall back to defaults', () => {
      expect(resolveConnection({}, {})).toEqual({ host: DEFAULT_HOST, port: DEFAULT_PORT });
    });

    it('should prefer flags over environment over file', () => {
      const config = { defaultHost: 'file-host', defaultPort: 7000 };

      expect(resolveConnection({}, config)).toEqual({ host: 'file-host', port: 7000 });

      vi.stubEnv('AGW_HOST', 'env-host');
      vi.stubEnv('AGW_PORT', '7100');
      expect(resolveConnection({}, config)).toEqual({ host: 'env-host', port: 7100 });

      expect(resolveConnection({ host: 'flag-host', port: '7200' }, config)).toEqual({ host: 'flag-host', port: 7200 });
    });
  });

  it('should validate ports', () => {
    expect(parsePort('8765')).toBe(8765);
    expect(() => parsePort('0')).toThrow('Invalid port: 0');
    expect(() => parsePort('abc')).toThrow('Invalid port: abc');
  });
});
