/**
 * CLI configuration management.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { z } from 'zod';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8765;

const CliConfigSchema = z
  .object({
    defaultHost: z.string().min(1).optional(),
    defaultPort: z.number().int().min(1).max(65535).optional(),
    defaultProviders: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

export interface ConnectionOptions {
  host?: string;
  port?: string;
}

export interface Connection {
  host: string;
  port: number;
}

/**
 * Get the configuration file path. `AGW_CONFIG_DIR` overrides the directory.
 */
export function getConfigPath(): string {
  const dir = process.env.AGW_CONFIG_DIR || join(homedir(), '.analyst-gateway');
  return join(dir, 'cli-config.json');
}

/**
 * Load CLI configuration from disk. A missing file is an empty configuration.
 */
export function loadConfig(path: string = getConfigPath()): CliConfig {
  if (!existsSync(path)) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = CliConfigSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Configuration file ${path} is invalid: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }
  return result.data;
}

/**
 * Save CLI configuration to disk.
 */
export function saveConfig(config: CliConfig, path: string = getConfigPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  writeFileSync(path, JSON.stringify(config, null, 2), {
    encoding: 'utf-8',
    mode: 0o600,
  });
}

/**
 * Merge new values into the stored configuration.
 */
export function mergeConfig(updates: Partial<CliConfig>, path: string = getConfigPath()): CliConfig {
  const merged = { ...loadConfig(path), ...updates };
  saveConfig(merged, path);
  return merged;
}

/**
 * Where to reach the gateway: flags first, then `AGW_HOST`/`AGW_PORT`, then
 * the config file, then the defaults.
 */
export function resolveConnection(options: ConnectionOptions, config: CliConfig): Connection {
  const host = options.host || process.env.AGW_HOST || config.defaultHost || DEFAULT_HOST;
  const rawPort = options.port || process.env.AGW_PORT;
  const port = rawPort !== undefined ? parsePort(rawPort) : config.defaultPort ?? DEFAULT_PORT;
  return { host, port };
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}
