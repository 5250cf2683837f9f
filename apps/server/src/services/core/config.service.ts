import { injectable } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import type { IConfig } from '@server/core/interfaces';

const DEFAULT_SYSTEM_PROMPT = [
  'You are a data analytics assistant.',
  'Answer questions by calling the available tools to query databases and run analyses.',
  'Use only the tools you are given; if a tool fails, explain what went wrong and try another approach.',
  'Keep answers concise and show the figures you relied on.',
].join(' ');

const DEFAULTS: Record<string, unknown> = {
  // Gateway (HTTP admin API + WebSocket streaming)
  'gateway.port': 8765,
  'gateway.host': '127.0.0.1',
  'gateway.allowedOrigins': ['http://localhost:5173'],
  'gateway.rateLimit.global': 100,
  'gateway.maxMessageBytes': 65536,
  'gateway.heartbeatIntervalMs': 30000,
  'gateway.idleTimeoutMs': 900000,

  // Provider registry
  'providers.configPath': 'mcp_config.json',

  // Connection supervisor
  'supervisor.connectAttempts': 1,
  'supervisor.defaultTimeoutMs': 30000,
  'supervisor.probeIntervalMs': 30000,
  'supervisor.reconnect.initialBackoffMs': 1000,
  'supervisor.reconnect.backoffMultiplier': 2,
  'supervisor.reconnect.maxBackoffMs': 30000,
  'supervisor.reconnect.maxAttempts': 5,

  // Turn resilience
  'resilience.retry.maxAttempts': 3,
  'resilience.retry.initialDelayMs': 1000,
  'resilience.retry.maxDelayMs': 30000,
  'resilience.retry.multiplier': 2,
  'resilience.retry.jitter': 0.1,
  'resilience.breaker.failureThreshold': 5,
  'resilience.breaker.cooldownMs': 60000,

  // LLM runtime (any OpenAI-compatible endpoint; Ollama by default)
  'llm.baseUrl': 'http://localhost:11434/v1',
  'llm.model': 'qwen2.5:7b-instruct',
  'llm.apiKey': 'ollama',
  'llm.temperature': 0.1,
  'llm.maxToolRounds': 8,
  'llm.parallelToolCalls': false,
  'llm.systemPrompt': DEFAULT_SYSTEM_PROMPT,

  // Conversation history
  'database.path': 'conversations.db',
};

const ENV_OVERRIDES: Array<{ env: string; key: string; parse: (value: string) => unknown }> = [
  { env: 'GATEWAY_PORT', key: 'gateway.port', parse: (value) => Number.parseInt(value, 10) },
  { env: 'GATEWAY_HOST', key: 'gateway.host', parse: (value) => value },
  { env: 'LLM_BASE_URL', key: 'llm.baseUrl', parse: (value) => value },
  { env: 'LLM_MODEL', key: 'llm.model', parse: (value) => value },
  { env: 'LLM_API_KEY', key: 'llm.apiKey', parse: (value) => value },
  { env: 'MCP_CONFIG_PATH', key: 'providers.configPath', parse: (value) => value },
  { env: 'DATABASE_PATH', key: 'database.path', parse: (value) => value },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration service.
 * Dot-notation access over `<dataPath>/settings.json` with defaults and
 * environment overrides. Overrides apply to this process only and are never saved.
 */
@injectable()
export class ConfigService implements IConfig {
  private config: Record<string, unknown> = {};
  private overrides: Record<string, unknown> = {};
  private readonly configPath: string;
  readonly dataPath: string;

  constructor() {
    this.dataPath = process.env.ANALYST_GATEWAY_DATA_DIR
      ? path.resolve(process.env.ANALYST_GATEWAY_DATA_DIR)
      : path.join(process.cwd(), '.analyst-gateway');
    this.configPath = path.join(this.dataPath, 'settings.json');

    this.loadConfig();
    this.applyDefaults();
    this.applyEnvironmentOverrides();
  }

  get<T>(key: string): T | undefined;
  get<T>(key: string, defaultValue: T): T;
  get<T>(key: string, defaultValue?: T): T | undefined {
    const override = getNestedValue(this.overrides, key);
    const value = override !== undefined ? override : getNestedValue(this.config, key);

    if (value === undefined) {
      return defaultValue;
    }

    // Values come from our own defaults or the settings file; callers name the type
    return value as T;
  }

  set<T>(key: string, value: T): void {
    setNestedValue(this.config, key, value);
    this.saveConfig();
  }

  has(key: string): boolean {
    return getNestedValue(this.overrides, key) !== undefined || getNestedValue(this.config, key) !== undefined;
  }

  delete(key: string): void {
    deleteNestedValue(this.config, key);
    this.saveConfig();
  }

  get isDevelopment(): boolean {
    return process.env.NODE_ENV === 'development';
  }

  private loadConfig(): void {
    try {
      if (fs.existsSync(this.configPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
        this.config = isRecord(parsed) ? parsed : {};
      }
    } catch (error) {
      console.error('Failed to load settings:', error);
      this.config = {};
    }
  }

  private saveConfig(): void {
    try {
      if (!fs.existsSync(this.dataPath)) {
        fs.mkdirSync(this.dataPath, { recursive: true, mode: 0o700 });
      }

      fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { mode: 0o600 });
    } catch (error) {
      console.error('Failed to save settings:', error);
    }
  }

  private applyDefaults(): void {
    for (const [key, value] of Object.entries(DEFAULTS)) {
      if (getNestedValue(this.config, key) === undefined) {
        setNestedValue(this.config, key, value);
      }
    }
  }

  private applyEnvironmentOverrides(): void {
    for (const { env, key, parse } of ENV_OVERRIDES) {
      const raw = process.env[env];
      if (raw === undefined || raw === '') {
        continue;
      }
      const value = parse(raw);
      if (typeof value === 'number' && Number.isNaN(value)) {
        console.warn(`Ignoring ${env}: not a number`);
        continue;
      }
      setNestedValue(this.overrides, key, value);
    }
  }
}

function getNestedValue(obj: Record<string, unknown>, key: string): unknown {
  let current: unknown = obj;

  for (const k of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}

function setNestedValue(obj: Record<string, unknown>, key: string, value: unknown): void {
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let current = obj;
  for (const k of keys) {
    const next = current[k];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[k] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function deleteNestedValue(obj: Record<string, unknown>, key: string): void {
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let current = obj;
  for (const k of keys) {
    const next = current[k];
    if (!isRecord(next)) {
      return;
    }
    current = next;
  }

  delete current[lastKey];
}
