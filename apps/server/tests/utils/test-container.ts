import 'reflect-metadata';
import { Container } from 'inversify';
import { vi } from 'vitest';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TYPES } from '@server/core/types';
import { runMigrations } from '@server/services/core/database.service';
import type { IConfig, IDatabase, ILogger } from '@server/core/interfaces';

/**
 * Create a mock logger for testing.
 */
export function createMockLogger(): ILogger {
  const mockLogger: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => mockLogger),
  };
  return mockLogger;
}

/**
 * Create a mock config for testing.
 */
export function createMockConfig(
  overrides: Record<string, unknown> = {},
  dataPath = path.join(os.tmpdir(), 'analyst-gateway-test')
): IConfig {
  const config: Record<string, unknown> = {
    'gateway.port': 0,
    'gateway.host': '127.0.0.1',
    'gateway.allowedOrigins': ['http://localhost:5173'],
    'gateway.rateLimit.global': 100,
    'gateway.maxMessageBytes': 65536,
    'gateway.heartbeatIntervalMs': 30000,
    'gateway.idleTimeoutMs': 900000,
    'providers.configPath': 'mcp_config.json',
    'supervisor.connectAttempts': 1,
    'supervisor.defaultTimeoutMs': 30000,
    'supervisor.probeIntervalMs': 30000,
    'supervisor.reconnect.initialBackoffMs': 1000,
    'supervisor.reconnect.backoffMultiplier': 2,
    'supervisor.reconnect.maxBackoffMs': 30000,
    'supervisor.reconnect.maxAttempts': 5,
    'resilience.retry.maxAttempts': 3,
    'resilience.retry.initialDelayMs': 1000,
    'resilience.retry.maxDelayMs': 30000,
    'resilience.retry.multiplier': 2,
    'resilience.retry.jitter': 0,
    'resilience.breaker.failureThreshold': 5,
    'resilience.breaker.cooldownMs': 60000,
    'llm.baseUrl': 'http://localhost:11434/v1',
    'llm.model': 'test-model',
    'llm.apiKey': 'test-secret',
    'llm.temperature': 0,
    'llm.maxToolRounds': 4,
    'llm.parallelToolCalls': false,
    'llm.systemPrompt': 'You are a test assistant.',
    'database.path': ':memory:',
    ...overrides,
  };

  return {
    get: vi.fn(<T>(key: string, defaultValue?: T): T | undefined => {
      const value = config[key];
      return (value !== undefined ? value : defaultValue) as T | undefined;
    }),
    set: vi.fn(<T>(key: string, value: T): void => {
      config[key] = value;
    }),
    has: vi.fn((key: string): boolean => key in config),
    delete: vi.fn((key: string): void => {
      delete config[key];
    }),
    dataPath,
    isDevelopment: true,
  };
}

/**
 * Create an in-memory database with all migrations applied.
 */
export function createTestDatabase(): IDatabase {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);

  return {
    db,
    initialize: vi.fn(),
    close: vi.fn(() => db.close()),
    transaction: <T>(fn: () => T): T => {
      const transaction = db.transaction(fn);
      return transaction();
    },
  };
}

/**
 * Create a fresh temporary directory; remove it with removeTempDir.
 */
export function createTempDir(prefix = 'analyst-gateway-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Create a test container with core infrastructure mocked.
 */
export function createTestContainer(options: {
  config?: Record<string, unknown>;
  dataPath?: string;
  useTestDatabase?: boolean;
} = {}): Container {
  const container = new Container({
    defaultScope: 'Singleton',
    autoBindInjectable: false,
  });

  container.bind<ILogger>(TYPES.Logger).toConstantValue(createMockLogger());
  container.bind<IConfig>(TYPES.Config).toConstantValue(createMockConfig(options.config, options.dataPath));

  if (options.useTestDatabase !== false) {
    container.bind<IDatabase>(TYPES.Database).toConstantValue(createTestDatabase());
  }

  return container;
}

/**
 * Clear recorded calls on the container's mock logger.
 */
export function resetContainerMocks(container: Container): void {
  const logger = container.get<ILogger>(TYPES.Logger);
  vi.mocked(logger.debug).mockClear();
  vi.mocked(logger.info).mockClear();
  vi.mocked(logger.warn).mockClear();
  vi.mocked(logger.error).mockClear();
}
