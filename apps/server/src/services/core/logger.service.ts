import { injectable } from 'inversify';
import type { ILogger, LogLevel } from '@server/core/interfaces';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = [
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'auth',
  'credential',
  'private',
  'key',
  'headers',
  'env',
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structured JSON logger.
 * Values under sensitive keys are redacted, including resolved provider env and headers.
 */
@injectable()
export class Logger implements ILogger {
  private context: Record<string, unknown> = {};
  private minLevel: LogLevel = 'info';

  constructor(context?: Record<string, unknown>) {
    if (context) {
      this.context = context;
    }

    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLevel)) {
      this.minLevel = envLevel;
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): ILogger {
    const childLogger = new Logger({ ...this.context, ...context });
    childLogger.minLevel = this.minLevel;
    return childLogger;
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const output = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...sanitize({ ...this.context, ...meta }),
    });

    switch (level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
        console.error(output);
        break;
    }
  }
}

/**
 * Redact values whose key names look sensitive, recursively.
 */
export function sanitize(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
      result[key] = '[REDACTED]';
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? sanitize(item) : item));
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
