/**
 * Turning command-line flags into provider input.
 */

import type { ProviderInput } from './client.js';

export interface ProviderFlags {
  name?: string;
  description?: string;
  transport?: string;
  command?: string;
  arg: string[];
  env: string[];
  cwd?: string;
  url?: string;
  header: string[];
  timeout?: string;
  disabled?: boolean;
}

const TRANSPORTS = ['stdio', 'streamable_http', 'sse'] as const;
type Transport = (typeof TRANSPORTS)[number];

/**
 * Commander accumulator for repeatable flags.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `KEY=VALUE` pairs. Values may contain `=` and `${VAR}` placeholders,
 * which are passed to the gateway untouched.
 */
export function parseKeyValues(pairs: string[], flag: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new Error(`${flag} expects KEY=VALUE, got "${pair}"`);
    }
    result[pair.slice(0, index)] = pair.slice(index + 1);
  }
  return result;
}

function parseTransport(value: string): Transport {
  const transport = TRANSPORTS.find((candidate) => candidate === value);
  if (!transport) {
    throw new Error(`Unknown transport "${value}" (expected ${TRANSPORTS.join(', ')})`);
  }
  return transport;
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(`Invalid timeout: ${value}`);
  }
  return timeout;
}

/**
 * Only the flags that were given end up in the result, so the same shape
 * serves as a partial update.
 */
export function toProviderFields(flags: ProviderFlags): Omit<ProviderInput, 'id'> {
  const fields: Omit<ProviderInput, 'id'> = {};

  if (flags.name !== undefined) fields.name = flags.name;
  if (flags.description !== undefined) fields.description = flags.description;
  if (flags.transport !== undefined) fields.transport = parseTransport(flags.transport);
  if (flags.command !== undefined) fields.command = flags.command;
  if (flags.arg.length > 0) fields.args = flags.arg;
  if (flags.env.length > 0) fields.env = parseKeyValues(flags.env, '--env');
  if (flags.cwd !== undefined) fields.cwd = flags.cwd;
  if (flags.url !== undefined) fields.url = flags.url;
  if (flags.header.length > 0) fields.headers = parseKeyValues(flags.header, '--header');
  if (flags.timeout !== undefined) fields.timeoutMs = parseTimeout(flags.timeout);
  if (flags.disabled) fields.enabled = false;

  return fields;
}

export function parseProviderList(value: string): string[] {
  return [...new Set(value.split(',').map((id) => id.trim()).filter((id) => id.length > 0))];
}
