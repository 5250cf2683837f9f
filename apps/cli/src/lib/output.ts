/**
 * Rendering of command results as tables or JSON.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ConnectionStatus, Provider, Tool } from './schemas.js';

export type OutputFormat = 'table' | 'json';

export function parseFormat(value: string): OutputFormat {
  if (value === 'table' || value === 'json') {
    return value;
  }
  throw new Error(`Unknown output format "${value}" (expected table or json)`);
}

export function formatOutput(data: unknown, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify(data, null, 2) : String(data);
}

export function colorState(state: string): string {
  switch (state) {
    case 'ready':
      return chalk.green(state);
    case 'connecting':
      return chalk.yellow(state);
    case 'degraded':
      return chalk.red(state);
    default:
      return chalk.gray(state);
  }
}

function endpoint(provider: Provider): string {
  if (provider.transport === 'stdio') {
    return [provider.command, ...(provider.args ?? [])].filter(Boolean).join(' ');
  }
  return provider.url ?? '-';
}

export function providerTable(providers: Provider[]): string {
  const table = new Table({
    head: [
      chalk.cyan('ID'),
      chalk.cyan('Name'),
      chalk.cyan('Transport'),
      chalk.cyan('Enabled'),
      chalk.cyan('State'),
      chalk.cyan('Tools'),
    ],
    style: { head: [], border: [] },
  });

  for (const provider of providers) {
    table.push([
      provider.builtIn ? `${provider.id} ${chalk.gray('(built-in)')}` : provider.id,
      provider.name,
      provider.transport,
      provider.enabled ? chalk.green('✓') : chalk.gray('✗'),
      colorState(provider.status.state),
      String(provider.status.capabilityCount),
    ]);
  }
  return table.toString();
}

export function providerDetails(provider: Provider): string {
  const lines = [
    chalk.cyan(`\n${provider.name}`) + chalk.gray(` (${provider.id})`),
    chalk.gray(`  Description: ${provider.description || '-'}`),
    chalk.gray(`  Transport:   ${provider.transport}`),
    chalk.gray(`  Endpoint:    ${endpoint(provider)}`),
    chalk.gray(`  Enabled:     ${provider.enabled ? 'yes' : 'no'}${provider.builtIn ? ' (built-in)' : ''}`),
    chalk.gray(`  Timeout:     ${provider.timeoutMs}ms`),
  ];
  return [...lines, statusDetails(provider.status)].join('\n');
}

export function statusDetails(status: ConnectionStatus): string {
  const lines = [
    chalk.gray('  State:       ') + colorState(status.state),
    chalk.gray(`  Tools:       ${status.capabilityCount}`),
    chalk.gray(`  Leases:      ${status.leaseCount}`),
  ];
  if (status.stale) {
    lines.push(chalk.yellow('  Reconnects with updated configuration on next use'));
  }
  if (status.retired) {
    lines.push(chalk.yellow('  Disabled or removed; closes when its last conversation ends'));
  }
  if (status.lastError) {
    lines.push(chalk.red(`  Last error:  ${status.lastError}`));
  }
  return lines.join('\n');
}

export function toolTable(tools: Tool[]): string {
  const table = new Table({
    head: [chalk.cyan('Name'), chalk.cyan('Description')],
    style: { head: [], border: [] },
    colWidths: [30, 60],
    wordWrap: true,
  });

  for (const tool of tools) {
    table.push([tool.name, tool.description || '-']);
  }
  return table.toString();
}
