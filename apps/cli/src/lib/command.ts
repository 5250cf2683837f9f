/**
 * Pieces shared by every command that talks to the gateway.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { GatewayClient, GatewayRequestError } from './client.js';
import { loadConfig, resolveConnection, type CliConfig, type Connection, type ConnectionOptions } from './config.js';
import { parseFormat, type OutputFormat } from './output.js';

export interface GatewayCommandOptions extends ConnectionOptions {
  format: string;
}

export interface CommandContext {
  client: GatewayClient;
  connection: Connection;
  config: CliConfig;
  format: OutputFormat;
}

export function withConnectionOptions(command: Command): Command {
  return command
    .option('--host <host>', 'Gateway host address')
    .option('-p, --port <port>', 'Gateway port')
    .option('-f, --format <format>', 'Output format: table, json', 'table');
}

export function createContext(options: GatewayCommandOptions): CommandContext {
  const config = loadConfig();
  const connection = resolveConnection(options, config);
  return {
    client: new GatewayClient(connection),
    connection,
    config,
    format: parseFormat(options.format),
  };
}

export function describeError(error: unknown): string {
  if (error instanceof GatewayRequestError && error.code) {
    return `${error.message} [${error.code}]`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a gateway call behind a spinner. On failure the spinner fails with
 * `failure` and the process exits non-zero.
 */
export async function withSpinner<T>(text: string, failure: string, task: () => Promise<T>): Promise<T> {
  const spinner = ora(text).start();
  try {
    const result = await task();
    spinner.stop();
    return result;
  } catch (error) {
    spinner.fail(failure);
    console.error(chalk.red(`\nError: ${describeError(error)}`));
    process.exit(1);
  }
}
