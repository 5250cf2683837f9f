/**
 * Providers command - Inspect and manage the gateway's tool providers.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext, withConnectionOptions, withSpinner, type GatewayCommandOptions } from '../lib/command.js';
import { collect, toProviderFields, type ProviderFlags } from '../lib/input.js';
import { formatOutput, providerDetails, providerTable, statusDetails, toolTable } from '../lib/output.js';

type ProviderCommandOptions = GatewayCommandOptions & ProviderFlags;

export const providersCommand = new Command('providers').description('Inspect and manage tool providers');

function withProviderFlags(command: Command): Command {
  return command
    .option('--name <name>', 'Display name')
    .option('--description <text>', 'Description')
    .option('--transport <kind>', 'Transport: stdio, streamable_http, sse')
    .option('--command <command>', 'Command to launch (stdio)')
    .option('--arg <value>', 'Command argument, repeatable (stdio)', collect, [])
    .option('--env <KEY=VALUE>', 'Environment variable, repeatable; ${VAR} placeholders allowed (stdio)', collect, [])
    .option('--cwd <dir>', 'Working directory (stdio)')
    .option('--url <url>', 'Endpoint URL (streamable_http, sse)')
    .option('--header <KEY=VALUE>', 'Request header, repeatable; ${VAR} placeholders allowed', collect, [])
    .option('--timeout <ms>', 'Per-call timeout in milliseconds')
    .option('--disabled', 'Register without enabling');
}

withConnectionOptions(providersCommand.command('list'))
  .description('List providers with their connection state')
  .action(async (options: GatewayCommandOptions) => {
    const { client, format } = createContext(options);
    const providers = await withSpinner('Fetching providers...', 'Failed to list providers', () =>
      client.listProviders()
    );

    if (format === 'json') {
      console.log(formatOutput(providers, 'json'));
      return;
    }
    console.log(chalk.gray(`${providers.length} provider(s)`));
    console.log(providerTable(providers));
  });

withConnectionOptions(providersCommand.command('show'))
  .description('Show one provider')
  .argument('<id>', 'Provider id')
  .action(async (id: string, options: GatewayCommandOptions) => {
    const { client, format } = createContext(options);
    const provider = await withSpinner(`Fetching ${id}...`, `Failed to fetch ${id}`, () => client.getProvider(id));

    console.log(format === 'json' ? formatOutput(provider, 'json') : providerDetails(provider));
  });

withProviderFlags(withConnectionOptions(providersCommand.command('add')))
  .description('Register a provider')
  .argument('<id>', 'Provider id (lowercase letters, digits, - and _)')
  .action(async (id: string, options: ProviderCommandOptions) => {
    const { client, format } = createContext(options);
    const fields = toProviderFields(options);
    const provider = await withSpinner(`Adding ${id}...`, `Failed to add ${id}`, () =>
      client.addProvider({ id, ...fields })
    );

    if (format === 'json') {
      console.log(formatOutput(provider, 'json'));
      return;
    }
    console.log(chalk.green(`✓ Added ${provider.id} (${provider.transport})`));
  });

withProviderFlags(withConnectionOptions(providersCommand.command('update')))
  .description('Change a provider; its connection picks up the change on next use')
  .argument('<id>', 'Provider id')
  .action(async (id: string, options: ProviderCommandOptions) => {
    const { client, format } = createContext(options);
    const fields = toProviderFields(options);
    if (Object.keys(fields).length === 0) {
      console.error(chalk.yellow('Nothing to update; pass at least one provider flag'));
      process.exit(1);
    }
    const provider = await withSpinner(`Updating ${id}...`, `Failed to update ${id}`, () =>
      client.updateProvider(id, fields)
    );

    console.log(format === 'json' ? formatOutput(provider, 'json') : chalk.green(`✓ Updated ${provider.id}`));
  });

withConnectionOptions(providersCommand.command('remove'))
  .description('Remove a provider (built-in providers can only be disabled)')
  .argument('<id>', 'Provider id')
  .action(async (id: string, options: GatewayCommandOptions) => {
    const { client } = createContext(options);
    await withSpinner(`Removing ${id}...`, `Failed to remove ${id}`, () => client.removeProvider(id));
    console.log(chalk.green(`✓ Removed ${id}`));
  });

for (const enabled of [true, false]) {
  const verb = enabled ? 'enable' : 'disable';
  withConnectionOptions(providersCommand.command(verb))
    .description(enabled ? 'Enable a provider' : 'Disable a provider; open conversations keep it until they end')
    .argument('<id>', 'Provider id')
    .action(async (id: string, options: GatewayCommandOptions) => {
      const { client, format } = createContext(options);
      const provider = await withSpinner(`${enabled ? 'Enabling' : 'Disabling'} ${id}...`, `Failed to ${verb} ${id}`, () =>
        client.setEnabled(id, enabled)
      );

      console.log(
        format === 'json' ? formatOutput(provider, 'json') : chalk.green(`✓ ${provider.id} ${enabled ? 'enabled' : 'disabled'}`)
      );
    });
}

withConnectionOptions(providersCommand.command('status'))
  .description('Show the live connection status of a provider')
  .argument('<id>', 'Provider id')
  .action(async (id: string, options: GatewayCommandOptions) => {
    const { client, format } = createContext(options);
    const status = await withSpinner(`Fetching status of ${id}...`, `Failed to fetch status of ${id}`, () =>
      client.getStatus(id)
    );

    console.log(format === 'json' ? formatOutput(status, 'json') : `${chalk.cyan(id)}\n${statusDetails(status)}`);
  });

withConnectionOptions(providersCommand.command('tools'))
  .description("List a provider's tools, connecting to it if needed")
  .argument('<id>', 'Provider id')
  .action(async (id: string, options: GatewayCommandOptions) => {
    const { client, format } = createContext(options);
    const tools = await withSpinner(`Fetching tools of ${id}...`, `Failed to list tools of ${id}`, () =>
      client.listTools(id)
    );

    if (format === 'json') {
      console.log(formatOutput(tools, 'json'));
      return;
    }
    console.log(chalk.gray(`${tools.length} tool(s)`));
    console.log(toolTable(tools));
  });

withConnectionOptions(providersCommand.command('reload'))
  .description('Re-read the provider configuration file')
  .action(async (options: GatewayCommandOptions) => {
    const { client, format } = createContext(options);
    const providers = await withSpinner('Reloading providers...', 'Failed to reload providers', () => client.reload());

    console.log(format === 'json' ? formatOutput(providers, 'json') : providerTable(providers));
  });
