/**
 * Config command - Manage CLI configuration.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_HOST, DEFAULT_PORT, getConfigPath, loadConfig, mergeConfig, parsePort, saveConfig } from '../lib/config.js';
import { parseProviderList } from '../lib/input.js';

export const configCommand = new Command('config').description('Manage CLI configuration');

configCommand
  .command('show')
  .description('Show current configuration')
  .action(() => {
    const config = loadConfig();

    console.log(chalk.cyan('\nConfiguration:'));
    console.log(chalk.gray(`  File:      ${getConfigPath()}`));
    console.log(chalk.gray(`  Host:      ${config.defaultHost ?? DEFAULT_HOST}`));
    console.log(chalk.gray(`  Port:      ${config.defaultPort ?? DEFAULT_PORT}`));
    console.log(chalk.gray(`  Providers: ${config.defaultProviders?.join(', ') ?? 'all enabled'}`));
  });

configCommand
  .command('set')
  .description('Set a configuration value')
  .argument('<key>', 'Configuration key: host, port, providers')
  .argument('<value>', 'Configuration value')
  .action((key: string, value: string) => {
    switch (key.toLowerCase()) {
      case 'host':
        mergeConfig({ defaultHost: value });
        break;
      case 'port':
        mergeConfig({ defaultPort: parsePort(value) });
        break;
      case 'providers':
        mergeConfig({ defaultProviders: parseProviderList(value) });
        break;
      default:
        console.error(chalk.red(`Unknown config key: ${key}`));
        console.log(chalk.yellow('Available keys: host, port, providers'));
        process.exit(1);
    }
    console.log(chalk.green(`✓ Set ${key} = ${value}`));
  });

configCommand
  .command('clear')
  .description('Clear all configuration')
  .action(() => {
    saveConfig({});
    console.log(chalk.green('✓ Configuration cleared'));
  });

configCommand
  .command('path')
  .description('Show configuration file path')
  .action(() => {
    console.log(getConfigPath());
  });
