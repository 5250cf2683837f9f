/**
 * Chat command - Send one message and stream the agent's answer.
 */

import { randomUUID } from 'crypto';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ChatSession, type TurnOutcome } from '../lib/chat.js';
import { createContext, describeError, withConnectionOptions, withSpinner, type GatewayCommandOptions } from '../lib/command.js';
import { parseProviderList } from '../lib/input.js';
import { formatOutput } from '../lib/output.js';

interface ChatCommandOptions extends GatewayCommandOptions {
  conversation?: string;
  providers?: string;
}

interface ToolCallRecord {
  callId: string;
  name: string;
  args: Record<string, unknown>;
  result?: string;
  isError?: boolean;
}

export const chatCommand = withConnectionOptions(new Command('chat'))
  .description('Send a message to the analyst agent and stream its answer')
  .argument('<message>', 'What to ask')
  .option('-c, --conversation <id>', 'Continue an existing conversation')
  .option('--providers <ids>', 'Comma-separated provider ids to offer tools from (default: all enabled)')
  .action(async (message: string, options: ChatCommandOptions) => {
    const { client, connection, config, format } = createContext(options);
    const conversationId = options.conversation ?? randomUUID();

    const providerIds =
      options.providers !== undefined
        ? parseProviderList(options.providers)
        : config.defaultProviders ??
          (await withSpinner('Fetching providers...', 'Failed to list providers', async () =>
            (await client.listProviders()).filter((provider) => provider.enabled).map((provider) => provider.id)
          ));

    const pretty = format === 'table';
    const toolCalls: ToolCallRecord[] = [];
    let text = '';
    const spinner = pretty ? ora('Thinking...').start() : null;

    const session = new ChatSession({
      host: connection.host,
      port: connection.port,
      conversationId,
      handlers: {
        onToken: (content) => {
          spinner?.stop();
          text += content;
          if (pretty) {
            process.stdout.write(content);
          }
        },
        onToolCallStarted: (name, args, callId) => {
          toolCalls.push({ callId, name, args });
          if (pretty) {
            spinner?.stop();
            console.log(chalk.gray(`\n→ ${name} ${JSON.stringify(args)}`));
          }
        },
        onToolCallResult: (name, result, isError, callId) => {
          const call = toolCalls.find((candidate) => candidate.callId === callId);
          if (call) {
            call.result = result;
            call.isError = isError;
          }
          if (pretty) {
            const summary = result.length > 200 ? `${result.slice(0, 200)}...` : result;
            console.log(isError ? chalk.red(`✗ ${name}: ${summary}`) : chalk.gray(`✓ ${name}: ${summary}`));
          }
        },
        onGap: (expected, received) => {
          console.error(chalk.yellow(`\nMissed messages ${expected}-${received - 1}`));
        },
        onWarning: (warning) => {
          console.error(chalk.yellow(`\n${warning}`));
        },
      },
    });

    const onInterrupt = (): void => {
      spinner?.stop();
      console.error(chalk.yellow('\nCancelling...'));
      session.cancel();
    };

    let outcome: TurnOutcome;
    try {
      await session.connect();
      process.on('SIGINT', onInterrupt);
      outcome = await session.sendTurn(message, providerIds);
    } catch (error) {
      spinner?.fail('Chat failed');
      console.error(chalk.red(`\nError: ${describeError(error)}`));
      process.exit(1);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
    spinner?.stop();
    await session.close();

    if (!pretty) {
      console.log(formatOutput({ conversationId, providerIds, outcome, text, toolCalls }, 'json'));
    } else {
      if (text.length > 0) {
        process.stdout.write('\n');
      }
      printOutcome(outcome, conversationId);
    }

    if (outcome.status === 'error') {
      process.exit(1);
    }
  });

function printOutcome(outcome: TurnOutcome, conversationId: string): void {
  switch (outcome.status) {
    case 'complete':
      console.log(chalk.gray(`\nConversation: ${conversationId}`));
      return;
    case 'cancelled':
      console.log(chalk.yellow('\nCancelled'));
      return;
    case 'error':
      console.error(
        chalk.red(`\nError: ${outcome.message}`) + (outcome.retryable ? chalk.gray(' (retrying may help)') : '')
      );
      return;
  }
}
