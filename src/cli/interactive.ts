/**
 * Interactive CLI Mode (REPL)
 *
 * Chat with the engine in a terminal. Tab completes from the vocabulary,
 * lines starting with "." are shell commands.
 *
 * @module cli/interactive
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { ConversationEngine } from '../core/ConversationEngine.js';
import type { ConversationReply } from '../types/index.js';
import type { GlobalOptions } from './options.js';

interface InteractiveContext {
  engine: ConversationEngine;
  options: GlobalOptions;
  sessionId: string;
  history: string[];
}

export const DOT_COMMANDS = ['.help', '.reset', '.history', '.suggest', '.exit'];

const HISTORY_DISPLAY_LIMIT = 20;

/**
 * Tab completion: dot commands for lines starting with ".", vocabulary
 * phrases otherwise.
 */
export function createCompleter(engine: ConversationEngine): (line: string) => [string[], string] {
  return (line: string) => {
    const hits = line.startsWith('.')
      ? DOT_COMMANDS.filter(c => c.startsWith(line.toLowerCase()))
      : engine.getSuggestions(line);
    return [hits, line];
  };
}

export function startInteractiveMode(
  engine: ConversationEngine,
  options: GlobalOptions,
  sessionId: string
): Promise<void> {
  const ictx: InteractiveContext = { engine, options, sessionId, history: [] };
  let closed = false;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.cyan('you> '),
    completer: createCompleter(engine),
  });

  console.log(chalk.green('SupportFlow Interactive Chat'));
  console.log(chalk.gray('Type ".help" for commands, ".exit" to quit.\n'));
  console.log(engine.dialogue.root.prompt);

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    if (!trimmed) {
      rl.prompt();
      return;
    }

    processLine(trimmed, ictx, rl)
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`Error: ${message}`));
      })
      .finally(() => {
        if (!closed) rl.prompt();
      });
  });

  return new Promise(resolve => {
    rl.on('close', () => {
      closed = true;
      console.log(chalk.gray('\nGoodbye!'));
      resolve();
    });
  });
}

async function processLine(
  input: string,
  ictx: InteractiveContext,
  rl: readline.Interface
): Promise<void> {
  if (!input.startsWith('.')) {
    ictx.history.push(input);
    const reply = await ictx.engine.handleMessage(ictx.sessionId, input);
    printReply(reply, ictx.options);
    return;
  }

  const [command, ...args] = input.split(/\s+/);

  switch (command.toLowerCase()) {
    case '.help':
      showHelp();
      break;

    case '.exit':
    case '.quit':
      rl.close();
      break;

    case '.reset':
      await ictx.engine.handleReset(ictx.sessionId);
      console.log(chalk.green('Conversation reset.'));
      console.log(ictx.engine.dialogue.root.prompt);
      break;

    case '.history': {
      if (ictx.history.length === 0) {
        console.log(chalk.yellow('No messages yet.'));
        break;
      }
      console.log('\nMessage history:');
      ictx.history.slice(-HISTORY_DISPLAY_LIMIT).forEach((msg, i) => {
        console.log(`  ${i + 1}. ${msg}`);
      });
      break;
    }

    case '.suggest': {
      const prefix = args.join(' ');
      if (!prefix) {
        console.log(chalk.yellow('Usage: .suggest <prefix>'));
        break;
      }
      const completions = ictx.engine.getSuggestions(prefix);
      if (completions.length === 0) {
        console.log(chalk.yellow(`No completions for "${prefix}"`));
        break;
      }
      for (const phrase of completions) {
        console.log(`  ${chalk.cyan(phrase)}`);
      }
      break;
    }

    default:
      console.log(chalk.yellow(`Unknown command: ${command}. Type ".help" for available commands.`));
  }
}

function printReply(reply: ConversationReply, options: GlobalOptions): void {
  if (options.format === 'json') {
    console.log(JSON.stringify(reply, null, 2));
    return;
  }
  console.log(`\n${reply.replyText}\n`);
  if (options.verbose) {
    console.log(chalk.gray(`[${reply.kind}] node=${reply.currentNodeId} history=${reply.historySize}`));
  }
}

function showHelp(): void {
  console.log(`
${chalk.green('Available Commands:')}

  ${chalk.cyan('<message>')}          Send a message to the assistant
  ${chalk.cyan('.suggest <prefix>')}  Show completions for a prefix
  ${chalk.cyan('.reset')}             Return to the main menu
  ${chalk.cyan('.history')}           Show messages sent so far
  ${chalk.cyan('.help')}              Show this help
  ${chalk.cyan('.exit')}              Exit interactive mode

${chalk.gray('Tab completes phrases; "back" and "menu" navigate the conversation.')}
`);
}
