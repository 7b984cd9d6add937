/**
 * Conversation CLI Commands
 *
 * @module cli/commands/conversation
 */

import { Command } from 'commander';
import { loadEngine, withErrorHandling } from './helpers.js';
import { formatTurns, type TurnRecord } from '../formatters.js';
import { startInteractiveMode } from '../interactive.js';

export const DEFAULT_CLI_SESSION = 'cli';

export function registerConversationCommands(program: Command): void {
  program
    .command('ask <messages...>')
    .description('Send messages as consecutive turns of one session')
    .option('-s, --session <id>', 'Session id', DEFAULT_CLI_SESSION)
    .action(withErrorHandling(program, async (options, logger, messages: string[], opts: Record<string, unknown>) => {
      const { engine } = loadEngine(options);
      const sessionId = typeof opts.session === 'string' ? opts.session : DEFAULT_CLI_SESSION;

      const turns: TurnRecord[] = [];
      for (const message of messages) {
        const reply = await engine.handleMessage(sessionId, message);
        logger.debug(`${message} -> ${reply.kind} (${reply.currentNodeId})`);
        turns.push({ message, reply });
      }

      console.log(formatTurns(turns, options.format));
    }));

  program
    .command('chat')
    .alias('i')
    .description('Start an interactive conversation')
    .option('-s, --session <id>', 'Session id', DEFAULT_CLI_SESSION)
    .action(withErrorHandling(program, async (options, _logger, opts: Record<string, unknown>) => {
      const { engine } = loadEngine(options);
      const sessionId = typeof opts.session === 'string' ? opts.session : DEFAULT_CLI_SESSION;
      await startInteractiveMode(engine, options, sessionId);
    }));
}
