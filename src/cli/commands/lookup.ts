/**
 * Lookup CLI Commands
 *
 * Read-only queries against the loaded engine: completions, intents and
 * ranked next actions.
 *
 * @module cli/commands/lookup
 */

import { Command } from 'commander';
import { loadEngine, parsePositiveInt, withErrorHandling } from './helpers.js';
import { formatCompletions, formatIntent, formatNextActions } from '../formatters.js';

export function registerLookupCommands(program: Command): void {
  program
    .command('suggest <prefix>')
    .description('Auto-complete a partially typed phrase')
    .option('-l, --limit <n>', 'Maximum completions', parsePositiveInt)
    .action(withErrorHandling(program, (options, logger, prefix: string, opts: Record<string, unknown>) => {
      const { engine } = loadEngine(options);
      const limit = typeof opts.limit === 'number' ? opts.limit : engine.settings.completionLimit;
      logger.debug(`Completing "${prefix}" (limit ${limit})`);
      console.log(formatCompletions(prefix, engine.prefixIndex.suggestions(prefix, limit), options.format));
    }));

  program
    .command('intent <text>')
    .description('Show the canonical intent of a phrase')
    .action(withErrorHandling(program, (options, _logger, text: string) => {
      const { engine } = loadEngine(options);
      console.log(formatIntent(engine.normalizeIntent(text), options.format));
    }));

  program
    .command('next <nodeId>')
    .description('Rank the next actions offered at a dialogue node')
    .option('-k, --top <n>', 'Number of actions', parsePositiveInt)
    .action(withErrorHandling(program, (options, _logger, nodeId: string, opts: Record<string, unknown>) => {
      const { engine } = loadEngine(options);
      engine.dialogue.requireNode(nodeId);
      const topK = typeof opts.top === 'number' ? opts.top : undefined;
      console.log(formatNextActions(nodeId, engine.getNextActions(nodeId, topK), options.format));
    }));
}
