/**
 * Content CLI Commands
 *
 * Validate engine content files and report what was loaded.
 *
 * @module cli/commands/content
 */

import { Command } from 'commander';
import { loadEngine, withErrorHandling } from './helpers.js';
import { formatStats, formatSuccess, formatValidation } from '../formatters.js';

export function registerContentCommands(program: Command): void {
  program
    .command('validate [file]')
    .description('Load and validate an engine content file')
    .action(withErrorHandling(program, (options, logger, file: string | undefined) => {
      const { engine, warnings, configPath } = loadEngine(options, file);
      logger.info(formatSuccess(`Loaded ${configPath}`));
      console.log(formatValidation(configPath, engine.getStats(), warnings, options.format));
    }));

  program
    .command('stats')
    .description('Show engine statistics')
    .action(withErrorHandling(program, (options) => {
      const { engine } = loadEngine(options);
      console.log(formatStats(engine.getStats(), options.format));
    }));
}
