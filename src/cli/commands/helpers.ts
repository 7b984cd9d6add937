/**
 * CLI Command Helpers
 *
 * Shared utilities for all command files.
 *
 * @module cli/commands/helpers
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  createEngineWithReport,
  loadEngineConfig,
  resolveConfigPath,
  type EngineBuildReport,
} from '../../core/EngineFactory.js';
import { SupportFlowError } from '../../utils/errors.js';
import { parseGlobalOptions, createLogger, type CliLogger, type GlobalOptions } from '../options.js';
import { findConfigFile, loadConfig, mergeConfig } from '../config.js';
import { formatError } from '../formatters.js';

export interface LoadedEngine extends EngineBuildReport {
  configPath: string;
}

/**
 * Get merged options from config file and CLI.
 */
export function getOptions(program: Command): GlobalOptions {
  const cliOpts = parseGlobalOptions(program.opts());
  const configPath = findConfigFile();
  const fileConfig = configPath ? loadConfig(configPath) : {};
  return mergeConfig(fileConfig, cliOpts);
}

/**
 * Route the engine's own logger through the CLI flags.
 */
export function applyLogLevel(options: GlobalOptions): void {
  if (options.verbose) {
    process.env.LOG_LEVEL = 'debug';
  } else if (options.quiet) {
    process.env.LOG_LEVEL = 'silent';
  }
}

/**
 * Build the engine from `filePath`, `--config`, SUPPORTFLOW_CONFIG or the
 * bundled content, in that order.
 */
export function loadEngine(options: GlobalOptions, filePath?: string): LoadedEngine {
  const configPath = resolveConfigPath(filePath ?? options.config);
  const report = createEngineWithReport(loadEngineConfig(configPath));
  return { ...report, configPath };
}

/**
 * Commander value parser for positive integer options.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Wrap a command action with standard error handling.
 */
export function withErrorHandling<A extends unknown[]>(
  program: Command,
  fn: (options: GlobalOptions, logger: CliLogger, ...args: A) => Promise<void> | void
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    let options: GlobalOptions | undefined;
    try {
      options = getOptions(program);
      applyLogLevel(options);
      await fn(options, createLogger(options), ...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${formatError(message)}`);
      if (options?.verbose && error instanceof SupportFlowError) {
        console.error(error.getDetailedMessage());
      }
      process.exit(1);
    }
  };
}

export { createLogger, type GlobalOptions };
