/**
 * CLI Configuration File Support
 *
 * Load configuration from .supportflowrc or supportflow.config.json.
 *
 * @module cli/config
 */

import { existsSync, readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { defaultOptions, isOutputFormat, type GlobalOptions } from './options.js';
import { logger } from '../utils/logger.js';

const CONFIG_FILES = [
  '.supportflowrc',
  '.supportflowrc.json',
  'supportflow.config.json',
];

/**
 * Search for config file starting from cwd and moving up.
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;
  const root = resolve('/');

  while (currentDir !== root) {
    for (const filename of CONFIG_FILES) {
      const configPath = resolve(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break; // Reached root
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load configuration from file. A `config` entry is resolved against the
 * directory of the file that names it.
 */
export function loadConfig(configPath: string): Partial<GlobalOptions> {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const config: unknown = JSON.parse(content);
    return validateConfig(config, dirname(configPath));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Failed to load CLI config from ${configPath}: ${reason}`);
    return {};
  }
}

/**
 * Validate and sanitize config values. Invalid entries are dropped.
 */
function validateConfig(config: unknown, baseDir: string): Partial<GlobalOptions> {
  const validated: Partial<GlobalOptions> = {};
  if (typeof config !== 'object' || config === null) {
    return validated;
  }

  if ('config' in config && typeof config.config === 'string' && config.config !== '') {
    validated.config = resolve(baseDir, config.config);
  }

  if ('format' in config && isOutputFormat(config.format)) {
    validated.format = config.format;
  }

  if ('quiet' in config && typeof config.quiet === 'boolean') {
    validated.quiet = config.quiet;
  }

  if ('verbose' in config && typeof config.verbose === 'boolean') {
    validated.verbose = config.verbose;
  }

  return validated;
}

/**
 * Merge config file with CLI options. CLI takes precedence.
 */
export function mergeConfig(
  fileConfig: Partial<GlobalOptions>,
  cliOptions: Partial<GlobalOptions>
): GlobalOptions {
  return {
    config: cliOptions.config ?? fileConfig.config,
    format: cliOptions.format ?? fileConfig.format ?? defaultOptions.format,
    quiet: cliOptions.quiet ?? fileConfig.quiet ?? defaultOptions.quiet,
    verbose: cliOptions.verbose ?? fileConfig.verbose ?? defaultOptions.verbose,
  };
}
