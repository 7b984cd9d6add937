/**
 * CLI Global Options
 *
 * Shared options and context for all CLI commands.
 *
 * @module cli/options
 */

import { ValidationError } from '../utils/errors.js';

export type OutputFormat = 'json' | 'table' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

export interface GlobalOptions {
  /** Engine content file; unset means SUPPORTFLOW_CONFIG or the bundled default */
  config?: string;
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

const envFormat = process.env.SUPPORTFLOW_OUTPUT_FORMAT;

export const defaultOptions: GlobalOptions = {
  format: isOutputFormat(envFormat) ? envFormat : 'json',
  quiet: false,
  verbose: false,
};

/**
 * Parse and validate global options from commander.
 * Only flags that were actually given are returned, so a config file can
 * fill in the rest.
 *
 * @throws ValidationError for an unknown output format
 */
export function parseGlobalOptions(opts: Record<string, unknown>): Partial<GlobalOptions> {
  const parsed: Partial<GlobalOptions> = {};

  if (opts.format !== undefined) {
    if (!isOutputFormat(opts.format)) {
      throw new ValidationError(`Invalid format: ${String(opts.format)}. Use json, table, or csv.`, [
        `format must be one of ${OUTPUT_FORMATS.join(', ')}`,
      ]);
    }
    parsed.format = opts.format;
  }

  if (typeof opts.config === 'string' && opts.config !== '') {
    parsed.config = opts.config;
  }
  if (opts.quiet === true) {
    parsed.quiet = true;
  }
  if (opts.verbose === true) {
    parsed.verbose = true;
  }

  return parsed;
}

export interface CliLogger {
  info: (msg: string) => void;
  debug: (msg: string) => void;
  error: (msg: string) => void;
  warn: (msg: string) => void;
}

/**
 * Logging utilities that respect quiet/verbose flags.
 */
export function createLogger(options: GlobalOptions): CliLogger {
  return {
    info: (msg: string) => {
      if (!options.quiet) console.log(msg);
    },
    debug: (msg: string) => {
      if (options.verbose) console.log(`[DEBUG] ${msg}`);
    },
    error: (msg: string) => console.error(`[ERROR] ${msg}`),
    warn: (msg: string) => {
      if (!options.quiet) console.warn(`[WARN] ${msg}`);
    },
  };
}
