#!/usr/bin/env node
/**
 * SupportFlow CLI
 *
 * Command-line interface for the conversation engine: completions,
 * intent lookups, scripted and interactive conversations, content
 * validation.
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerCommands } from './commands/index.js';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

// Get package version
function getVersion(): string {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    // package.json sits two levels up from both src/cli and dist/cli
    const pkgPath = join(__dirname, '..', '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('supportflow')
  .description('SupportFlow - deterministic support conversation engine')
  .version(getVersion(), '-v, --version', 'Output the current version');

// Global options
program
  .option('-c, --config <path>', 'Engine content file (JSON)')
  .option('-f, --format <type>', 'Output format (json|table|csv)')
  .option('-q, --quiet', 'Suppress non-essential output')
  .option('--verbose', 'Enable verbose/debug output');

// Register all commands
registerCommands(program);

// Parse and execute
await program.parseAsync();
