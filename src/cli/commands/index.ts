/**
 * CLI Command Registry
 *
 * Registers all command categories with the main program.
 *
 * @module cli/commands
 */

import { Command } from 'commander';
import { registerLookupCommands } from './lookup.js';
import { registerConversationCommands } from './conversation.js';
import { registerContentCommands } from './content.js';

export function registerCommands(program: Command): void {
  // ==================== Lookup Commands ====================
  registerLookupCommands(program);

  // ==================== Conversation Commands ====================
  registerConversationCommands(program);

  // ==================== Content Commands ====================
  registerContentCommands(program);
}
