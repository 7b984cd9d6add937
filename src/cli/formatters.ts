/**
 * CLI Output Formatters
 *
 * Format engine results for JSON, table, or CSV output.
 *
 * @module cli/formatters
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import type {
  ConversationReply,
  DialogueWarning,
  EngineStats,
  IntentResolution,
  RankedSuggestion,
} from '../types/index.js';
import type { OutputFormat } from './options.js';

export type { OutputFormat };

/** One processed message of an `ask` run. */
export interface TurnRecord {
  message: string;
  reply: ConversationReply;
}

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stdout.columns || 80;
}

/**
 * Format auto-complete phrases.
 */
export function formatCompletions(
  prefix: string,
  completions: string[],
  format: OutputFormat
): string {
  if (completions.length === 0) {
    return format === 'json' ? '[]' : `No completions for "${prefix}".`;
  }

  switch (format) {
    case 'json':
      return JSON.stringify(completions, null, 2);

    case 'table': {
      const table = new Table({
        head: [chalk.cyan('#'), chalk.cyan('Completion')],
        colWidths: calculateColWidths(getTerminalWidth(), [0.1, 0.9]),
      });
      completions.forEach((phrase, i) => {
        table.push([String(i + 1), phrase]);
      });
      return table.toString();
    }

    case 'csv': {
      const rows = completions.map((phrase, i) => `${i + 1},${escapeCSV(phrase)}`);
      return ['rank,completion', ...rows].join('\n');
    }
  }
}

/**
 * Format ranked next actions for a node.
 */
export function formatNextActions(
  nodeId: string,
  actions: RankedSuggestion[],
  format: OutputFormat
): string {
  if (actions.length === 0) {
    return format === 'json' ? '[]' : `No next actions for "${nodeId}".`;
  }

  switch (format) {
    case 'json':
      return JSON.stringify(actions, null, 2);

    case 'table': {
      const table = new Table({
        head: [chalk.cyan('#'), chalk.cyan('Label'), chalk.cyan('Target'), chalk.cyan('Weight')],
        colWidths: calculateColWidths(getTerminalWidth(), [0.1, 0.4, 0.3, 0.2]),
      });
      actions.forEach((action, i) => {
        table.push([String(i + 1), action.label, action.target, action.weight.toFixed(2)]);
      });
      return table.toString();
    }

    case 'csv': {
      const rows = actions.map((a, i) =>
        `${i + 1},${escapeCSV(a.label)},${escapeCSV(a.target)},${a.weight}`
      );
      return ['rank,label,target,weight', ...rows].join('\n');
    }
  }
}

/**
 * Format the replies of consecutive turns.
 */
export function formatTurns(turns: TurnRecord[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(turns, null, 2);

    case 'table': {
      const blocks = turns.map(({ message, reply }) => [
        `${chalk.bold('You:')} ${message}`,
        `${chalk.bold('Bot:')} ${reply.replyText}`,
        chalk.gray(`[${reply.kind}] node=${reply.currentNodeId} history=${reply.historySize}`),
      ].join('\n'));
      return blocks.join('\n\n');
    }

    case 'csv': {
      const header = 'turn,message,kind,node,isLeaf,historySize,reply';
      const rows = turns.map(({ message, reply }, i) => [
        String(i + 1),
        escapeCSV(message),
        reply.kind,
        escapeCSV(reply.currentNodeId),
        String(reply.isLeaf),
        String(reply.historySize),
        escapeCSV(reply.replyText),
      ].join(','));
      return [header, ...rows].join('\n');
    }
  }
}

/**
 * Format a canonical intent lookup.
 */
export function formatIntent(resolution: IntentResolution, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(resolution, null, 2);

    case 'table':
      return [
        `${chalk.bold('Input:')} ${resolution.original}`,
        `${chalk.bold('Canonical:')} ${resolution.canonical ?? 'None'}`,
        `${chalk.bold('Matched:')} ${resolution.matchedPhrase ?? 'None'}`,
      ].join('\n');

    case 'csv':
      return [
        'input,canonical,matched',
        [
          escapeCSV(resolution.original),
          escapeCSV(resolution.canonical ?? ''),
          escapeCSV(resolution.matchedPhrase ?? ''),
        ].join(','),
      ].join('\n');
  }
}

const STAT_LABELS: ReadonlyArray<[keyof EngineStats, string]> = [
  ['vocabularySize', 'Vocabulary phrases'],
  ['synonymPhrases', 'Synonym phrases'],
  ['synonymGroups', 'Synonym groups'],
  ['dialogueNodes', 'Dialogue nodes'],
  ['suggestionEdges', 'Suggestion edges'],
  ['directAnswers', 'Direct answers'],
  ['activeSessions', 'Active sessions'],
];

/**
 * Format engine statistics.
 */
export function formatStats(stats: EngineStats, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(stats, null, 2);

    case 'table': {
      const table = new Table({
        head: [chalk.cyan('Metric'), chalk.cyan('Value')],
      });
      for (const [key, label] of STAT_LABELS) {
        table.push([label, String(stats[key])]);
      }
      return table.toString();
    }

    case 'csv':
      return ['metric,value', ...STAT_LABELS.map(([key]) => `${key},${stats[key]}`)].join('\n');
  }
}

/**
 * Format the result of validating a content file.
 */
export function formatValidation(
  filePath: string,
  stats: EngineStats,
  warnings: DialogueWarning[],
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return JSON.stringify({ file: filePath, valid: true, stats, warnings }, null, 2);

    case 'csv': {
      const rows = warnings.map(w =>
        `${escapeCSV(w.kind)},${escapeCSV(w.nodeId)},${escapeCSV(w.detail)}`
      );
      return ['kind,nodeId,detail', ...rows].join('\n');
    }

    case 'table': {
      const lines = [
        `Engine config: ${chalk.green('VALID')} ${filePath}`,
        `  Dialogue nodes: ${stats.dialogueNodes}`,
        `  Vocabulary phrases: ${stats.vocabularySize}`,
        `  Suggestion edges: ${stats.suggestionEdges}`,
        `  Warnings: ${warnings.length}`,
      ];
      if (warnings.length > 0) {
        lines.push('', chalk.yellow('Warnings:'));
        for (const w of warnings) {
          lines.push(`  [${w.kind}] ${w.detail}`);
        }
      }
      return lines.join('\n');
    }
  }
}

/**
 * Format a success message.
 */
export function formatSuccess(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

/**
 * Format an error message.
 */
export function formatError(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

export function calculateColWidths(totalWidth: number, ratios: number[]): number[] {
  const padding = 4; // Account for table borders
  const available = totalWidth - padding;
  return ratios.map(r => Math.max(10, Math.floor(available * r)));
}

export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
