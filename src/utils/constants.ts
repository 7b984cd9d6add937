/**
 * Application Constants
 *
 * Centralized defaults, reserved commands, reply templates and
 * environment-driven settings.
 *
 * @module utils/constants
 */

import type { EngineSettings } from '../types/index.js';

/**
 * Default engine settings. Configuration files and environment
 * variables override these values.
 */
export const DEFAULT_SETTINGS: Readonly<EngineSettings> = {
  /** Prefixes shorter than this never produce completions */
  minPrefixLength: 2,
  /** Maximum completions returned by getSuggestions */
  completionLimit: 8,
  /** Maximum depth of each session's navigation history */
  historyMaxDepth: 10,
  /** Number of ranked next actions attached to a reply */
  suggestionTopK: 3,
};

/**
 * Default root node id for dialogue graphs that don't name one.
 */
export const DEFAULT_ROOT_ID = 'root';

/**
 * Environment variable names used for configuration.
 */
export const ENV_VARS = {
  /** Path to the engine content file */
  CONFIG_PATH: 'SUPPORTFLOW_CONFIG',
  /** Overrides settings.historyMaxDepth */
  HISTORY_DEPTH: 'SUPPORTFLOW_HISTORY_DEPTH',
  /** Overrides settings.suggestionTopK */
  TOP_K: 'SUPPORTFLOW_TOP_K',
  /** Overrides settings.completionLimit */
  COMPLETION_LIMIT: 'SUPPORTFLOW_COMPLETION_LIMIT',
} as const;

/**
 * Reserved commands handled before keyword matching.
 * Compared against trimmed, lowercased input.
 */
export const RESET_COMMANDS: readonly string[] = ['menu', 'main menu', 'start over'];
export const BACK_COMMANDS: readonly string[] = ['back', 'go back', 'previous', 'undo'];

/**
 * Reply texts produced by the engine itself (dialogue prompts come from
 * configuration).
 */
export const REPLY_TEXT = {
  EMPTY_INPUT: 'Please enter a message.',
  NOT_UNDERSTOOD: "Sorry, I didn't understand that.",
  ALREADY_AT_ROOT: "You're already at the main menu.",
  GOING_BACK: 'Going back...',
  RETURNING_TO_MENU: 'Returning to main menu...',
  QUICK_ACTIONS_HEADER: 'Quick actions:',
} as const;

/**
 * Parse a positive integer from an environment variable.
 * Unset, non-numeric or non-positive values yield undefined.
 */
function readPositiveInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Resolve effective engine settings.
 *
 * Precedence: environment variables, then the given overrides (usually the
 * `settings` block of a config file), then DEFAULT_SETTINGS.
 *
 * @example
 * ```typescript
 * // SUPPORTFLOW_TOP_K=5
 * getEngineSettings({ suggestionTopK: 2 }).suggestionTopK; // 5
 * ```
 */
export function getEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    minPrefixLength: overrides.minPrefixLength ?? DEFAULT_SETTINGS.minPrefixLength,
    completionLimit:
      readPositiveInt(ENV_VARS.COMPLETION_LIMIT) ??
      overrides.completionLimit ??
      DEFAULT_SETTINGS.completionLimit,
    historyMaxDepth:
      readPositiveInt(ENV_VARS.HISTORY_DEPTH) ??
      overrides.historyMaxDepth ??
      DEFAULT_SETTINGS.historyMaxDepth,
    suggestionTopK:
      readPositiveInt(ENV_VARS.TOP_K) ??
      overrides.suggestionTopK ??
      DEFAULT_SETTINGS.suggestionTopK,
  };
}
