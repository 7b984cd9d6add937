/**
 * Engine Factory
 *
 * Builds a ConversationEngine from an engine content document. All
 * validation happens here, before any session traffic is served.
 *
 * Content sources, in order of precedence:
 * - an explicit file path
 * - the SUPPORTFLOW_CONFIG environment variable
 * - the bundled data/default-engine.json
 *
 * @module core/EngineFactory
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { DialogueWarning, DirectAnswerProvider, EngineSettings } from '../types/index.js';
import { PrefixIndex } from './PrefixIndex.js';
import { SynonymResolver } from './SynonymResolver.js';
import { DialogueGraph } from './DialogueGraph.js';
import { SuggestionGraph } from './SuggestionGraph.js';
import { SessionStore } from './SessionStore.js';
import { ConversationEngine } from './ConversationEngine.js';
import { FaqDirectory } from '../features/FaqDirectory.js';
import {
  EngineConfigSchema,
  validateWithSchema,
  type EngineConfig,
  type EngineConfigInput,
} from '../utils/schemas.js';
import { ENV_VARS, getEngineSettings } from '../utils/constants.js';
import { ConfigLoadError, ValidationError } from '../utils/errors.js';
import { normalizePhrase } from '../utils/text.js';
import { logger } from '../utils/logger.js';

/**
 * Bundled default content, resolved relative to this module so it works
 * from both src/ and dist/.
 */
export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('../../data/default-engine.json', import.meta.url)
);

export interface EngineFactoryOptions {
  /** Replaces the FaqDirectory built from the `faqs` section */
  directAnswers?: DirectAnswerProvider;
  /** Clock for the session store, replaceable in tests */
  now?: () => Date;
}

export interface EngineBuildReport {
  engine: ConversationEngine;
  settings: EngineSettings;
  warnings: DialogueWarning[];
}

/**
 * Pick the content file: explicit path, then SUPPORTFLOW_CONFIG, then the
 * bundled default.
 */
export function resolveConfigPath(explicitPath?: string): string {
  return explicitPath || process.env[ENV_VARS.CONFIG_PATH] || DEFAULT_CONFIG_PATH;
}

/**
 * Read, parse and validate a content file.
 *
 * @throws ConfigLoadError if the file can't be read or isn't JSON
 * @throws ValidationError if the document doesn't match the schema
 */
export function loadEngineConfig(filePath: string): EngineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigLoadError(filePath, error instanceof Error ? error : undefined);
  }
  return validateWithSchema(raw, EngineConfigSchema, `Invalid engine config: ${filePath}`);
}

/**
 * Build an engine and report the non-fatal problems found on the way.
 *
 * @throws ValidationError or DialogueConfigError for content that cannot
 * be served, including vocabulary phrases too short to ever be completed
 */
export function createEngineWithReport(
  input: EngineConfigInput,
  options: EngineFactoryOptions = {}
): EngineBuildReport {
  const config = validateWithSchema(input, EngineConfigSchema, 'Invalid engine config');
  const settings = getEngineSettings(config.settings);

  const unreachable = config.vocabulary.filter(
    phrase => normalizePhrase(phrase).length < settings.minPrefixLength
  );
  if (unreachable.length > 0) {
    throw new ValidationError(
      'Invalid engine config',
      unreachable.map(
        phrase => `vocabulary: "${phrase}" is shorter than the minimum prefix length ${settings.minPrefixLength}`
      )
    );
  }

  const prefixIndex = new PrefixIndex({ minPrefixLength: settings.minPrefixLength });
  prefixIndex.insertAll(config.vocabulary);

  const synonyms = new SynonymResolver();
  for (const group of config.synonymGroups) {
    synonyms.seedGroup(group);
  }

  const dialogue = DialogueGraph.fromDefinitions(config.dialogue.nodes, config.dialogue.rootId);

  const suggestionGraph = new SuggestionGraph();
  suggestionGraph.addEdges(config.suggestions);

  const warnings: DialogueWarning[] = [...dialogue.warnings];
  for (const nodeId of suggestionGraph.nodeIds()) {
    if (!dialogue.has(nodeId)) {
      warnings.push({
        kind: 'unknown_suggestion_node',
        nodeId,
        detail: `suggestion graph references unknown dialogue node "${nodeId}"`,
      });
    }
  }
  for (const warning of warnings) {
    logger.warn(`Engine config: ${warning.detail}`);
  }

  const sessions = new SessionStore({
    rootId: dialogue.rootId,
    historyMaxDepth: settings.historyMaxDepth,
    now: options.now,
  });

  const engine = new ConversationEngine({
    prefixIndex,
    synonyms,
    dialogue,
    suggestionGraph,
    directAnswers: options.directAnswers ?? new FaqDirectory(config.faqs),
    sessions,
    settings,
  });

  logger.debug('Engine built', engine.getStats());
  return { engine, settings, warnings };
}

/**
 * Build an engine from a content document.
 *
 * @example
 * ```typescript
 * const engine = createEngine({
 *   vocabulary: ['order', 'orders'],
 *   dialogue: {
 *     nodes: [
 *       { id: 'root', prompt: 'Main menu', options: [{ keyword: 'orders', target: 'orders_menu' }] },
 *       { id: 'orders_menu', prompt: 'Orders', isLeaf: true },
 *     ],
 *   },
 * });
 * ```
 */
export function createEngine(
  input: EngineConfigInput,
  options: EngineFactoryOptions = {}
): ConversationEngine {
  return createEngineWithReport(input, options).engine;
}

/**
 * Build an engine from a content file (see resolveConfigPath).
 */
export function createEngineFromFile(
  filePath?: string,
  options: EngineFactoryOptions = {}
): ConversationEngine {
  return createEngine(loadEngineConfig(resolveConfigPath(filePath)), options);
}
