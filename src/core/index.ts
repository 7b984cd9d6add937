/**
 * Core Module Barrel Export
 */

// Data structures
export { PrefixIndex, type PrefixIndexOptions } from './PrefixIndex.js';
export { SynonymResolver } from './SynonymResolver.js';
export { NavigationHistory } from './NavigationHistory.js';
export { SuggestionGraph } from './SuggestionGraph.js';

// Dialogue
export { DialogueGraph } from './DialogueGraph.js';
export {
  DialogueStateMachine,
  parseReservedCommand,
  type ReservedCommand,
} from './DialogueStateMachine.js';

// Sessions
export {
  SessionStore,
  type SessionState,
  type SessionStoreOptions,
} from './SessionStore.js';

// Engine
export { ConversationEngine, type ConversationEngineComponents } from './ConversationEngine.js';
export {
  DEFAULT_CONFIG_PATH,
  resolveConfigPath,
  loadEngineConfig,
  createEngine,
  createEngineWithReport,
  createEngineFromFile,
  type EngineFactoryOptions,
  type EngineBuildReport,
} from './EngineFactory.js';
