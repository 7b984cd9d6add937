/**
 * Types Module - Barrel Export
 *
 * Central export point for all type definitions used throughout the
 * engine. All types are consolidated in types.ts.
 *
 * @example
 * ```typescript
 * import type { DialogueNode, ConversationReply } from './types/index.js';
 * ```
 */

export type {
  // Settings
  EngineSettings,
  // Dialogue types
  DialogueOption,
  DialogueNode,
  DialogueNodeDefinition,
  DialogueWarning,
  // Suggestion types
  SuggestionEdge,
  RankedSuggestion,
  // Session types
  SessionSnapshot,
  // Turn results
  AdvanceKind,
  AdvanceResult,
  ReplyKind,
  ConversationReply,
  IntentResolution,
  // Collaborators
  DirectAnswerProvider,
  FaqEntry,
  FaqMatch,
  // Statistics
  EngineStats,
} from './types.js';
