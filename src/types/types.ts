/**
 * Type Definitions
 *
 * Consolidated type definitions for the SupportFlow engine.
 * Combines dialogue, suggestion, session, reply and collaborator types.
 *
 * @module types
 */

// ==================== Settings ====================

/**
 * Tunable limits of the engine. See DEFAULT_SETTINGS for default values.
 */
export interface EngineSettings {
  /** Prefixes shorter than this never produce completions */
  minPrefixLength: number;

  /** Maximum number of completions returned for a prefix */
  completionLimit: number;

  /** Maximum depth of each session's navigation history */
  historyMaxDepth: number;

  /** Number of ranked next actions attached to a reply */
  suggestionTopK: number;
}

// ==================== Dialogue Types ====================

/**
 * One keyword-triggered transition out of a dialogue node.
 */
export interface DialogueOption {
  /** Lowercase keyword compared with the user's input by containment */
  readonly keyword: string;

  /** Id of the node this option leads to */
  readonly target: string;
}

/**
 * One state of the conversation.
 *
 * Options are ordered: the first matching option wins.
 *
 * @example
 * ```typescript
 * const node: DialogueNode = {
 *   id: 'orders_menu',
 *   prompt: 'Track, cancel or modify an order?',
 *   options: [
 *     { keyword: 'track', target: 'order_track' },
 *     { keyword: 'cancel', target: 'order_cancel' },
 *   ],
 *   isLeaf: false,
 * };
 * ```
 */
export interface DialogueNode {
  readonly id: string;
  readonly prompt: string;
  readonly options: ReadonlyArray<DialogueOption>;
  readonly isLeaf: boolean;
}

/**
 * Input shape for building a DialogueGraph. `isLeaf` defaults to false.
 */
export interface DialogueNodeDefinition {
  id: string;
  prompt: string;
  options: DialogueOption[];
  isLeaf?: boolean;
}

/**
 * Non-fatal problems found while loading dialogue content.
 */
export interface DialogueWarning {
  kind: 'dangling_target' | 'unreachable_node' | 'unknown_suggestion_node';
  nodeId: string;
  detail: string;
}

// ==================== Suggestion Types ====================

/**
 * Weighted directed edge proposing a next action.
 */
export interface SuggestionEdge {
  source: string;
  target: string;
  /** Any finite real; higher ranks first */
  weight: number;
  /** Display label of the action */
  label: string;
}

/**
 * A ranked next action as returned by SuggestionGraph.suggestions().
 */
export interface RankedSuggestion {
  label: string;
  target: string;
  weight: number;
}

// ==================== Session Types ====================

/**
 * Read-only copy of one session's state.
 */
export interface SessionSnapshot {
  sessionId: string;
  currentNodeId: string;
  /** Node ids the session left, bottom (oldest) to top (newest) */
  history: string[];
  turnCount: number;
  createdAt: string;
  lastActiveAt: string;
}

// ==================== Turn Results ====================

/**
 * Outcome of one state machine step.
 *
 * - `transition`: an option matched and the session moved
 * - `no_match`: nothing matched (or the target was dangling); state unchanged
 * - `back`: the session returned to the previous node
 * - `at_root`: back was requested at the main menu; state unchanged
 * - `reset`: the session returned to the root and history was cleared
 */
export type AdvanceKind = 'transition' | 'no_match' | 'back' | 'at_root' | 'reset';

export interface AdvanceResult {
  kind: AdvanceKind;
  /** Prompt text, prefixed with a notice for no_match, back and reset */
  text: string;
  /** Node the session is on after the step */
  nodeId: string;
  /** Node the session was on before the step */
  previousNodeId: string;
}

/**
 * Every kind of reply the engine produces.
 */
export type ReplyKind = AdvanceKind | 'direct_answer' | 'empty';

/**
 * Reply to one submitted message.
 */
export interface ConversationReply {
  kind: ReplyKind;
  replyText: string;
  currentNodeId: string;
  isLeaf: boolean;
  suggestions: RankedSuggestion[];
  /** Canonical intent the message resolved to, if any */
  canonicalIntent: string | null;
  historySize: number;
}

/**
 * Result of canonicalizing a message through the synonym resolver.
 */
export interface IntentResolution {
  original: string;
  /** Canonical intent, or null when no known phrase was found */
  canonical: string | null;
  /** Phrase (whole message or token) that produced the canonical intent */
  matchedPhrase: string | null;
}

// ==================== Collaborators ====================

/**
 * Direct-answer collaborator consulted after synonym resolution and before
 * the dialogue advances (FAQ or catalog lookups).
 */
export interface DirectAnswerProvider {
  lookupDirectAnswer(canonicalIntent: string): string | undefined;
  /** Number of distinct answers, reported in engine stats when known */
  readonly size?: number;
}

/**
 * One FAQ entry: several trigger keywords share a response.
 */
export interface FaqEntry {
  keywords: string[];
  response: string;
  category: string;
}

/**
 * FAQ hit with the keyword that triggered it.
 */
export interface FaqMatch {
  response: string;
  category: string;
  matchedKeyword: string;
}

// ==================== Statistics ====================

export interface EngineStats {
  vocabularySize: number;
  synonymPhrases: number;
  synonymGroups: number;
  dialogueNodes: number;
  suggestionEdges: number;
  directAnswers: number;
  activeSessions: number;
}
