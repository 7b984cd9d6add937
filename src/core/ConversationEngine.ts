/**
 * Conversation Engine
 *
 * Orchestrates one turn: normalize, resolve synonyms, consult direct
 * answers, advance the dialogue, rank next actions, assemble the reply.
 *
 * @module core/ConversationEngine
 */

import type {
  AdvanceResult,
  ConversationReply,
  DirectAnswerProvider,
  EngineSettings,
  EngineStats,
  IntentResolution,
  RankedSuggestion,
  SessionSnapshot,
} from '../types/index.js';
import type { PrefixIndex } from './PrefixIndex.js';
import type { SynonymResolver } from './SynonymResolver.js';
import type { DialogueGraph } from './DialogueGraph.js';
import type { SuggestionGraph } from './SuggestionGraph.js';
import { SessionStore, type SessionState } from './SessionStore.js';
import { DialogueStateMachine, parseReservedCommand } from './DialogueStateMachine.js';
import { DEFAULT_SETTINGS, REPLY_TEXT } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { normalizePhrase, tokenize } from '../utils/text.js';

/**
 * Collaborators of the engine. Everything except `sessions` is read-only
 * after construction.
 */
export interface ConversationEngineComponents {
  prefixIndex: PrefixIndex;
  synonyms: SynonymResolver;
  dialogue: DialogueGraph;
  suggestionGraph: SuggestionGraph;
  /** Consulted after synonym resolution, before the dialogue advances */
  directAnswers?: DirectAnswerProvider;
  /** Session table; created from `settings.historyMaxDepth` when omitted */
  sessions?: SessionStore;
  /** Missing or undefined entries fall back to DEFAULT_SETTINGS */
  settings?: Partial<EngineSettings>;
}

/**
 * Deterministic substitute for a natural-language agent.
 *
 * All operations are synchronous and never throw for message traffic.
 * Transports that do asynchronous work around a turn should use
 * `handleMessage`, which serializes turns of the same session.
 *
 * @example
 * ```typescript
 * const engine = createEngineFromFile();
 * engine.getSuggestions('ord');          // ['order', 'order status', ...]
 * const reply = engine.processMessage('s-1', 'I need help with my orders');
 * reply.currentNodeId;                   // 'orders_menu'
 * ```
 */
export class ConversationEngine {
  readonly prefixIndex: PrefixIndex;
  readonly synonyms: SynonymResolver;
  readonly dialogue: DialogueGraph;
  readonly suggestionGraph: SuggestionGraph;
  readonly sessions: SessionStore;
  readonly settings: EngineSettings;
  private readonly directAnswers?: DirectAnswerProvider;
  private readonly stateMachine: DialogueStateMachine;

  constructor(components: ConversationEngineComponents) {
    const overrides = components.settings ?? {};
    this.settings = {
      minPrefixLength: overrides.minPrefixLength ?? DEFAULT_SETTINGS.minPrefixLength,
      completionLimit: overrides.completionLimit ?? DEFAULT_SETTINGS.completionLimit,
      historyMaxDepth: overrides.historyMaxDepth ?? DEFAULT_SETTINGS.historyMaxDepth,
      suggestionTopK: overrides.suggestionTopK ?? DEFAULT_SETTINGS.suggestionTopK,
    };
    this.prefixIndex = components.prefixIndex;
    this.synonyms = components.synonyms;
    this.dialogue = components.dialogue;
    this.suggestionGraph = components.suggestionGraph;
    this.directAnswers = components.directAnswers;
    this.sessions = components.sessions ?? new SessionStore({
      rootId: components.dialogue.rootId,
      historyMaxDepth: this.settings.historyMaxDepth,
    });
    this.stateMachine = new DialogueStateMachine(this.dialogue);
  }

  // ==================== Transport Contract ====================

  /**
   * Live completions for a partially typed message.
   */
  getSuggestions(prefix: string): string[] {
    return this.prefixIndex.suggestions(prefix, this.settings.completionLimit);
  }

  /**
   * Process one submitted message for a session.
   */
  processMessage(sessionId: string, text: string): ConversationReply {
    const session = this.sessions.getOrCreate(sessionId);
    this.sessions.touch(session);
    const message = text.trim();

    if (message === '') {
      return this.replyInPlace(session, 'empty', REPLY_TEXT.EMPTY_INPUT, null);
    }

    if (parseReservedCommand(message) !== null) {
      return this.finishTurn(session, this.stateMachine.advance(session, message), null);
    }

    const intent = this.normalizeIntent(message);
    const lookupKey = intent.canonical ?? message;

    const answer = this.directAnswers?.lookupDirectAnswer(lookupKey);
    if (answer !== undefined) {
      logger.debug('Direct answer', { sessionId, intent: lookupKey });
      return this.replyInPlace(session, 'direct_answer', answer, intent.canonical);
    }

    let result = this.stateMachine.advance(session, lookupKey);
    if (result.kind === 'no_match' && intent.canonical !== null && intent.canonical !== normalizePhrase(message)) {
      // The canonical intent may not be a keyword here while the raw text is.
      result = this.stateMachine.advance(session, message);
    }

    return this.finishTurn(session, result, intent.canonical);
  }

  /**
   * Return a session to the root and clear its history.
   */
  resetSession(sessionId: string): void {
    const session = this.sessions.getOrCreate(sessionId);
    this.sessions.touch(session);
    this.stateMachine.reset(session);
  }

  // ==================== Locked Variants ====================

  /**
   * processMessage inside the session's lock.
   */
  async handleMessage(sessionId: string, text: string): Promise<ConversationReply> {
    return this.sessions.runExclusive(sessionId, () => this.processMessage(sessionId, text));
  }

  /**
   * resetSession inside the session's lock.
   */
  async handleReset(sessionId: string): Promise<void> {
    return this.sessions.runExclusive(sessionId, () => this.resetSession(sessionId));
  }

  // ==================== Queries ====================

  /**
   * Canonical intent of a message: the whole message if it is a known
   * synonym, otherwise the first known token.
   */
  normalizeIntent(text: string): IntentResolution {
    const normalized = normalizePhrase(text);
    const candidates = normalized === '' ? [] : [normalized, ...tokenize(normalized)];

    for (const phrase of candidates) {
      if (this.synonyms.has(phrase)) {
        return {
          original: text,
          canonical: this.synonyms.canonicalOf(phrase),
          matchedPhrase: phrase,
        };
      }
    }

    return { original: text, canonical: null, matchedPhrase: null };
  }

  getNextActions(nodeId: string, topK: number = this.settings.suggestionTopK): RankedSuggestion[] {
    return this.suggestionGraph.suggestions(nodeId, topK);
  }

  getSessionSnapshot(sessionId: string): SessionSnapshot {
    return this.sessions.snapshot(sessionId);
  }

  getStats(): EngineStats {
    return {
      vocabularySize: this.prefixIndex.size,
      synonymPhrases: this.synonyms.size,
      synonymGroups: this.synonyms.groups().size,
      dialogueNodes: this.dialogue.size,
      suggestionEdges: this.suggestionGraph.edgeCount,
      directAnswers: this.directAnswers?.size ?? 0,
      activeSessions: this.sessions.size,
    };
  }

  // ==================== Reply Assembly ====================

  private finishTurn(
    session: SessionState,
    result: AdvanceResult,
    canonicalIntent: string | null
  ): ConversationReply {
    logger.debug('Turn processed', {
      sessionId: session.sessionId,
      kind: result.kind,
      from: result.previousNodeId,
      to: result.nodeId,
    });

    const node = this.dialogue.getNode(result.nodeId) ?? this.dialogue.root;
    const suggestions = this.getNextActions(node.id);

    let replyText = result.text;
    if (result.kind === 'transition' && suggestions.length > 0) {
      const actions = suggestions.map((s, i) => `${i + 1}. ${s.label}`).join('\n');
      replyText += `\n\n${REPLY_TEXT.QUICK_ACTIONS_HEADER}\n${actions}`;
    }

    return {
      kind: result.kind,
      replyText,
      currentNodeId: node.id,
      isLeaf: node.isLeaf,
      suggestions,
      canonicalIntent,
      historySize: session.history.size(),
    };
  }

  /**
   * Reply that leaves the session where it is.
   */
  private replyInPlace(
    session: SessionState,
    kind: 'empty' | 'direct_answer',
    replyText: string,
    canonicalIntent: string | null
  ): ConversationReply {
    const node = this.stateMachine.currentNode(session);
    return {
      kind,
      replyText,
      currentNodeId: node.id,
      isLeaf: node.isLeaf,
      suggestions: this.getNextActions(node.id),
      canonicalIntent,
      historySize: session.history.size(),
    };
  }
}
