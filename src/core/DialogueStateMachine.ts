/**
 * Dialogue State Machine
 *
 * Advances one session through the dialogue graph per input: reserved
 * commands first, then first-match keyword containment over the current
 * node's ordered options.
 *
 * @module core/DialogueStateMachine
 */

import type { AdvanceResult, DialogueNode } from '../types/index.js';
import type { DialogueGraph } from './DialogueGraph.js';
import type { SessionState } from './SessionStore.js';
import { BACK_COMMANDS, REPLY_TEXT, RESET_COMMANDS } from '../utils/constants.js';
import { containsEitherWay, normalizePhrase } from '../utils/text.js';

export type ReservedCommand = 'reset' | 'back';

/**
 * Classify input as a reserved command, if it is one.
 */
export function parseReservedCommand(input: string): ReservedCommand | null {
  const normalized = normalizePhrase(input);
  if (RESET_COMMANDS.includes(normalized)) return 'reset';
  if (BACK_COMMANDS.includes(normalized)) return 'back';
  return null;
}

/**
 * Stateless driver over a shared DialogueGraph. All state lives in the
 * SessionState passed to each call.
 */
export class DialogueStateMachine {
  constructor(private readonly graph: DialogueGraph) {}

  /**
   * Apply one input to a session.
   *
   * Never throws for user input: unknown current nodes fall back to the
   * root, and unmatched keywords or dangling targets leave state unchanged.
   */
  advance(session: SessionState, input: string): AdvanceResult {
    const current = this.currentNode(session);
    const command = parseReservedCommand(input);

    if (command === 'reset') {
      return this.reset(session);
    }
    if (command === 'back') {
      return this.back(session, current);
    }

    const normalized = normalizePhrase(input);
    const option = current.options.find(o => containsEitherWay(o.keyword, normalized));
    const target = option ? this.graph.getNode(option.target) : undefined;

    if (!target) {
      return {
        kind: 'no_match',
        text: `${REPLY_TEXT.NOT_UNDERSTOOD}\n\n${current.prompt}`,
        nodeId: current.id,
        previousNodeId: current.id,
      };
    }

    session.history.push(current.id);
    session.currentNodeId = target.id;
    return {
      kind: 'transition',
      text: target.prompt,
      nodeId: target.id,
      previousNodeId: current.id,
    };
  }

  /**
   * Clear history and return to the root.
   */
  reset(session: SessionState): AdvanceResult {
    const previousNodeId = session.currentNodeId;
    session.history.clear();
    session.currentNodeId = this.graph.rootId;
    return {
      kind: 'reset',
      text: `${REPLY_TEXT.RETURNING_TO_MENU}\n\n${this.graph.root.prompt}`,
      nodeId: this.graph.rootId,
      previousNodeId,
    };
  }

  /**
   * Return to the node the session left most recently.
   *
   * At the root with nothing but the root behind it, this is a no-op. With
   * an empty history away from the root (older entries were evicted) the
   * session goes to the root.
   */
  private back(session: SessionState, current: DialogueNode): AdvanceResult {
    const { history } = session;
    const rootId = this.graph.rootId;
    const atRoot = current.id === rootId;

    if (atRoot && (history.isEmpty() || (history.size() === 1 && history.peek() === rootId))) {
      return {
        kind: 'at_root',
        text: `${REPLY_TEXT.ALREADY_AT_ROOT}\n\n${current.prompt}`,
        nodeId: rootId,
        previousNodeId: rootId,
      };
    }

    const popped = history.pop();
    const destination = (popped !== undefined ? this.graph.getNode(popped) : undefined) ?? this.graph.root;
    session.currentNodeId = destination.id;

    return {
      kind: 'back',
      text: `${REPLY_TEXT.GOING_BACK}\n\n${destination.prompt}`,
      nodeId: destination.id,
      previousNodeId: current.id,
    };
  }

  /**
   * Node the session is on; the root for ids the graph doesn't know.
   */
  currentNode(session: SessionState): DialogueNode {
    return this.graph.getNode(session.currentNodeId) ?? this.graph.root;
  }
}
