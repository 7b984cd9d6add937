/**
 * Dialogue Graph
 *
 * Immutable set of dialogue nodes, validated once at load time and shared
 * by every session.
 *
 * @module core/DialogueGraph
 */

import type {
  DialogueNode,
  DialogueNodeDefinition,
  DialogueOption,
  DialogueWarning,
} from '../types/index.js';
import { DialogueConfigError, ErrorCode, UnknownNodeError } from '../utils/errors.js';
import { DEFAULT_ROOT_ID } from '../utils/constants.js';
import { normalizePhrase } from '../utils/text.js';

/**
 * Static definition of the conversation.
 *
 * Construction rejects content that cannot be served: duplicate node ids,
 * a missing root node, empty option keywords, and non-leaf nodes without a
 * single option whose target exists. Dangling targets on a node that keeps
 * at least one valid option, and nodes unreachable from the root, are
 * reported through `warnings` instead; at run time a dangling target is
 * simply a non-match.
 */
export class DialogueGraph {
  private readonly nodes: ReadonlyMap<string, DialogueNode>;
  readonly rootId: string;
  readonly warnings: ReadonlyArray<DialogueWarning>;

  private constructor(nodes: Map<string, DialogueNode>, rootId: string) {
    this.nodes = nodes;
    this.rootId = rootId;
    this.warnings = Object.freeze(this.inspect());
  }

  /**
   * Build and validate a graph.
   *
   * @throws DialogueConfigError if the content cannot be served
   *
   * @example
   * ```typescript
   * const graph = DialogueGraph.fromDefinitions([
   *   { id: 'root', prompt: 'Main menu', options: [{ keyword: 'orders', target: 'orders_menu' }] },
   *   { id: 'orders_menu', prompt: 'Orders', options: [], isLeaf: true },
   * ]);
   * ```
   */
  static fromDefinitions(
    definitions: readonly DialogueNodeDefinition[],
    rootId: string = DEFAULT_ROOT_ID
  ): DialogueGraph {
    const nodes = new Map<string, DialogueNode>();

    for (const def of definitions) {
      if (nodes.has(def.id)) {
        throw new DialogueConfigError(
          `Duplicate dialogue node id "${def.id}"`,
          ErrorCode.DUPLICATE_NODE,
          { nodeId: def.id }
        );
      }

      const isLeaf = def.isLeaf ?? false;
      if (!isLeaf && def.options.length === 0) {
        throw new DialogueConfigError(
          `Dialogue node "${def.id}" has no options and is not marked as a leaf`,
          ErrorCode.NODE_WITHOUT_OPTIONS,
          { nodeId: def.id }
        );
      }

      const options: DialogueOption[] = def.options.map((option, index) => {
        const keyword = normalizePhrase(option.keyword);
        if (keyword === '') {
          throw new DialogueConfigError(
            `Option ${index} of dialogue node "${def.id}" has an empty keyword`,
            ErrorCode.EMPTY_KEYWORD,
            { nodeId: def.id, optionIndex: index }
          );
        }
        return Object.freeze({ keyword, target: option.target });
      });

      nodes.set(def.id, Object.freeze({
        id: def.id,
        prompt: def.prompt,
        options: Object.freeze(options),
        isLeaf,
      }));
    }

    if (!nodes.has(rootId)) {
      throw new DialogueConfigError(
        `Root node "${rootId}" is not defined`,
        ErrorCode.MISSING_ROOT_NODE,
        { rootId, nodeCount: nodes.size }
      );
    }

    for (const node of nodes.values()) {
      if (!node.isLeaf && node.options.every(option => !nodes.has(option.target))) {
        throw new DialogueConfigError(
          `Dialogue node "${node.id}" has no option with a known target and is not marked as a leaf`,
          ErrorCode.NODE_WITHOUT_OPTIONS,
          { nodeId: node.id, targets: node.options.map(option => option.target) }
        );
      }
    }

    return new DialogueGraph(nodes, rootId);
  }

  getNode(nodeId: string): DialogueNode | undefined {
    return this.nodes.get(nodeId);
  }

  /**
   * @throws UnknownNodeError if the node does not exist
   */
  requireNode(nodeId: string): DialogueNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new UnknownNodeError(nodeId);
    }
    return node;
  }

  has(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  get root(): DialogueNode {
    return this.requireNode(this.rootId);
  }

  get size(): number {
    return this.nodes.size;
  }

  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  /**
   * Collect dangling targets, then nodes a breadth-first walk from the
   * root never reaches.
   */
  private inspect(): DialogueWarning[] {
    const warnings: DialogueWarning[] = [];

    for (const node of this.nodes.values()) {
      for (const option of node.options) {
        if (!this.nodes.has(option.target)) {
          warnings.push({
            kind: 'dangling_target',
            nodeId: node.id,
            detail: `option "${option.keyword}" targets unknown node "${option.target}"`,
          });
        }
      }
    }

    const reached = new Set<string>([this.rootId]);
    const queue: string[] = [this.rootId];
    while (queue.length > 0) {
      const id = queue.shift();
      const node = id === undefined ? undefined : this.nodes.get(id);
      if (!node) continue;
      for (const option of node.options) {
        if (this.nodes.has(option.target) && !reached.has(option.target)) {
          reached.add(option.target);
          queue.push(option.target);
        }
      }
    }

    for (const id of this.nodes.keys()) {
      if (!reached.has(id)) {
        warnings.push({
          kind: 'unreachable_node',
          nodeId: id,
          detail: `node "${id}" cannot be reached from "${this.rootId}"`,
        });
      }
    }

    return warnings;
  }
}
