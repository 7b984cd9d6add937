/**
 * Prefix Index
 *
 * Character tree answering "all phrases starting with P" for live
 * auto-completion.
 *
 * @module core/PrefixIndex
 */

import { DEFAULT_SETTINGS } from '../utils/constants.js';
import { normalizePhrase } from '../utils/text.js';

/**
 * Node of the character tree. `phrase` is set on terminal nodes and keeps
 * the original casing of the inserted phrase.
 */
interface PrefixNode {
  children: Map<string, PrefixNode>;
  phrase?: string;
}

function createNode(): PrefixNode {
  return { children: new Map() };
}

export interface PrefixIndexOptions {
  /** Prefixes shorter than this return no completions (default: 2) */
  minPrefixLength?: number;
}

/**
 * Prefix tree over a phrase vocabulary.
 *
 * Lookups lowercase their input; completions come back in a deterministic
 * pre-order (a node's own phrase, then children by ascending character).
 *
 * @example
 * ```typescript
 * const index = new PrefixIndex();
 * index.insert('Order status');
 * index.insert('orders');
 * index.suggestions('ord', 5); // ['Order status', 'orders']
 * ```
 */
export class PrefixIndex {
  private readonly root: PrefixNode = createNode();
  private readonly minPrefixLength: number;
  private count = 0;

  constructor(options: PrefixIndexOptions = {}) {
    this.minPrefixLength = options.minPrefixLength ?? DEFAULT_SETTINGS.minPrefixLength;
  }

  /**
   * Insert a phrase. O(length of phrase).
   *
   * Empty phrases are ignored. A phrase whose lowercase form is already
   * stored keeps the first stored casing.
   */
  insert(phrase: string): void {
    const original = phrase.trim();
    if (original === '') return;

    let node = this.root;
    for (const char of original.toLowerCase()) {
      let child = node.children.get(char);
      if (!child) {
        child = createNode();
        node.children.set(char, child);
      }
      node = child;
    }

    if (node.phrase === undefined) {
      node.phrase = original;
      this.count++;
    }
  }

  /**
   * Insert every phrase of a vocabulary.
   */
  insertAll(phrases: Iterable<string>): void {
    for (const phrase of phrases) {
      this.insert(phrase);
    }
  }

  /**
   * Phrases starting with `prefix`, at most `limit` of them.
   *
   * Returns an empty array when the trimmed prefix is shorter than the
   * minimum prefix length, when `limit` is below 1, or when no stored
   * phrase starts with the prefix. O(prefix length + nodes visited).
   */
  suggestions(prefix: string, limit: number): string[] {
    const normalized = normalizePhrase(prefix);
    if (normalized.length < this.minPrefixLength || limit < 1) {
      return [];
    }

    const start = this.findNode(normalized);
    if (!start) return [];

    return this.collect(start, limit);
  }

  /**
   * Exact, case-insensitive membership test.
   */
  has(phrase: string): boolean {
    const normalized = normalizePhrase(phrase);
    if (normalized === '') return false;
    return this.findNode(normalized)?.phrase !== undefined;
  }

  /**
   * Every stored phrase in traversal order.
   */
  phrases(): string[] {
    return this.collect(this.root, Infinity);
  }

  /** Number of distinct phrases stored. */
  get size(): number {
    return this.count;
  }

  private findNode(path: string): PrefixNode | undefined {
    let node: PrefixNode | undefined = this.root;
    for (const char of path) {
      node = node.children.get(char);
      if (!node) return undefined;
    }
    return node;
  }

  /**
   * Iterative depth-first pre-order collection. Children are pushed in
   * descending order so they pop in ascending order.
   */
  private collect(start: PrefixNode, limit: number): string[] {
    const results: string[] = [];
    const stack: PrefixNode[] = [start];

    while (stack.length > 0 && results.length < limit) {
      const node = stack.pop();
      if (!node) break;

      if (node.phrase !== undefined) {
        results.push(node.phrase);
      }

      const keys = [...node.children.keys()].sort();
      for (let i = keys.length - 1; i >= 0; i--) {
        const child = node.children.get(keys[i]);
        if (child) stack.push(child);
      }
    }

    return results;
  }
}
