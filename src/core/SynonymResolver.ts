/**
 * Synonym Resolver
 *
 * Disjoint-set forest mapping every member of a synonym group to one
 * canonical phrase. Union by rank with iterative path compression.
 *
 * @module core/SynonymResolver
 */

import { normalizePhrase } from '../utils/text.js';

/**
 * Partitions phrases into equivalence classes.
 *
 * All phrases are trimmed and lowercased before use. Unseen phrases are
 * their own root with rank 0.
 *
 * @example
 * ```typescript
 * const synonyms = new SynonymResolver();
 * synonyms.seedGroup(['cancel', 'cancel order', 'stop order', 'abort']);
 * synonyms.resolve('Stop Order'); // 'cancel'
 * ```
 */
export class SynonymResolver {
  private readonly parent = new Map<string, string>();
  private readonly rank = new Map<string, number>();

  /**
   * Merge the classes of `a` and `b` and return the surviving root.
   *
   * The lower-rank root goes under the higher-rank root. On equal rank the
   * root of `b` goes under the root of `a` and the rank of `a`'s root grows.
   */
  union(a: string, b: string): string {
    const rootA = this.resolve(a);
    const rootB = this.resolve(b);
    if (rootA === rootB) return rootA;

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;

    if (rankA < rankB) {
      this.parent.set(rootA, rootB);
      return rootB;
    }
    if (rankA > rankB) {
      this.parent.set(rootB, rootA);
      return rootA;
    }
    this.parent.set(rootB, rootA);
    this.rank.set(rootA, rankA + 1);
    return rootA;
  }

  /**
   * Canonical representative of `x`. Registers `x` as a singleton when it
   * was never seen. Amortized near-constant time.
   */
  resolve(x: string): string {
    const phrase = normalizePhrase(x);
    if (!this.parent.has(phrase)) {
      this.parent.set(phrase, phrase);
      this.rank.set(phrase, 0);
      return phrase;
    }
    return this.findRoot(phrase);
  }

  /**
   * Canonical representative of a known phrase, or the normalized phrase
   * itself when unknown. Never registers anything.
   */
  canonicalOf(x: string): string {
    const phrase = normalizePhrase(x);
    return this.parent.has(phrase) ? this.findRoot(phrase) : phrase;
  }

  areEquivalent(a: string, b: string): boolean {
    return this.resolve(a) === this.resolve(b);
  }

  /** Whether the phrase was ever registered. */
  has(x: string): boolean {
    return this.parent.has(normalizePhrase(x));
  }

  /**
   * Union a group so that its first entry becomes the canonical label.
   * Entries are unioned with the first one in list order.
   *
   * @returns The canonical label of the group
   */
  seedGroup(phrases: readonly string[]): string {
    if (phrases.length === 0) {
      throw new Error('Cannot seed an empty synonym group');
    }
    const [head, ...rest] = phrases;
    let root = this.resolve(head);
    for (const phrase of rest) {
      root = this.union(head, phrase);
    }
    return root;
  }

  /**
   * Every class as root to members, members in registration order.
   */
  groups(): Map<string, string[]> {
    const result = new Map<string, string[]>();
    for (const phrase of this.parent.keys()) {
      const root = this.findRoot(phrase);
      const members = result.get(root);
      if (members) {
        members.push(phrase);
      } else {
        result.set(root, [phrase]);
      }
    }
    return result;
  }

  /** Number of registered phrases. */
  get size(): number {
    return this.parent.size;
  }

  /**
   * Two passes: walk up to the root, then point every visited phrase
   * directly at it.
   */
  private findRoot(phrase: string): string {
    let root = phrase;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    let current = phrase;
    while (current !== root) {
      const up = this.parent.get(current);
      if (up === undefined) break;
      this.parent.set(current, root);
      current = up;
    }

    return root;
  }
}
