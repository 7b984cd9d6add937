/**
 * Navigation History
 *
 * Bounded stack of the dialogue nodes a session has left.
 *
 * @module core/NavigationHistory
 */

import { DEFAULT_SETTINGS } from '../utils/constants.js';

/**
 * LIFO stack with a fixed maximum depth. Pushing onto a full stack evicts
 * the oldest (bottom) entry so the newest trail is kept.
 */
export class NavigationHistory {
  private entries: string[] = [];
  readonly maxDepth: number;

  constructor(maxDepth: number = DEFAULT_SETTINGS.historyMaxDepth) {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`History depth must be a positive integer, got ${maxDepth}`);
    }
    this.maxDepth = maxDepth;
  }

  push(nodeId: string): void {
    if (this.entries.length >= this.maxDepth) {
      this.entries.shift();
    }
    this.entries.push(nodeId);
  }

  pop(): string | undefined {
    return this.entries.pop();
  }

  peek(): string | undefined {
    return this.entries[this.entries.length - 1];
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  clear(): void {
    this.entries = [];
  }

  /** Entries bottom (oldest) to top (newest). */
  toArray(): string[] {
    return [...this.entries];
  }
}
