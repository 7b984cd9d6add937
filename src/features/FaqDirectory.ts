/**
 * FAQ Directory
 *
 * Keyword to canned-response lookup. The default DirectAnswerProvider.
 *
 * @module features/FaqDirectory
 */

import type { DirectAnswerProvider, FaqEntry, FaqMatch } from '../types/index.js';
import { normalizePhrase, tokenize } from '../utils/text.js';

interface StoredFaq {
  response: string;
  category: string;
}

/**
 * Keyword-indexed FAQ answers. Several keywords share one entry; a later
 * entry registering the same keyword replaces the earlier mapping.
 */
export class FaqDirectory implements DirectAnswerProvider {
  private readonly byKeyword = new Map<string, StoredFaq>();
  private readonly categories = new Map<string, string[]>();

  constructor(entries: Iterable<FaqEntry> = []) {
    for (const entry of entries) {
      this.addEntry(entry.keywords, entry.response, entry.category);
    }
  }

  addEntry(keywords: readonly string[], response: string, category: string = 'general'): void {
    const stored: StoredFaq = { response, category };
    const normalized = keywords.map(normalizePhrase).filter(k => k !== '');
    for (const keyword of normalized) {
      this.byKeyword.set(keyword, stored);
    }

    const existing = this.categories.get(category);
    if (existing) {
      existing.push(...normalized);
    } else {
      this.categories.set(category, [...normalized]);
    }
  }

  /**
   * Exact keyword first, then the first whitespace token that is a keyword.
   */
  lookup(query: string): FaqMatch | undefined {
    const normalized = normalizePhrase(query);
    if (normalized === '') return undefined;

    const exact = this.byKeyword.get(normalized);
    if (exact) {
      return { ...exact, matchedKeyword: normalized };
    }

    for (const token of tokenize(normalized)) {
      const hit = this.byKeyword.get(token);
      if (hit) {
        return { ...hit, matchedKeyword: token };
      }
    }

    return undefined;
  }

  lookupDirectAnswer(canonicalIntent: string): string | undefined {
    return this.lookup(canonicalIntent)?.response;
  }

  keywords(): string[] {
    return [...this.byKeyword.keys()];
  }

  keywordsByCategory(category: string): string[] {
    return [...(this.categories.get(category) ?? [])];
  }

  /** Number of distinct entries still reachable through some keyword. */
  get size(): number {
    return new Set(this.byKeyword.values()).size;
  }
}
