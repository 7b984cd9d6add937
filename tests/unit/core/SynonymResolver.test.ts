/**
 * SynonymResolver Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SynonymResolver } from '../../../src/core/SynonymResolver.js';

describe('SynonymResolver', () => {
  let synonyms: SynonymResolver;

  beforeEach(() => {
    synonyms = new SynonymResolver();
  });

  describe('resolve', () => {
    it('should register an unseen phrase as its own root', () => {
      expect(synonyms.resolve('  Refund ')).toBe('refund');
      expect(synonyms.has('refund')).toBe(true);
      expect(synonyms.size).toBe(1);
    });
  });

  describe('union', () => {
    it('should put the second root under the first on equal rank', () => {
      expect(synonyms.union('a', 'b')).toBe('a');
      expect(synonyms.resolve('b')).toBe('a');
    });

    it('should put the lower-rank root under the higher-rank root', () => {
      synonyms.union('a', 'b');
      expect(synonyms.union('c', 'a')).toBe('a');
      expect(synonyms.resolve('c')).toBe('a');
    });

    it('should be a no-op for phrases already in one class', () => {
      synonyms.union('a', 'b');
      expect(synonyms.union('b', 'a')).toBe('a');
      expect(synonyms.size).toBe(2);
    });

    it('should make equivalence transitive', () => {
      synonyms.union('a', 'b');
      synonyms.union('b', 'c');
      expect(synonyms.areEquivalent('a', 'c')).toBe(true);
    });

    it('should keep classes stable under unrelated unions', () => {
      synonyms.union('a', 'b');
      synonyms.union('x', 'y');
      synonyms.union('y', 'z');

      expect(synonyms.resolve('b')).toBe('a');
      expect(synonyms.areEquivalent('a', 'x')).toBe(false);
    });
  });

  describe('seedGroup', () => {
    it('should make the first entry the canonical label', () => {
      const label = synonyms.seedGroup(['cancel', 'cancel order', 'stop order', 'abort']);

      expect(label).toBe('cancel');
      expect(synonyms.resolve('Stop Order')).toBe('cancel');
      expect(synonyms.resolve('abort')).toBe('cancel');
    });

    it('should keep separate groups apart', () => {
      synonyms.seedGroup(['track', 'tracking']);
      synonyms.seedGroup(['return', 'refund']);

      expect(synonyms.areEquivalent('tracking', 'refund')).toBe(false);
    });

    it('should resolve every member of a large group to the head', () => {
      const group = Array.from({ length: 500 }, (_, i) => `phrase ${i}`);
      synonyms.seedGroup(group);

      expect(synonyms.resolve('phrase 499')).toBe('phrase 0');
      expect(synonyms.resolve('phrase 250')).toBe('phrase 0');
    });

    it('should reject an empty group', () => {
      expect(() => synonyms.seedGroup([])).toThrow('Cannot seed an empty synonym group');
    });
  });

  describe('canonicalOf', () => {
    it('should return the root of a known phrase', () => {
      synonyms.seedGroup(['contact', 'agent']);
      expect(synonyms.canonicalOf('AGENT')).toBe('contact');
    });

    it('should not register unknown phrases', () => {
      expect(synonyms.canonicalOf('New Phrase')).toBe('new phrase');
      expect(synonyms.has('new phrase')).toBe(false);
      expect(synonyms.size).toBe(0);
    });
  });

  describe('groups', () => {
    it('should list members under their root in registration order', () => {
      synonyms.seedGroup(['return', 'refund', 'money back']);
      synonyms.seedGroup(['account', 'login']);

      expect(synonyms.groups()).toEqual(new Map([
        ['return', ['return', 'refund', 'money back']],
        ['account', ['account', 'login']],
      ]));
    });
  });
});
