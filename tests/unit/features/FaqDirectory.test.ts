/**
 * FaqDirectory Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FaqDirectory } from '../../../src/features/FaqDirectory.js';

describe('FaqDirectory', () => {
  let faqs: FaqDirectory;

  beforeEach(() => {
    faqs = new FaqDirectory([
      { keywords: ['shipping', 'Delivery Time'], response: 'Five business days.', category: 'shipping' },
      { keywords: ['hours', 'business hours'], response: 'Open 9 to 5.', category: 'hours' },
    ]);
  });

  describe('lookup', () => {
    it('should match a whole keyword', () => {
      expect(faqs.lookup('  Delivery time ')).toEqual({
        response: 'Five business days.',
        category: 'shipping',
        matchedKeyword: 'delivery time',
      });
    });

    it('should fall back to the first token that is a keyword', () => {
      expect(faqs.lookup('what are your hours for shipping')).toEqual({
        response: 'Open 9 to 5.',
        category: 'hours',
        matchedKeyword: 'hours',
      });
    });

    it('should return undefined when nothing matches', () => {
      expect(faqs.lookup('refund please')).toBeUndefined();
      expect(faqs.lookup('   ')).toBeUndefined();
    });
  });

  describe('lookupDirectAnswer', () => {
    it('should return only the response', () => {
      expect(faqs.lookupDirectAnswer('shipping')).toBe('Five business days.');
      expect(faqs.lookupDirectAnswer('cancel')).toBeUndefined();
    });
  });

  describe('addEntry', () => {
    it('should default the category to general', () => {
      faqs.addEntry(['coupon'], 'Use code TEST10.');

      expect(faqs.lookup('coupon')?.category).toBe('general');
      expect(faqs.keywordsByCategory('general')).toEqual(['coupon']);
    });

    it('should let a later entry take over a keyword', () => {
      faqs.addEntry(['shipping'], 'Ships tomorrow.', 'shipping');

      expect(faqs.lookupDirectAnswer('shipping')).toBe('Ships tomorrow.');
      expect(faqs.lookupDirectAnswer('delivery time')).toBe('Five business days.');
    });

    it('should skip empty keywords', () => {
      faqs.addEntry(['  ', 'promo'], 'No promos today.', 'promotions');
      expect(faqs.keywordsByCategory('promotions')).toEqual(['promo']);
    });
  });

  describe('keywords and size', () => {
    it('should list normalized keywords in insertion order', () => {
      expect(faqs.keywords()).toEqual(['shipping', 'delivery time', 'hours', 'business hours']);
    });

    it('should count entries still reachable through a keyword', () => {
      expect(faqs.size).toBe(2);

      faqs.addEntry(['hours', 'business hours'], 'Open 8 to 6.', 'hours');
      expect(faqs.size).toBe(2);
    });

    it('should return an empty list for an unknown category', () => {
      expect(faqs.keywordsByCategory('billing')).toEqual([]);
    });
  });
});
