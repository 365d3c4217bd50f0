/**
 * Tests for offset pagination utilities
 */

import {
  buildPaginationEnvelope,
  limitSchema,
  MAX_OFFSET,
  pageCount,
  pageOffset,
  pageSchema,
} from '@/lib/pagination-schema';

describe('pagination-schema', () => {
  describe('pageSchema / limitSchema (zod)', () => {
    it('defaults page and limit', () => {
      expect(pageSchema.parse(undefined)).toBe(1);
      expect(limitSchema.parse(undefined)).toBe(20);
    });

    it('coerces query string values', () => {
      expect(pageSchema.parse('4')).toBe(4);
      expect(limitSchema.parse('25')).toBe(25);
    });

    it('rejects a limit above the maximum', () => {
      expect(limitSchema.safeParse(101).success).toBe(false);
    });

    it('accepts any page past the end', () => {
      expect(pageSchema.parse('10001')).toBe(10001);
      expect(pageSchema.parse('5000000000')).toBe(5000000000);
    });
  });

  describe('pageOffset', () => {
    it('is zero for the first page', () => {
      expect(pageOffset(1, 20)).toBe(0);
    });

    it('skips the preceding pages', () => {
      expect(pageOffset(3, 10)).toBe(20);
    });

    it('clamps offsets that would leave the safe integer range', () => {
      expect(pageOffset(Number.MAX_SAFE_INTEGER, 100)).toBe(MAX_OFFSET);
    });
  });

  describe('pageCount', () => {
    it.each([
      [0, 20, 0],
      [1, 20, 1],
      [20, 20, 1],
      [21, 20, 2],
      [41, 20, 3],
      [7, 1, 7],
    ])('total %i with limit %i gives %i pages', (total, limit, pages) => {
      expect(pageCount(total, limit)).toBe(pages);
    });

    it('matches ceil(total / limit) across a range of inputs', () => {
      for (let total = 0; total <= 250; total += 7) {
        for (const limit of [1, 3, 20, 100]) {
          expect(pageCount(total, limit)).toBe(Math.ceil(total / limit));
        }
      }
    });

    it('rejects a limit below 1', () => {
      expect(() => pageCount(10, 0)).toThrow(RangeError);
    });
  });

  describe('buildPaginationEnvelope', () => {
    it('reports totals alongside the page items', () => {
      expect(buildPaginationEnvelope(['a', 'b'], 45, 3, 20)).toEqual({
        items: ['a', 'b'],
        total: 45,
        page: 3,
        limit: 20,
        pages: 3,
      });
    });

    it('keeps the true total for a page past the end', () => {
      expect(buildPaginationEnvelope([], 45, 10, 20)).toEqual({
        items: [],
        total: 45,
        page: 10,
        limit: 20,
        pages: 3,
      });
    });

    it('never returns more items than the limit', () => {
      const envelope = buildPaginationEnvelope([1, 2, 3, 4], 4, 1, 3);
      expect(envelope.items).toEqual([1, 2, 3]);
    });
  });
});
