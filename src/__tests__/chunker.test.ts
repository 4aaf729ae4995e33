/**
 * Tests for greedy chunk assembly
 */

import { words } from '../__mocks__/backend';
import { assembleChunks, flattenChunks } from '../ai/chunker';
import { InvalidConfigurationError } from '../ai/errors';
import { splitParagraphs } from '../ai/paragraphs';
import type { Paragraph } from '../ai/types';

const paragraph = (wordCount: number, prefix = 'w'): Paragraph => ({ text: words(wordCount, prefix), wordCount });

describe('assembleChunks', () => {
  it('splits 3000 + 2500 words into two chunks under a 4000 budget', () => {
    const p1 = paragraph(3000, 'a');
    const p2 = paragraph(2500, 'b');

    const chunks = assembleChunks([p1, p2], 4000);

    expect(chunks).toHaveLength(2);
    expect(chunks[0].paragraphs).toEqual([p1]);
    expect(chunks[1].paragraphs).toEqual([p2]);
    expect(chunks.map((c) => c.oversized)).toEqual([false, false]);
  });

  it('keeps a single 5000-word paragraph whole as one oversized chunk', () => {
    const p1 = paragraph(5000);

    const chunks = assembleChunks([p1], 4000);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].paragraphs).toEqual([p1]);
    expect(chunks[0].wordCount).toBe(5000);
    expect(chunks[0].oversized).toBe(true);
  });

  it('packs paragraphs while the total stays within the budget', () => {
    const chunks = assembleChunks([paragraph(4), paragraph(3), paragraph(3), paragraph(5)], 10);

    expect(chunks.map((c) => c.paragraphs.length)).toEqual([3, 1]);
    expect(chunks.map((c) => c.wordCount)).toEqual([10, 5]);
  });

  it('isolates an oversized paragraph between normal ones', () => {
    const chunks = assembleChunks([paragraph(2), paragraph(12), paragraph(2)], 10);

    expect(chunks.map((c) => c.wordCount)).toEqual([2, 12, 2]);
    expect(chunks.map((c) => c.oversized)).toEqual([false, true, false]);
  });

  it('numbers chunks from 0 in order', () => {
    const chunks = assembleChunks([paragraph(6), paragraph(6), paragraph(6)], 10);

    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
  });

  it('joins chunk paragraphs with a blank line', () => {
    const chunks = assembleChunks(splitParagraphs('One two\n\nThree'), 10);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe('One two\n\nThree');
  });

  it('uses a 4000-word budget by default', () => {
    const chunks = assembleChunks([paragraph(2000), paragraph(2000), paragraph(1)]);

    expect(chunks.map((c) => c.wordCount)).toEqual([4000, 1]);
  });

  it('returns no chunks for no paragraphs', () => {
    expect(assembleChunks([], 10)).toEqual([]);
  });

  it.each([0, -5, 2.5, Number.NaN])('rejects a budget of %p', (maxWords) => {
    expect(() => assembleChunks([paragraph(1)], maxWords)).toThrow(InvalidConfigurationError);
  });

  describe('properties', () => {
    // Deterministic pseudo-random paragraph sizes
    const sizes = (seed: number, count: number) => {
      let state = seed;
      return Array.from({ length: count }, () => {
        state = (state * 1103515245 + 12345) % 2147483648;
        return 1 + (state % 40);
      });
    };

    it.each([
      [1, 25, 30],
      [7, 40, 10],
      [42, 60, 55],
      [99, 15, 1],
    ])('seed %p: partition is lossless and respects the budget', (seed, count, maxWords) => {
      const paragraphs = sizes(seed, count).map((size, i) => paragraph(size, `p${i}_`));

      const chunks = assembleChunks(paragraphs, maxWords);

      expect(flattenChunks(chunks)).toEqual(paragraphs);
      for (const chunk of chunks) {
        expect(chunk.paragraphs.length).toBeGreaterThan(0);
        if (chunk.wordCount > maxWords) {
          expect(chunk.paragraphs).toHaveLength(1);
          expect(chunk.oversized).toBe(true);
        } else {
          expect(chunk.oversized).toBe(false);
        }
      }
    });
  });
});
