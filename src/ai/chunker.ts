import { logger } from '../utils/logger';
import { InvalidConfigurationError } from './errors';
import { DEFAULT_MAX_WORDS_PER_CHUNK, PARAGRAPH_SEPARATOR } from './types';
import type { Chunk, Paragraph } from './types';

const toChunk = (index: number, paragraphs: Paragraph[], maxWords: number): Chunk => {
  const wordCount = paragraphs.reduce((total, paragraph) => total + paragraph.wordCount, 0);
  return Object.freeze({
    index,
    paragraphs: Object.freeze([...paragraphs]),
    text: paragraphs.map((paragraph) => paragraph.text).join(PARAGRAPH_SEPARATOR),
    wordCount,
    oversized: wordCount > maxWords,
  });
};

/**
 * Greedily pack consecutive paragraphs into chunks of at most `maxWords` words.
 *
 * Overflow policy: a paragraph that on its own exceeds the budget is emitted as
 * a chunk of exactly one paragraph and flagged `oversized`. Paragraphs are never
 * split, so such a chunk is the only one allowed over the budget.
 */
export const assembleChunks = (
  paragraphs: readonly Paragraph[],
  maxWords: number = DEFAULT_MAX_WORDS_PER_CHUNK,
): Chunk[] => {
  if (!Number.isInteger(maxWords) || maxWords <= 0) {
    throw new InvalidConfigurationError([`maxWordsPerChunk must be a positive integer (got ${maxWords})`]);
  }

  const chunks: Chunk[] = [];
  let buffer: Paragraph[] = [];
  let bufferWords = 0;

  const flush = () => {
    if (buffer.length === 0) return;
    chunks.push(toChunk(chunks.length, buffer, maxWords));
    buffer = [];
    bufferWords = 0;
  };

  for (const paragraph of paragraphs) {
    if (bufferWords + paragraph.wordCount > maxWords) {
      flush();
    }
    buffer.push(paragraph);
    bufferWords += paragraph.wordCount;
  }
  flush();

  for (const chunk of chunks) {
    if (chunk.oversized) {
      logger.warn(
        { chunkIndex: chunk.index, wordCount: chunk.wordCount, maxWords },
        'Paragraph exceeds the word budget; sending it as a single oversized chunk',
      );
    }
  }

  return chunks;
};

/** Paragraphs of all chunks, in order */
export const flattenChunks = (chunks: readonly Chunk[]): Paragraph[] =>
  chunks.flatMap((chunk) => [...chunk.paragraphs]);
