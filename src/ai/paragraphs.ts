import { EmptyInputError } from './errors';
import type { Paragraph } from './types';

// One or more consecutive empty (or whitespace-only) lines
const BLANK_LINE_SEPARATOR = /\n[^\S\n]*(?:\n[^\S\n]*)+/;

export const countWords = (text: string): number => text.match(/\S+/g)?.length ?? 0;

export const normalizeNewlines = (text: string): string => text.replace(/\r\n?/g, '\n');

/**
 * Split raw input into paragraphs on blank-line boundaries.
 * Throws EmptyInputError when nothing but whitespace is left.
 */
export const splitParagraphs = (raw: string): Paragraph[] => {
  const text = normalizeNewlines(raw).trim();
  if (!text) {
    throw new EmptyInputError();
  }

  return text
    .split(BLANK_LINE_SEPARATOR)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Object.freeze({ text: part, wordCount: countWords(part) }));
};
