import { IncompleteTranslationError } from './errors';
import { PARAGRAPH_SEPARATOR } from './types';
import type { Chunk, TranslationResult } from './types';

/**
 * Concatenate translated chunk bodies in chunk order, separated the same way
 * paragraphs were separated in the source.
 */
export const joinTranslations = (result: TranslationResult, chunks: readonly Chunk[]): string => {
  const missing = chunks.filter((chunk) => !result.has(chunk.index)).map((chunk) => chunk.index);
  if (missing.length > 0) {
    throw new IncompleteTranslationError(missing);
  }

  return [...chunks]
    .sort((a, b) => a.index - b.index)
    .map((chunk) => (result.get(chunk.index) ?? '').trim())
    .join(PARAGRAPH_SEPARATOR);
};
