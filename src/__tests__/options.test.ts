/**
 * Tests for translation option validation
 */

import { InvalidConfigurationError } from '../ai/errors';
import { createTranslationOptions, parseGlossaryList } from '../ai/options';
import { TRANSLATION_TEMPERATURE } from '../ai/types';
import { env } from '../utils/env';

describe('createTranslationOptions', () => {
  it('fills defaults', () => {
    const options = createTranslationOptions();

    expect(options).toEqual({
      tone: 'informal',
      glossary: [],
      model: env.openAiModel,
      temperature: TRANSLATION_TEMPERATURE,
      maxWordsPerChunk: env.maxWordsPerChunk,
      concurrency: env.translationConcurrency,
    });
  });

  it('fixes the temperature at 0.2', () => {
    expect(createTranslationOptions({ tone: 'formal' }).temperature).toBe(0.2);
  });

  it('trims glossary terms and drops duplicates, keeping case', () => {
    const options = createTranslationOptions({ glossary: [' Blue Butterfly ', 'Dragon', 'Blue Butterfly', 'dragon'] });

    expect(options.glossary).toEqual(['Blue Butterfly', 'Dragon', 'dragon']);
  });

  it('returns a frozen structure', () => {
    const options = createTranslationOptions({ glossary: ['Dragon'] });

    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.glossary)).toBe(true);
  });

  it('rejects a non-positive word budget', () => {
    expect(() => createTranslationOptions({ maxWordsPerChunk: 0 })).toThrow(InvalidConfigurationError);
  });

  it('rejects a fractional word budget', () => {
    expect(() => createTranslationOptions({ maxWordsPerChunk: 12.5 })).toThrow(InvalidConfigurationError);
  });

  it('rejects an empty glossary term', () => {
    expect(() => createTranslationOptions({ glossary: ['Dragon', '   '] })).toThrow(InvalidConfigurationError);
  });

  it('rejects a multi-line glossary term', () => {
    expect(() => createTranslationOptions({ glossary: ['Blue\nButterfly'] })).toThrow(InvalidConfigurationError);
  });

  it('rejects concurrency outside 1..16', () => {
    expect(() => createTranslationOptions({ concurrency: 0 })).toThrow(InvalidConfigurationError);
    expect(() => createTranslationOptions({ concurrency: 17 })).toThrow(InvalidConfigurationError);
  });

  it('names the offending fields', () => {
    try {
      createTranslationOptions({ maxWordsPerChunk: -1, glossary: [''] });
      throw new Error('expected createTranslationOptions to throw');
    } catch (error) {
      if (!(error instanceof InvalidConfigurationError)) throw error;
      const issues = error.issues;
      expect(issues).toHaveLength(2);
      expect(issues.some((issue) => issue.startsWith('glossary.0: '))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('maxWordsPerChunk: '))).toBe(true);
    }
  });

  it('rejects unknown option keys', () => {
    const input = { tone: 'formal' as const, temperature: 0.9 };

    expect(() => createTranslationOptions(input)).toThrow(InvalidConfigurationError);
  });
});

describe('parseGlossaryList', () => {
  it('splits on commas and trims', () => {
    expect(parseGlossaryList('Blue Butterfly, Dragon ,Jeet Kune Do')).toEqual(['Blue Butterfly', 'Dragon', 'Jeet Kune Do']);
  });

  it('drops blank entries', () => {
    expect(parseGlossaryList('Dragon,, ,Microsoft,')).toEqual(['Dragon', 'Microsoft']);
  });

  it('returns an empty list for undefined or empty input', () => {
    expect(parseGlossaryList(undefined)).toEqual([]);
    expect(parseGlossaryList('')).toEqual([]);
  });
});
