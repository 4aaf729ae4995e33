import { z } from 'zod';
import { env } from '../utils/env';
import { InvalidConfigurationError } from './errors';
import { TRANSLATION_TEMPERATURE } from './types';
import type { TranslationOptions } from './types';

export const MAX_CONCURRENCY = 16;

const glossaryTermSchema = z
  .string()
  .transform((term) => term.trim())
  .pipe(
    z
      .string()
      .min(1, 'glossary terms must not be empty')
      .regex(/^[^\r\n]*$/, 'glossary terms must be a single line'),
  );

export const translationOptionsSchema = z
  .object({
    tone: z.enum(['formal', 'informal']).default('informal'),
    glossary: z.array(glossaryTermSchema).default([]),
    model: z.string().trim().min(1, 'model must not be empty').default(env.openAiModel),
    maxWordsPerChunk: z.number().int().positive().default(env.maxWordsPerChunk),
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(env.translationConcurrency),
  })
  .strict();

export type TranslationOptionsInput = z.input<typeof translationOptionsSchema>;

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`);

/**
 * Validate user-facing options and freeze them for the duration of a run.
 * Invalid combinations are rejected here, before any chunking or backend call.
 */
export const createTranslationOptions = (input: TranslationOptionsInput = {}): TranslationOptions => {
  const parsed = translationOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }

  const { tone, glossary, model, maxWordsPerChunk, concurrency } = parsed.data;

  return Object.freeze({
    tone,
    glossary: Object.freeze([...new Set(glossary)]),
    model,
    temperature: TRANSLATION_TEMPERATURE,
    maxWordsPerChunk,
    concurrency,
  });
};

/** Split a comma-separated glossary value, dropping blank entries */
export const parseGlossaryList = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((term) => term.trim())
    .filter((term) => term.length > 0);
};
