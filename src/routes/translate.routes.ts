import { Router } from 'express';
import { z } from 'zod';
import { createTranslationOptions, parseGlossaryList } from '../ai/options';
import type { TranslationBackend } from '../ai/providers/types';
import { planTranslation, translateDocument } from '../services/translation.service';
import { asyncHandler } from '../utils/asyncHandler';
import { logger } from '../utils/logger';

const translateRequestSchema = z.object({
  text: z.string(),
  tone: z.enum(['formal', 'informal']).optional(),
  glossary: z.union([z.array(z.string()), z.string()]).optional(),
  model: z.string().optional(),
  maxWordsPerChunk: z.number().optional(),
  concurrency: z.number().optional(),
  dryRun: z.boolean().optional(),
});

export const createTranslateRoutes = (getBackend: () => TranslationBackend) => {
  const translateRoutes = Router();

  translateRoutes.post(
    '/',
    asyncHandler(async (req, res) => {
      const payload = translateRequestSchema.parse(req.body);
      const options = createTranslationOptions({
        tone: payload.tone,
        glossary: typeof payload.glossary === 'string' ? parseGlossaryList(payload.glossary) : payload.glossary,
        model: payload.model,
        maxWordsPerChunk: payload.maxWordsPerChunk,
        concurrency: payload.concurrency,
      });

      logger.debug(
        {
          textLength: payload.text.length,
          tone: options.tone,
          glossaryTerms: options.glossary.length,
          model: options.model,
          dryRun: payload.dryRun ?? false,
        },
        'Translate request',
      );

      if (payload.dryRun) {
        const plan = planTranslation(payload.text, options);
        res.json({
          dryRun: true,
          instruction: plan.instruction,
          totalWords: plan.totalWords,
          chunks: plan.chunks.map((chunk) => ({
            index: chunk.index,
            wordCount: chunk.wordCount,
            oversized: chunk.oversized,
            paragraphCount: chunk.paragraphs.length,
          })),
        });
        return;
      }

      const result = await translateDocument(payload.text, options, getBackend());
      res.json({
        translation: result.text,
        chunkCount: result.chunkCount,
        totalWords: result.totalWords,
        model: result.model,
        issues: result.issues,
      });
    }),
  );

  return translateRoutes;
};
