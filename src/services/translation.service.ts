import { assembleChunks } from '../ai/chunker';
import { buildInstruction } from '../ai/instruction';
import { joinTranslations } from '../ai/joiner';
import { TranslationOrchestrator } from '../ai/orchestrator';
import { splitParagraphs } from '../ai/paragraphs';
import type { TranslationBackend } from '../ai/providers/types';
import { QAEngine } from '../ai/qaEngine';
import type {
  ChunkProgressCallback,
  TranslateDocumentResult,
  TranslationOptions,
  TranslationPlan,
} from '../ai/types';
import { logger } from '../utils/logger';

const qaEngine = new QAEngine();

/**
 * Split, chunk and render the instruction without calling the backend.
 * Every input error surfaces here, before any network interaction.
 */
export const planTranslation = (rawText: string, options: TranslationOptions): TranslationPlan => {
  const paragraphs = splitParagraphs(rawText);
  const chunks = assembleChunks(paragraphs, options.maxWordsPerChunk);
  const totalWords = chunks.reduce((total, chunk) => total + chunk.wordCount, 0);

  logger.debug(
    {
      paragraphs: paragraphs.length,
      chunks: chunks.length,
      totalWords,
      maxWordsPerChunk: options.maxWordsPerChunk,
    },
    'Translation plan ready',
  );

  return {
    instruction: buildInstruction(options),
    totalWords,
    chunks,
  };
};

export const translateDocument = async (
  rawText: string,
  options: TranslationOptions,
  backend: TranslationBackend,
  hooks: { onProgress?: ChunkProgressCallback } = {},
): Promise<TranslateDocumentResult> => {
  const plan = planTranslation(rawText, options);
  const startedAt = Date.now();

  const orchestrator = new TranslationOrchestrator(backend, {
    concurrency: options.concurrency,
    onProgress: hooks.onProgress,
  });
  const result = await orchestrator.translateChunks(plan.chunks, plan.instruction, {
    model: options.model,
    temperature: options.temperature,
  });

  const text = joinTranslations(result, plan.chunks);

  const issues = qaEngine.runChecks(
    plan.chunks.map((chunk) => ({
      chunkIndex: chunk.index,
      sourceText: chunk.text,
      targetText: result.get(chunk.index) ?? '',
    })),
    { glossary: options.glossary },
  );
  for (const issue of issues) {
    logger.warn(issue, 'Translation QA issue');
  }

  logger.info(
    {
      chunks: plan.chunks.length,
      totalWords: plan.totalWords,
      model: options.model,
      issues: issues.length,
      durationMs: Date.now() - startedAt,
    },
    'Document translated',
  );

  return {
    text,
    chunkCount: plan.chunks.length,
    totalWords: plan.totalWords,
    model: options.model,
    issues,
  };
};
