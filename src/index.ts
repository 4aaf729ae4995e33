/**
 * Tagalog translation core
 *
 * Paragraph splitting, chunk assembly, instruction rendering, per-chunk
 * orchestration and reassembly around a pluggable translation backend.
 */

export { splitParagraphs, countWords } from './ai/paragraphs';
export { assembleChunks, flattenChunks } from './ai/chunker';
export { buildInstruction, buildChunkInput } from './ai/instruction';
export { TranslationOrchestrator } from './ai/orchestrator';
export type { OrchestratorOptions, ChunkRequestOptions } from './ai/orchestrator';
export { joinTranslations } from './ai/joiner';
export { createTranslationOptions, parseGlossaryList, translationOptionsSchema } from './ai/options';
export type { TranslationOptionsInput } from './ai/options';
export { QAEngine } from './ai/qaEngine';
export {
  TranslationPipelineError,
  EmptyInputError,
  InvalidConfigurationError,
  BackendUnavailableError,
  BackendRequestError,
  TranslationFailedError,
  IncompleteTranslationError,
} from './ai/errors';
export { OpenAIBackend, createOpenAIBackend, classifyOpenAIError } from './ai/providers/openai.provider';
export type { TranslationBackend, BackendTranslateRequest } from './ai/providers/types';
export { planTranslation, translateDocument } from './services/translation.service';
export { createApp } from './app';
export * from './ai/types';
