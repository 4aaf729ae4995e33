export type Tone = 'formal' | 'informal';

export type Paragraph = Readonly<{
  text: string;
  wordCount: number;
}>;

export type Chunk = Readonly<{
  /** Rank of the chunk in the document, starting at 0 */
  index: number;
  paragraphs: readonly Paragraph[];
  /** Paragraphs rejoined with the paragraph separator */
  text: string;
  wordCount: number;
  /** A single paragraph that alone exceeds the word budget */
  oversized: boolean;
}>;

export type TranslationOptions = Readonly<{
  tone: Tone;
  glossary: readonly string[];
  model: string;
  temperature: number;
  maxWordsPerChunk: number;
  concurrency: number;
}>;

export type InstructionOptions = Pick<TranslationOptions, 'tone' | 'glossary'>;

/** Translated text keyed by chunk index */
export type TranslationResult = Map<number, string>;

export type ChunkProgress = {
  chunkIndex: number;
  totalChunks: number;
  wordCount: number;
  status: 'started' | 'completed' | 'failed';
};

export type ChunkProgressCallback = (progress: ChunkProgress) => void;

export type TranslationPlan = {
  instruction: string;
  totalWords: number;
  chunks: Chunk[];
};

export type QAIssue = {
  chunkIndex: number;
  severity: 'warning' | 'error';
  category: 'glossary' | 'number' | 'url' | 'code';
  message: string;
};

export type TranslateDocumentResult = {
  text: string;
  chunkCount: number;
  totalWords: number;
  model: string;
  issues: QAIssue[];
};

export const PARAGRAPH_SEPARATOR = '\n\n';
export const DEFAULT_MAX_WORDS_PER_CHUNK = 4000;
/** Low temperature keeps the translation faithful and repeatable */
export const TRANSLATION_TEMPERATURE = 0.2;
