import pLimit from 'p-limit';
import { logger } from '../utils/logger';
import { InvalidConfigurationError, TranslationFailedError } from './errors';
import type { TranslationBackend } from './providers/types';
import type { Chunk, ChunkProgress, ChunkProgressCallback, TranslationResult } from './types';

export type OrchestratorOptions = {
  /** Maximum number of chunks in flight at once; 1 means strictly sequential */
  concurrency?: number;
  onProgress?: ChunkProgressCallback;
};

export type ChunkRequestOptions = {
  model: string;
  temperature: number;
};

/**
 * Sends each chunk to the backend with the shared instruction and collects the
 * results keyed by chunk index. The first failing chunk aborts the run: nothing
 * partial is ever returned.
 */
export class TranslationOrchestrator {
  private readonly concurrency: number;

  constructor(
    private readonly backend: TranslationBackend,
    private readonly options: OrchestratorOptions = {},
  ) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidConfigurationError([`concurrency must be a positive integer (got ${concurrency})`]);
    }
    this.concurrency = concurrency;
  }

  async translateChunks(
    chunks: readonly Chunk[],
    instruction: string,
    request: ChunkRequestOptions,
  ): Promise<TranslationResult> {
    if (chunks.length === 0) {
      return new Map();
    }

    logger.info(
      { backend: this.backend.name, model: request.model, chunks: chunks.length, concurrency: this.concurrency },
      'Starting chunk translation',
    );

    if (this.concurrency === 1 || chunks.length === 1) {
      return this.translateSequentially(chunks, instruction, request);
    }
    return this.translateConcurrently(chunks, instruction, request);
  }

  private async translateSequentially(
    chunks: readonly Chunk[],
    instruction: string,
    request: ChunkRequestOptions,
  ): Promise<TranslationResult> {
    const results: TranslationResult = new Map();
    for (const chunk of chunks) {
      results.set(chunk.index, await this.translateChunk(chunk, chunks.length, instruction, request));
    }
    return results;
  }

  private async translateConcurrently(
    chunks: readonly Chunk[],
    instruction: string,
    request: ChunkRequestOptions,
  ): Promise<TranslationResult> {
    const results: TranslationResult = new Map();
    const limit = pLimit(this.concurrency);
    const controller = new AbortController();
    const failure: { error?: TranslationFailedError } = {};

    const tasks = chunks.map((chunk) =>
      limit(async () => {
        // Queued chunks that start after a failure are skipped
        if (controller.signal.aborted) return;
        try {
          const text = await this.translateChunk(chunk, chunks.length, instruction, request, controller.signal);
          results.set(chunk.index, text);
        } catch (error) {
          if (failure.error) return;
          failure.error = error instanceof TranslationFailedError ? error : new TranslationFailedError(chunk.index, error);
          controller.abort(failure.error);
        }
      }),
    );

    await Promise.all(tasks);

    if (failure.error) {
      throw failure.error;
    }
    return results;
  }

  private async translateChunk(
    chunk: Chunk,
    totalChunks: number,
    instruction: string,
    request: ChunkRequestOptions,
    signal?: AbortSignal,
  ): Promise<string> {
    const startedAt = Date.now();
    this.emit({ chunkIndex: chunk.index, totalChunks, wordCount: chunk.wordCount, status: 'started' });

    try {
      const translated = await this.backend.translate({
        text: chunk.text,
        instruction,
        model: request.model,
        temperature: request.temperature,
        signal,
      });

      logger.info(
        { chunkIndex: chunk.index, totalChunks, wordCount: chunk.wordCount, durationMs: Date.now() - startedAt },
        'Chunk translated',
      );
      this.emit({ chunkIndex: chunk.index, totalChunks, wordCount: chunk.wordCount, status: 'completed' });
      return translated;
    } catch (error) {
      if (signal?.aborted) {
        logger.debug({ chunkIndex: chunk.index }, 'Chunk cancelled after an earlier failure');
        throw error;
      }
      logger.error(
        { chunkIndex: chunk.index, totalChunks, error: error instanceof Error ? error.message : String(error) },
        'Chunk translation failed',
      );
      this.emit({ chunkIndex: chunk.index, totalChunks, wordCount: chunk.wordCount, status: 'failed' });
      throw new TranslationFailedError(chunk.index, error);
    }
  }

  private emit(progress: ChunkProgress) {
    this.options.onProgress?.(progress);
  }
}
