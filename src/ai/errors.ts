export type TranslationErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_CONFIGURATION'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_REQUEST'
  | 'TRANSLATION_FAILED'
  | 'INCOMPLETE_TRANSLATION';

/**
 * Base class for every error raised by the translation pipeline.
 * `code` is stable and safe to expose to API clients and CLI users.
 */
export abstract class TranslationPipelineError extends Error {
  abstract readonly code: TranslationErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends TranslationPipelineError {
  readonly code = 'EMPTY_INPUT';

  constructor(message = 'No input text provided') {
    super(message);
  }
}

export class InvalidConfigurationError extends TranslationPipelineError {
  readonly code = 'INVALID_CONFIGURATION';

  constructor(readonly issues: string[]) {
    super(`Invalid translation options: ${issues.join('; ')}`);
  }
}

/** Backend could not be reached, authenticated, or timed out. */
export class BackendUnavailableError extends TranslationPipelineError {
  readonly code = 'BACKEND_UNAVAILABLE';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Backend was reached but rejected the request (size/content limits, bad model, empty answer). */
export class BackendRequestError extends TranslationPipelineError {
  readonly code = 'BACKEND_REQUEST';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type BackendError = BackendUnavailableError | BackendRequestError;

export class TranslationFailedError extends TranslationPipelineError {
  readonly code = 'TRANSLATION_FAILED';

  constructor(readonly chunkIndex: number, readonly cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Translation failed at chunk ${chunkIndex}: ${reason}`, { cause });
  }
}

export class IncompleteTranslationError extends TranslationPipelineError {
  readonly code = 'INCOMPLETE_TRANSLATION';

  constructor(readonly missing: number[]) {
    super(`Translation result is missing chunk(s): ${missing.join(', ')}`);
  }
}

export const isBackendError = (error: unknown): error is BackendError =>
  error instanceof BackendUnavailableError || error instanceof BackendRequestError;
