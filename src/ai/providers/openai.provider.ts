import OpenAI, { APIConnectionError, APIError } from 'openai';
import { env } from '../../utils/env';
import { logger, safeLogText } from '../../utils/logger';
import { BackendRequestError, BackendUnavailableError, isBackendError } from '../errors';
import type { BackendError } from '../errors';
import { buildChunkInput } from '../instruction';
import { BaseBackend } from './baseProvider';
import type { BackendTranslateRequest } from './types';

export type ResponseRequest = {
  model: string;
  temperature: number;
  instructions: string;
  input: string;
};

/** The single Responses API call the backend needs */
export type CreateResponse = (
  request: ResponseRequest,
  options: { signal?: AbortSignal },
) => Promise<{ output_text: string }>;

// Statuses that mean "cannot reach or authenticate", as opposed to "request rejected"
const UNAVAILABLE_STATUSES = new Set([401, 403, 408, 429]);

export const classifyOpenAIError = (error: unknown): BackendError => {
  if (error instanceof APIConnectionError) {
    return new BackendUnavailableError(`OpenAI is unreachable: ${error.message}`, undefined, { cause: error });
  }
  if (error instanceof APIError) {
    const status = error.status;
    if (status === undefined || status >= 500 || UNAVAILABLE_STATUSES.has(status)) {
      return new BackendUnavailableError(`OpenAI API unavailable (${status ?? 'no status'}): ${error.message}`, status, {
        cause: error,
      });
    }
    return new BackendRequestError(`OpenAI API rejected the request (${status}): ${error.message}`, status, {
      cause: error,
    });
  }
  if (isBackendError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendUnavailableError(`OpenAI call failed: ${message}`, undefined, { cause: error });
};

export class OpenAIBackend extends BaseBackend {
  readonly name = 'openai';

  constructor(
    private readonly createResponse: CreateResponse,
    public readonly defaultModel = env.openAiModel,
  ) {
    super();
  }

  async translate(request: BackendTranslateRequest): Promise<string> {
    const model = this.ensureModel(request.model);
    const startedAt = Date.now();

    let outputText: string;
    try {
      const response = await this.createResponse(
        {
          model,
          temperature: request.temperature,
          instructions: request.instruction,
          input: buildChunkInput(request.text),
        },
        { signal: request.signal },
      );
      outputText = response.output_text;
    } catch (error) {
      const classified = classifyOpenAIError(error);
      logger.error(
        {
          backend: this.name,
          model,
          status: classified.status,
          error: classified.message,
          inputLength: request.text.length,
          inputPreview: safeLogText(request.text),
        },
        'OpenAI translation request failed',
      );
      throw classified;
    }

    logger.debug({ backend: this.name, model, durationMs: Date.now() - startedAt }, 'OpenAI translation received');
    return this.ensureOutput(outputText, model);
  }
}

export type OpenAIBackendConfig = {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  maxRetries?: number;
  timeoutMs?: number;
};

/**
 * Build the OpenAI backend from env (or explicit overrides).
 * Retries with backoff and request timeouts are handled by the SDK client.
 */
export const createOpenAIBackend = (config: OpenAIBackendConfig = {}): OpenAIBackend => {
  const apiKey = config.apiKey ?? env.openAiApiKey;
  if (!apiKey) {
    throw new BackendUnavailableError('OPENAI_API_KEY is not set');
  }

  const client = new OpenAI({
    apiKey,
    baseURL: config.baseURL ?? env.openAiBaseUrl,
    maxRetries: config.maxRetries ?? env.aiMaxRetries,
    timeout: config.timeoutMs ?? env.aiTimeoutMs,
  });

  return new OpenAIBackend(
    (request, options) => client.responses.create({ ...request, stream: false }, options),
    config.model ?? env.openAiModel,
  );
};
