export type BackendTranslateRequest = {
  text: string;
  instruction: string;
  model?: string;
  temperature: number;
  /** Aborted by the orchestrator when another chunk has already failed */
  signal?: AbortSignal;
};

/**
 * Translation-capable service invoked once per chunk.
 *
 * Implementations reject with BackendUnavailableError when the service cannot
 * be reached or authenticated, and with BackendRequestError when it rejects
 * the request. Retries and timeouts are their own concern.
 */
export interface TranslationBackend {
  readonly name: string;
  readonly defaultModel: string;
  translate(request: BackendTranslateRequest): Promise<string>;
}
