import { logger } from '../../utils/logger';
import { BackendRequestError } from '../errors';
import type { BackendTranslateRequest, TranslationBackend } from './types';

export abstract class BaseBackend implements TranslationBackend {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  abstract translate(request: BackendTranslateRequest): Promise<string>;

  protected ensureModel(requested?: string) {
    return requested ?? this.defaultModel;
  }

  protected ensureOutput(outputText: string | null | undefined, model: string): string {
    const trimmed = outputText?.trim() ?? '';
    if (!trimmed) {
      logger.warn({ backend: this.name, model }, 'Backend returned an empty translation');
      throw new BackendRequestError(`${this.name} returned an empty translation`);
    }
    return trimmed;
  }
}
