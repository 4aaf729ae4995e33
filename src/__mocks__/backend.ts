/**
 * In-process translation backend for tests.
 *
 * Records every request, tracks how many calls are in flight, and can be told
 * per request to delay, fail, or return a specific translation.
 */

import type { BackendTranslateRequest, TranslationBackend } from '../ai/providers/types';

export type FakeBehavior = {
  delayMs?: number;
  error?: Error;
  output?: string;
};

export const fakeTranslation = (text: string) => `TL<${text}>`;

const wait = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true },
    );
  });

export class FakeBackend implements TranslationBackend {
  readonly name = 'fake';
  readonly defaultModel = 'fake-model';
  readonly calls: BackendTranslateRequest[] = [];
  readonly completed: string[] = [];
  readonly aborted: string[] = [];
  maxActive = 0;
  private active = 0;

  constructor(private readonly behavior: (request: BackendTranslateRequest) => FakeBehavior = () => ({})) {}

  async translate(request: BackendTranslateRequest): Promise<string> {
    this.calls.push(request);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    try {
      const behavior = this.behavior(request);
      if (behavior.delayMs !== undefined) {
        try {
          await wait(behavior.delayMs, request.signal);
        } catch (error) {
          this.aborted.push(request.text);
          throw error;
        }
      }
      if (behavior.error) {
        throw behavior.error;
      }
      this.completed.push(request.text);
      return behavior.output ?? fakeTranslation(request.text);
    } finally {
      this.active -= 1;
    }
  }
}

/** `count` distinct words: "w0 w1 w2 ..." */
export const words = (count: number, prefix = 'w') =>
  Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
