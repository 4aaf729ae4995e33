import type { QAIssue } from './types';

export type ChunkPair = {
  chunkIndex: number;
  sourceText: string;
  targetText: string;
};

export type QACheckOptions = {
  glossary?: readonly string[];
};

/**
 * Post-translation checks for content that must survive translation verbatim.
 * Issues are reported only; they never change or reject the output.
 */
export class QAEngine {
  private extractNumbers(text: string): string[] {
    return text.match(/\d+(?:[.,]\d+)*/g) ?? [];
  }

  private extractUrls(text: string): string[] {
    const urls = text.match(/https?:\/\/[^\s<>"'`)\]]+/g) ?? [];
    return urls.map((url) => url.replace(/[.,;:!?]+$/, ''));
  }

  private extractCodeSpans(text: string): string[] {
    return text.match(/`[^`\n]+`/g) ?? [];
  }

  private checkGlossary(pair: ChunkPair, glossary: readonly string[]): QAIssue[] {
    return glossary
      .filter((term) => pair.sourceText.includes(term) && !pair.targetText.includes(term))
      .map((term) => ({
        chunkIndex: pair.chunkIndex,
        severity: 'error' as const,
        category: 'glossary' as const,
        message: `Glossary term "${term}" was not preserved`,
      }));
  }

  private checkNumbers(pair: ChunkPair): QAIssue[] {
    const sourceNumbers = this.extractNumbers(pair.sourceText).sort();
    if (sourceNumbers.length === 0) return [];

    const targetNumbers = this.extractNumbers(pair.targetText).sort();
    if (sourceNumbers.join(',') === targetNumbers.join(',')) return [];

    return [
      {
        chunkIndex: pair.chunkIndex,
        severity: 'warning',
        category: 'number',
        message: `Numeric mismatch: source has [${sourceNumbers.join(', ')}], translation has [${targetNumbers.join(', ')}]`,
      },
    ];
  }

  private checkUrls(pair: ChunkPair): QAIssue[] {
    const targetUrls = new Set(this.extractUrls(pair.targetText));
    return [...new Set(this.extractUrls(pair.sourceText))]
      .filter((url) => !targetUrls.has(url))
      .map((url) => ({
        chunkIndex: pair.chunkIndex,
        severity: 'error' as const,
        category: 'url' as const,
        message: `URL ${url} was not preserved`,
      }));
  }

  private checkCodeSpans(pair: ChunkPair): QAIssue[] {
    return [...new Set(this.extractCodeSpans(pair.sourceText))]
      .filter((span) => !pair.targetText.includes(span))
      .map((span) => ({
        chunkIndex: pair.chunkIndex,
        severity: 'warning' as const,
        category: 'code' as const,
        message: `Inline code ${span} was not preserved`,
      }));
  }

  runChecks(pairs: readonly ChunkPair[], options: QACheckOptions = {}): QAIssue[] {
    const glossary = options.glossary ?? [];
    return pairs.flatMap((pair) => [
      ...this.checkGlossary(pair, glossary),
      ...this.checkNumbers(pair),
      ...this.checkUrls(pair),
      ...this.checkCodeSpans(pair),
    ]);
  }
}
