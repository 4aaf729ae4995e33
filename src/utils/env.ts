import dotenv from 'dotenv';

dotenv.config();

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const nodeEnv = process.env.NODE_ENV ?? 'development';

const defaultLogLevel = (): string => {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
};

export const env = Object.freeze({
  nodeEnv,
  port: numberFromEnv(process.env.PORT, 4000),
  logLevel: process.env.LOG_LEVEL ?? defaultLogLevel(),
  openAiApiKey: process.env.OPENAI_API_KEY ?? '',
  openAiModel: process.env.OPENAI_MODEL ?? 'gpt-4.1-mini',
  openAiBaseUrl: process.env.OPENAI_BASE_URL || undefined,
  aiMaxRetries: numberFromEnv(process.env.AI_MAX_RETRIES, 3),
  aiTimeoutMs: numberFromEnv(process.env.AI_TIMEOUT_MS, 600_000),
  maxWordsPerChunk: numberFromEnv(process.env.MAX_WORDS_PER_CHUNK, 4000),
  translationConcurrency: numberFromEnv(process.env.TRANSLATION_CONCURRENCY, 1),
});
