import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { createOpenAIBackend } from './ai/providers/openai.provider';
import type { TranslationBackend } from './ai/providers/types';
import { createRoutes } from './routes';
import { ApiError } from './utils/apiError';
import { errorHandler } from './utils/errorHandler';
import { logger } from './utils/logger';

export type AppDependencies = {
  /** Resolved per translate request; defaults to a lazily created OpenAI backend */
  getBackend?: () => TranslationBackend;
};

const lazyOpenAIBackend = () => {
  let backend: TranslationBackend | undefined;
  return () => {
    backend ??= createOpenAIBackend();
    return backend;
  };
};

export const createApp = (dependencies: AppDependencies = {}) => {
  const app = express();
  const getBackend = dependencies.getBackend ?? lazyOpenAIBackend();

  app.use(helmet());
  app.use(cors({ origin: '*' }));
  app.use(express.json({ limit: '10mb' }));
  app.use(compression());
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, url: req.originalUrl }, 'Incoming request');
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createRoutes(getBackend));

  app.use((req, _res, next) => {
    next(ApiError.notFound(`Route ${req.method} ${req.path} not found`));
  });

  app.use(errorHandler);

  return app;
};
