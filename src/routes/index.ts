import { Router } from 'express';
import type { TranslationBackend } from '../ai/providers/types';
import { healthRoutes } from './health.routes';
import { createTranslateRoutes } from './translate.routes';

export const createRoutes = (getBackend: () => TranslationBackend) => {
  const routes = Router();

  routes.use('/health', healthRoutes);
  routes.use('/translate', createTranslateRoutes(getBackend));

  return routes;
};
