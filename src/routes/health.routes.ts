import { Router } from 'express';
import { env } from '../utils/env';

export const healthRoutes = Router();

healthRoutes.get('/', (_req, res) => {
  res.json({
    status: 'ok',
    backendConfigured: Boolean(env.openAiApiKey),
    timestamp: new Date().toISOString(),
  });
});
