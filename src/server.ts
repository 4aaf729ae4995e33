import http from 'http';
import { createApp } from './app';
import { env } from './utils/env';
import { logger } from './utils/logger';

const app = createApp();
const server = http.createServer(app);

server.listen(env.port, () => {
  logger.info(`Tagalog translation API listening on port ${env.port}`);
  if (!env.openAiApiKey) {
    logger.warn('OPENAI_API_KEY is not set; only dry-run requests will succeed');
  }
});

const shutdown = (signal: string) => {
  logger.info({ signal }, 'Shutting down');
  server.close((error) => {
    if (error) {
      logger.error({ error: error.message }, 'Error while closing server');
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
