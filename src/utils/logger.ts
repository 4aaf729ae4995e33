import pino from 'pino';
import pretty from 'pino-pretty';
import { env } from './env';

// stdout is reserved for the translation itself when running as a CLI
const stream = env.nodeEnv === 'development'
  ? pretty({
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    })
  : pino.destination({ dest: 2, sync: true });

export const logger = pino(
  {
    name: 'tagalog-translator',
    level: env.logLevel,
  },
  stream,
);

// Short, single-line preview of text for log fields
export const safeLogText = (text: string, maxLength = 100): string => {
  if (!text) return '';
  const flattened = text.replace(/\s+/g, ' ').trim();
  return flattened.length > maxLength ? flattened.substring(0, maxLength) + '...' : flattened;
};
