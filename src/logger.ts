// Root logger
// Pretty transport in development, JSON elsewhere, silent under test

import pino from 'pino';
import { env } from './env.js';

function buildLogger(): pino.Logger {
  if (env.NODE_ENV === 'test') {
    return pino({ level: 'silent' });
  }

  if (env.NODE_ENV === 'development') {
    return pino({
      level: env.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level: env.LOG_LEVEL });
}

export const logger = buildLogger();

export type Logger = pino.Logger;
