import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../config/env';

export const logger: Logger = pino({
  name: 'backtester',
  level: env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
