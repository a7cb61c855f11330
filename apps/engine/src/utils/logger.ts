import pino from 'pino';
import { logLevelSchema } from '../config/env.js';

const nodeEnv = process.env.NODE_ENV ?? 'development';

/**
 * A valid LOG_LEVEL wins; otherwise tests are silent and everything else logs at info
 */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  const requested = logLevelSchema.safeParse(env.LOG_LEVEL);
  if (requested.success) {
    return requested.data;
  }
  return (env.NODE_ENV ?? 'development') === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'lyric-lens',
  level: resolveLevel(),
  transport: nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'HH:MM:ss UTC',
      destination: 2,
    },
  } : undefined,
});

export type Logger = typeof logger;
