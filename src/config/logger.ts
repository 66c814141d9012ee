import pino from 'pino';
import type { LoggerOptions } from 'pino';

function buildOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  if (env.NODE_ENV === 'test') {
    return { level: env.LOG_LEVEL || 'silent' };
  }

  if (env.NODE_ENV !== 'production') {
    return {
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'SYS:dd-mm-yyyy HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
      level: env.LOG_LEVEL || 'debug',
    };
  }

  // Pretty printing in prod is optional; keep JSON by default.
  return { level: env.LOG_LEVEL || 'info' };
}

export const logger = pino({ name: 'room-store', ...buildOptions(process.env) });
