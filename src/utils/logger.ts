import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { app: 'speech-admin' },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname,app'
          }
        }
      : undefined
});

export function createLogger(bindings: { service: string } & Record<string, unknown>) {
  return logger.child(bindings);
}

export type Logger = ReturnType<typeof createLogger>;
