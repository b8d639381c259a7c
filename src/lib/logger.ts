// src/lib/logger.ts
import pino, { type BaseLogger } from 'pino';
import type { EnvConfig } from '../config/env.js';

/**
 * Logging surface the core modules use. Satisfied by fastify.log and by a
 * standalone pino logger.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * pino options shared by the HTTP app and the terminal session
 * (pretty output in development, JSON otherwise)
 */
export function loggerOptions(cfg: Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL'>) {
  if (cfg.NODE_ENV === 'development') {
    return {
      level: cfg.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level: cfg.LOG_LEVEL };
}

/**
 * Standalone logger for scripts that run outside Fastify
 */
export function createLogger(cfg: Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL'>) {
  return pino(loggerOptions(cfg));
}
