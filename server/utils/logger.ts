/**
 * Shared pino logger. Fastify is built from the same options, so request
 * logs and service logs share level and format.
 *
 * Services take a child: `const log = logger.child({ module: 'sales' })`.
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { env, isProduction, isTest } from '../config/env';

export function buildLoggerOptions(): LoggerOptions {
  const base: LoggerOptions = {
    level: isTest ? 'silent' : env.LOG_LEVEL,
  };
  if (isProduction || isTest) return base;

  return {
    ...base,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

export const logger: Logger = pino(buildLoggerOptions());

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
