import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';
const isDevelopment = process.env.NODE_ENV !== 'production' && !isTest;

/**
 * Root logger for the orchestrator. Components log through a child so
 * every line carries the component that wrote it.
 */
const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info'),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'orchestrator',
  },
});

export const engineLogger = logger.child({ component: 'engine' });
export const healthLogger = logger.child({ component: 'health' });
export const dbLogger = logger.child({ component: 'db' });
export const apiLogger = logger.child({ component: 'api' });
export const wsLogger = logger.child({ component: 'websocket' });

export type Logger = pino.Logger;

export default logger;
