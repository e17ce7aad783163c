import pino from 'pino';

/**
 * The helper runs detached with nobody watching a terminal, so it always
 * writes newline-delimited JSON; `docker logs` on the helper shows the swap.
 */
const logger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'swap-helper',
  },
});

export type Logger = pino.Logger;

export default logger;
