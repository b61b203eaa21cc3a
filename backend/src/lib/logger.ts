/**
 * Pino logger configuration
 * Pretty-printed in development, JSON lines everywhere else
 */

import pino from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';
const logLevel = process.env.LOG_LEVEL || 'info';

export const loggerOptions: pino.LoggerOptions = {
  level: logLevel,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          singleLine: false,
        },
      }
    : undefined,
  base: {
    service: 'keyshare-enclave',
    environment: process.env.NODE_ENV,
  },
};

export const logger = pino(loggerOptions);
