/**
 * Default logger for verifiers used outside a request context
 */

import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: {
    service: 'keyshare-auth',
  },
});
