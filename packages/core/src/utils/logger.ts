/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging. Component tags go in the message prefix,
 * e.g. "[gateway] ...".
 */

import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
