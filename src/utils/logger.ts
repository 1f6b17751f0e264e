import pino, { type Logger } from 'pino';

import { config } from '@config/env.config';

export const logger: Logger = pino({
  level: config.LOG_LEVEL,
  base: { service: 'appointment-booking' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['req.headers.authorization', '*.authorization', '*.token'],
    censor: '[REDACTED]',
  },
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
