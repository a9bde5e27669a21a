import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const createLogger = (options: { level: string; name?: string }): Logger =>
  pino({
    name: options.name ?? 'speechgate',
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ['req.headers.authorization', 'req.headers["xi-api-key"]'],
  });
