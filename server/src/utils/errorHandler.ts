import type { ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';

export const INTERNAL_ERROR_MESSAGE = 'internal server error, please try again';

const readHttpStatus = (error: unknown): number | null => {
  if (!error || typeof error !== 'object') return null;
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' ? status : null;
};

export const createErrorHandler = (logger: Logger): ErrorRequestHandler => (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  // body-parser tags client errors (bad JSON, oversized payloads) with a 4xx status.
  const status = readHttpStatus(error);
  if (status !== null && status >= 400 && status < 500) {
    logger.warn({ err: error, path: req.path, status }, 'rejected malformed request');
    res.status(status).json({ success: false, message: 'malformed request body' });
    return;
  }

  logger.error({ err: error, path: req.path }, 'unexpected error');
  res.status(500).json({ success: false, message: INTERNAL_ERROR_MESSAGE });
};
