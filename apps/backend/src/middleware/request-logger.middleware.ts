import type { Request, Response, NextFunction } from 'express';
import { createLogger, generateRequestId } from '@sensor-registry/shared-utils';

const logger = createLogger('HTTP');

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const incoming = req.header('x-request-id');
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : generateRequestId();
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    logger.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`, {
      requestId,
      subject: req.subject?.username,
    });
  });

  next();
}
