import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

export function requestLogger() {
  return function (req: Request, res: Response, next: NextFunction) {
    const start = Date.now();
    const headerId = req.headers['x-request-id'];
    const reqId = (typeof headerId === 'string' && headerId) || uuidv4();
    res.setHeader('X-Request-Id', reqId);

    logger.info('req:start', {
      id: reqId,
      method: req.method,
      path: req.originalUrl || req.url,
      ip: req.ip,
    });

    res.on('finish', () => {
      const metaEnd = {
        id: reqId,
        method: req.method,
        path: req.originalUrl || req.url,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
      };
      if (res.statusCode >= 500) {
        logger.error('req:done', metaEnd);
      } else if (res.statusCode >= 400) {
        logger.warn('req:done', metaEnd);
      } else {
        logger.info('req:done', metaEnd);
      }
    });

    next();
  };
}
